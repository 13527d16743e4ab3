// src/core/validation/normalization.utils.ts
import { DateOrder } from '../../config';
import { CouponStatus } from '../common/interfaces/models';
import { roundTo } from '../common/utils';

const MILLISECONDS_PER_DAY = 86400 * 1000;
const NOON_OFFSET_MS = 12 * 60 * 60 * 1000;

/** Builds a Date at UTC noon, or null when the parts do not form a real calendar day. */
function utcNoon(year: number, month: number, day: number): Date | null {
    if (month < 1 || month > 12 || day < 1 || day > 31 || year <= 1000) {
        return null;
    }
    const date = new Date(Date.UTC(year, month - 1, day, 12, 0, 0));
    // Reject wrapped dates such as 30 Feb
    if (isNaN(date.getTime()) ||
        date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day) {
        return null;
    }
    return date;
}

/**
 * Parses "YYYY-MM-DD" (a trailing time part is ignored) or a two-part day and month
 * before a four-digit year, separated by "-" or "/". `order` decides which of the
 * two parts is the day; under 'unambiguous' a value above 12 decides it, and
 * dates such as 05/01/2019 are refused.
 * @returns A Date at UTC noon, or null.
 */
export function parseDateString(dateStr: string | undefined | null, order: DateOrder = 'unambiguous'): Date | null {
    if (!dateStr) return null;
    const trimmed = String(dateStr).trim();

    const iso = trimmed.match(/^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ].*)?$/);
    if (iso) {
        return utcNoon(parseInt(iso[1], 10), parseInt(iso[2], 10), parseInt(iso[3], 10));
    }

    const parts = trimmed.match(/^(\d{1,2})[-/](\d{1,2})[-/](\d{4})$/);
    if (!parts) return null;
    const first = parseInt(parts[1], 10);
    const second = parseInt(parts[2], 10);
    const year = parseInt(parts[3], 10);

    if (order === 'day-first') {
        return utcNoon(year, second, first);
    }
    if (order === 'month-first') {
        return utcNoon(year, first, second);
    }
    if (first > 12) return utcNoon(year, second, first);
    if (second > 12 || first === second) return utcNoon(year, first, second);
    return null;
}

/**
 * Converts an Excel serial day number to a Date at UTC noon. Any time fraction is dropped.
 * 25569 is the serial of 1970-01-01.
 */
export function excelSerialDateToJSDate(serial: number): Date | null {
    if (!Number.isFinite(serial) || serial < 1) {
        return null;
    }
    const daysSinceEpoch = Math.floor(serial) - 25569;
    const date = new Date(daysSinceEpoch * MILLISECONDS_PER_DAY + NOON_OFFSET_MS);
    return isNaN(date.getTime()) ? null : date;
}

/** Accepts a Date, an Excel serial number or a date string. */
export function parseDateValue(raw: unknown, order?: DateOrder): Date | null {
    if (raw instanceof Date) {
        if (isNaN(raw.getTime())) return null;
        // Re-create from UTC components so every parsed day sits at UTC noon
        return utcNoon(raw.getUTCFullYear(), raw.getUTCMonth() + 1, raw.getUTCDate());
    }
    if (typeof raw === 'number') {
        return excelSerialDateToJSDate(raw);
    }
    if (typeof raw === 'string') {
        const trimmed = raw.trim();
        // CSV exports sometimes carry the serial as text
        if (/^\d+(\.\d+)?$/.test(trimmed)) {
            return excelSerialDateToJSDate(parseFloat(trimmed));
        }
        return parseDateString(trimmed, order);
    }
    return null;
}

const MONTH_NAMES = [
    'january', 'february', 'march', 'april', 'may', 'june',
    'july', 'august', 'september', 'october', 'november', 'december',
];

/** Month as 1-12 from a number, a numeric string, a full name or a three-letter abbreviation. */
export function parseMonth(raw: unknown): number | null {
    let month: number;
    if (typeof raw === 'number') {
        month = raw;
    } else if (typeof raw === 'string') {
        const text = raw.trim().toLowerCase();
        if (/^\d{1,2}$/.test(text)) {
            month = parseInt(text, 10);
        } else {
            const index = MONTH_NAMES.findIndex(name => name === text || (text.length === 3 && name.startsWith(text)));
            month = index + 1;
        }
    } else {
        return null;
    }
    return Number.isInteger(month) && month >= 1 && month <= 12 ? month : null;
}

/** Reads a number, or a numeric string with optional currency sign and thousands separators. */
export function parseNumeric(raw: unknown): number | null {
    if (typeof raw === 'number') {
        return Number.isFinite(raw) ? raw : null;
    }
    if (typeof raw === 'string') {
        const cleaned = raw.trim().replace(/[$,]/g, '');
        if (cleaned === '') return null;
        const value = Number(cleaned);
        return Number.isFinite(value) ? value : null;
    }
    return null;
}

/**
 * Reads a percentage as 0-100. Accepts "18", "18%" and 18; a bare number strictly
 * between 0 and 1 is taken as a fraction (0.18 -> 18).
 */
export function parsePercentage(raw: unknown): number | null {
    if (typeof raw === 'string' && raw.trim().endsWith('%')) {
        return parseNumeric(raw.trim().slice(0, -1));
    }
    const value = parseNumeric(raw);
    if (value === null) return null;
    return value > 0 && value < 1 ? roundTo(value * 100, 6) : value;
}

/** "Used", "Not Used", "not-used", "CLICKED" ... */
export function normalizeCouponStatus(raw: unknown): CouponStatus | null {
    if (typeof raw !== 'string') return null;
    const key = raw.trim().toLowerCase().replace(/[\s-]+/g, '_');
    switch (key) {
        case 'used': return 'used';
        case 'not_used':
        case 'notused': return 'not_used';
        case 'clicked': return 'clicked';
        default: return null;
    }
}

/** Trimmed text for identifiers and labels; numbers are accepted since sheets store ids as numbers. */
export function normalizeText(raw: unknown): string {
    if (typeof raw === 'string') return raw.trim();
    if (typeof raw === 'number' && Number.isFinite(raw)) return String(raw);
    return '';
}
