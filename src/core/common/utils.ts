// src/core/common/utils.ts

import { v4 as uuidv4 } from 'uuid';

/**
 * Generates a unique Version 4 UUID.
 * @returns A unique identifier string.
 */
export function generateUniqueId(): string {
    return uuidv4();
}

/**
 * Pauses for the given duration. With 0 it simply yields to the event loop,
 * which is how partitioned work lets other callbacks run between partitions.
 */
export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Rounds half away from zero to `precision` decimal places.
 * The epsilon nudge keeps values such as 1.005 from rounding down because of
 * their binary representation.
 */
export function roundTo(value: number, precision: number): number {
    const factor = 10 ** precision;
    const nudged = value + Math.sign(value) * Number.EPSILON * Math.max(1, Math.abs(value));
    const rounded = Math.round(Math.abs(nudged) * factor) / factor;
    return nudged < 0 ? -rounded : rounded;
}

const ISO_DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Month (1-12) of a "YYYY-MM-DD" day string.
 * @throws {RangeError} when the string is not an ISO day
 */
export function monthOfDay(isoDay: string): number {
    const match = ISO_DAY_PATTERN.exec(isoDay);
    if (!match) {
        throw new RangeError(`Not an ISO calendar day: "${isoDay}"`);
    }
    return Number(match[2]);
}

/**
 * Formats a Date as "YYYY-MM-DD" using its UTC components.
 * Dates produced by ingestion sit at UTC noon, so the day never shifts.
 */
export function formatIsoDay(date: Date): string {
    const year = date.getUTCFullYear();
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

/** Groups items by key, preserving the first-seen order of keys and of items within a group. */
export function groupBy<T>(items: Iterable<T>, keyOf: (item: T) => string): Map<string, T[]> {
    const groups = new Map<string, T[]>();
    for (const item of items) {
        const key = keyOf(item);
        const bucket = groups.get(key);
        if (bucket) {
            bucket.push(item);
        } else {
            groups.set(key, [item]);
        }
    }
    return groups;
}

/** Distinct values in first-seen order (SameValueZero equality). */
export function distinct<T>(values: Iterable<T>): T[] {
    return [...new Set(values)];
}
