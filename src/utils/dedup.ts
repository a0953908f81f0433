/**
 * src/utils/dedup.ts
 *
 * Date-keyed deduplication, used at two layers:
 *   DateDeduplicator → in-run set owned by one HarvestSession
 *   dedupeByDate()   → final pass the dataset store runs before writing
 *
 * Both keep the first occurrence in arrival order (page order, then row
 * order) and drop every later one.
 */

import { format } from 'date-fns';

/** `MM/DD/YYYY`, the same text the dataset writes in its Date column. */
export function dateKey(date: Date): string {
    return format(date, 'MM/dd/yyyy');
}

export class DateDeduplicator {
    private readonly seen = new Set<string>();

    /** Records the date and returns true on first sight, false for a repeat. */
    admit(date: Date): boolean {
        const key = dateKey(date);
        if (this.seen.has(key)) return false;
        this.seen.add(key);
        return true;
    }

    has(date: Date): boolean {
        return this.seen.has(dateKey(date));
    }

    get size(): number {
        return this.seen.size;
    }
}

export interface DedupResult<T> {
    unique: T[];
    removed: number;
}

export function dedupeByDate<T extends { date: Date }>(records: readonly T[]): DedupResult<T> {
    const dedup = new DateDeduplicator();
    const unique = records.filter((record) => dedup.admit(record.date));
    return { unique, removed: records.length - unique.length };
}
