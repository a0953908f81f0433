import * as crypto from 'crypto';
import { computeCutoff } from './dateBoundary.js';
import { DateDeduplicator } from './dedup.js';
import type { IndexRecord } from '../sources/types.js';

export interface HarvestStats {
    pagesFetched: number;
    rowsAccepted: number;
    rowsSkippedUnparsable: number;
    rowsSkippedDuplicate: number;
}

/**
 * Mutable accumulator for one harvest run. Owned by the paginator for the
 * run's duration and dropped when it returns.
 */
export interface HarvestSession {
    readonly runId: string;
    readonly startedAt: string;
    /** Fixed once at session start. */
    readonly cutoff: Date;
    readonly records: IndexRecord[];
    readonly seenDates: DateDeduplicator;
    page: number;
    readonly stats: HarvestStats;
}

export function createHarvestSession(years: number, now: Date = new Date()): HarvestSession {
    return {
        runId: crypto.randomUUID(),
        startedAt: now.toISOString(),
        cutoff: computeCutoff(years, now),
        records: [],
        seenDates: new DateDeduplicator(),
        page: 1,
        stats: {
            pagesFetched: 0,
            rowsAccepted: 0,
            rowsSkippedUnparsable: 0,
            rowsSkippedDuplicate: 0,
        },
    };
}

export function acceptRecord(session: HarvestSession, record: IndexRecord): void {
    session.seenDates.admit(record.date);
    session.records.push(record);
    session.stats.rowsAccepted++;
}
