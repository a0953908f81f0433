import { startOfDay, subDays } from 'date-fns';

export type BoundaryVerdict = 'keep' | 'stop';

const DAYS_PER_YEAR = 365;

/**
 * Earliest calendar day a harvest of `years` should include:
 * local midnight of `now - years * 365 days`.
 */
export function computeCutoff(years: number, now: Date = new Date()): Date {
    return startOfDay(subDays(now, years * DAYS_PER_YEAR));
}

/** `stop` iff the candidate is strictly older than the cutoff; the cutoff day itself is kept. */
export function classify(candidateDate: Date, cutoffDate: Date): BoundaryVerdict {
    return candidateDate.getTime() < cutoffDate.getTime() ? 'stop' : 'keep';
}
