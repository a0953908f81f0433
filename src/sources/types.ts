/**
 * src/sources/types.ts
 *
 * Shared types for the index listing, its fallback sources and the
 * persisted dataset.
 *
 * Every source produces IndexRecord objects. The paginator accumulates them
 * in a HarvestSession, the dataset store sorts, dedupes and writes them.
 */

// ─── Records ──────────────────────────────────────────────────────────────────

export interface IndexRecord {
    /** Local calendar date at midnight; time of day is never meaningful. */
    date: Date;
    /** Closing index value, always > 0. */
    close: number;
    /** Synthetic trading volume, always > 0. Formatted only on write. */
    volume: number;
}

/** Raw cell texts pulled from one listing row, before any parsing. */
export interface RawIndexRow {
    dateText: string;
    priceText: string;
}

/** A row whose date and price both parsed. Volume is attached on acceptance. */
export interface IndexCandidate {
    date: Date;
    close: number;
}

// ─── Fetching ─────────────────────────────────────────────────────────────────

/**
 * Anything that can hand back the markup of one listing page.
 * Implementations throw FetchError on failure.
 */
export interface PageSource {
    fetch(url: string, pageIndex: number): Promise<string>;
}

// ─── Pagination ───────────────────────────────────────────────────────────────

export interface PageResult {
    page: number;
    records: IndexRecord[];
    reachedBoundary: boolean;
    hasNextPage: boolean;
}

export type HarvestState =
    | 'FETCHING'
    | 'EXTRACTING'
    | 'ACCUMULATING'
    | 'STOPPED_BOUNDARY'
    | 'STOPPED_NO_DATA'
    | 'STOPPED_NO_NEXT_LINK'
    | 'STOPPED_PAGE_LIMIT'
    | 'FAILED';

export type TerminalState = Extract<HarvestState, `STOPPED_${string}` | 'FAILED'>;

// ─── Fallback ─────────────────────────────────────────────────────────────────

/** One alternate source able to produce at most one current data point. */
export interface FallbackStrategy {
    readonly name: string;
    probe(now: Date): Promise<IndexRecord | null>;
}

/** Maps a closing price and its date to a positive synthetic volume. */
export type VolumeEstimator = (close: number, date: Date) => number;
