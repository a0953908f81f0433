/**
 * src/paginationController.ts
 *
 * PAGINATED INDEX HARVEST
 *
 * Walks the listing one page at a time, strictly sequentially:
 *
 *   FETCHING(n) → EXTRACTING → ACCUMULATING → (next page?) → FETCHING(n+1)
 *
 * and ends in exactly one terminal state:
 *
 *   STOPPED_BOUNDARY     a row older than the cutoff was met (hard early exit)
 *   STOPPED_NO_DATA      the page yielded no usable, unseen rows
 *   STOPPED_NO_NEXT_LINK no next-page affordance on the page
 *   STOPPED_PAGE_LIMIT   the page ceiling was reached
 *   FAILED               a fetch (or the page's extraction) failed
 *
 * Every terminal state, FAILED included, hands back what the session
 * accumulated up to that point. Nothing is retried and nothing is thrown
 * to the caller.
 */

import * as cheerio from 'cheerio';
import { log } from 'crawlee';
import { differenceInSeconds } from 'date-fns';
import { DEFAULT_NEXT_PAGE_DETECTOR, type NextPageDetector } from './extractors/nextPage.js';
import { RecordExtractor } from './extractors/indexTable.js';
import { classify } from './utils/dateBoundary.js';
import { dateKey } from './utils/dedup.js';
import { FetchError, errorMessage } from './utils/errors.js';
import { acceptRecord, createHarvestSession, type HarvestSession, type HarvestStats } from './utils/harvestSession.js';
import { estimateVolume } from './utils/volumeEstimate.js';
import type {
    HarvestState,
    IndexRecord,
    PageResult,
    PageSource,
    TerminalState,
    VolumeEstimator,
} from './sources/types.js';

// ─── Configuration ────────────────────────────────────────────────────────────

export const DEFAULT_MAX_PAGES = 30;
export const DEFAULT_POLITENESS_DELAY_MS = 1500;

export interface PaginationOptions {
    baseUrl: string;
    years: number;
    maxPages?: number;
    politenessDelayMs?: number;
}

export interface PaginationDeps {
    fetcher: PageSource;
    extractor?: RecordExtractor;
    nextPage?: NextPageDetector;
    estimateVolume?: VolumeEstimator;
    sleep?: (ms: number) => Promise<void>;
    now?: () => Date;
}

export interface HarvestOutcome {
    runId: string;
    state: TerminalState;
    records: IndexRecord[];
    cutoff: Date;
    stats: Readonly<HarvestStats>;
    error?: string;
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

// ─── Controller ───────────────────────────────────────────────────────────────

export class PaginationController {
    private readonly fetcher: PageSource;
    private readonly extractor: RecordExtractor;
    private readonly nextPage: NextPageDetector;
    private readonly estimateVolume: VolumeEstimator;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly now: () => Date;
    private state: HarvestState = 'FETCHING';

    constructor(deps: PaginationDeps) {
        this.fetcher = deps.fetcher;
        this.extractor = deps.extractor ?? new RecordExtractor();
        this.nextPage = deps.nextPage ?? DEFAULT_NEXT_PAGE_DETECTOR;
        this.estimateVolume = deps.estimateVolume ?? estimateVolume;
        this.sleep = deps.sleep ?? sleep;
        this.now = deps.now ?? (() => new Date());
    }

    get currentState(): HarvestState {
        return this.state;
    }

    async run(options: PaginationOptions): Promise<HarvestOutcome> {
        const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
        const delayMs = options.politenessDelayMs ?? DEFAULT_POLITENESS_DELAY_MS;
        const session = createHarvestSession(options.years, this.now());

        log.info(
            `[Paginator] Harvesting ${options.years}y of daily closes from ${options.baseUrl} ` +
            `(cutoff ${dateKey(session.cutoff)}, max ${maxPages} pages)`
        );

        const finish = (state: TerminalState, error?: string): HarvestOutcome => {
            this.state = state;
            const s = session.stats;
            const elapsed = differenceInSeconds(this.now(), new Date(session.startedAt));
            log.info(
                `[Paginator] ${state}: ` +
                `Run: ${session.runId} (started ${session.startedAt}, ${elapsed}s) | ` +
                `Pages: ${s.pagesFetched} | ` +
                `Records: ${session.records.length} | ` +
                `Skipped: unparsable ${s.rowsSkippedUnparsable}, duplicate ${s.rowsSkippedDuplicate}`
            );
            return {
                runId: session.runId,
                state,
                records: session.records,
                cutoff: session.cutoff,
                stats: { ...s },
                error,
            };
        };

        while (true) {
            this.state = 'FETCHING';
            log.info(`[Paginator] Processing page ${session.page}...`);

            let markup: string;
            try {
                markup = await this.fetcher.fetch(options.baseUrl, session.page);
            } catch (err) {
                const reason = err instanceof FetchError ? err.message : `unexpected fetch error: ${errorMessage(err)}`;
                log.error(`[Paginator] Error on page ${session.page}: ${reason}`);
                return finish('FAILED', reason);
            }
            session.stats.pagesFetched++;

            let result: PageResult;
            try {
                result = this.processPage(session, markup);
            } catch (err) {
                const reason = `extraction failed: ${errorMessage(err)}`;
                log.error(`[Paginator] Error on page ${session.page}: ${reason}`);
                return finish('FAILED', reason);
            }

            if (result.reachedBoundary) {
                log.info(`[Paginator] Reached cutoff ${dateKey(session.cutoff)} on page ${result.page}`);
                return finish('STOPPED_BOUNDARY');
            }

            if (result.records.length === 0) {
                log.info(`[Paginator] No new records on page ${result.page}`);
                return finish('STOPPED_NO_DATA');
            }

            log.info(`[Paginator] Collected ${result.records.length} records from page ${result.page}`);

            if (!result.hasNextPage) {
                log.info('[Paginator] No next page found');
                return finish('STOPPED_NO_NEXT_LINK');
            }

            if (session.page >= maxPages) {
                log.warning(`[Paginator] Page ceiling (${maxPages}) reached, stopping`);
                return finish('STOPPED_PAGE_LIMIT');
            }

            await this.sleep(delayMs);
            session.page++;
        }
    }

    /**
     * EXTRACTING + ACCUMULATING for one page. Accepted records go straight
     * into the session, so a boundary stop keeps the page's earlier rows.
     */
    processPage(session: HarvestSession, markup: string): PageResult {
        this.state = 'EXTRACTING';
        const $ = cheerio.load(markup);
        const extraction = this.extractor.extract($);
        session.stats.rowsSkippedUnparsable += extraction.skipped;

        const page: PageResult = {
            page: session.page,
            records: [],
            reachedBoundary: false,
            hasNextPage: false,
        };

        if (extraction.miss) {
            log.warning(`[Paginator] Page ${session.page}: ${extraction.miss.message}`);
            return page;
        }
        for (const error of extraction.errors) {
            log.debug(`[Paginator] Page ${session.page}: skipped row. ${error.message}`);
        }
        log.debug(
            `[Paginator] Page ${session.page}: strategy "${extraction.strategy}" → ` +
            `${extraction.candidates.length} candidates, ${extraction.skipped} skipped`
        );

        this.state = 'ACCUMULATING';
        for (const candidate of extraction.candidates) {
            if (session.seenDates.has(candidate.date)) {
                session.stats.rowsSkippedDuplicate++;
                continue;
            }
            if (classify(candidate.date, session.cutoff) === 'stop') {
                page.reachedBoundary = true;
                return page;
            }
            const record: IndexRecord = {
                date: candidate.date,
                close: candidate.close,
                volume: this.estimateVolume(candidate.close, candidate.date),
            };
            acceptRecord(session, record);
            page.records.push(record);
        }

        page.hasNextPage = this.nextPage.hasNextPage($);
        return page;
    }
}

export async function harvestIndexPages(options: PaginationOptions, deps: PaginationDeps): Promise<HarvestOutcome> {
    return new PaginationController(deps).run(options);
}
