/**
 * src/sources/fallbackProbe.ts
 *
 * LAST RESORT: only consulted when the paginated harvest returned nothing.
 *
 * Each alternate source is a FallbackStrategy able to produce at most one
 * data point for today. Strategies are tried in priority order until one
 * yields a record; a failing source is logged and skipped.
 *
 * The default strategy is deliberately loose: it only checks that the page
 * text mentions every keyword (e.g. "nepse" and "index") and takes the first
 * numeral in that text as the closing value.
 */

import * as cheerio from 'cheerio';
import { log } from 'crawlee';
import { startOfDay } from 'date-fns';
import { errorMessage } from '../utils/errors.js';
import { estimateVolume } from '../utils/volumeEstimate.js';
import type { FallbackStrategy, IndexRecord, PageSource, VolumeEstimator } from './types.js';

export const DEFAULT_FALLBACK_KEYWORDS = ['nepse', 'index'];

const FIRST_NUMERAL = /\d+\.?\d*/;

/** First numeral in `text` when every keyword occurs in it (case-insensitive). */
export function extractKeywordNumeral(text: string, keywords: readonly string[]): number | null {
    const lower = text.toLowerCase();
    if (!keywords.every((keyword) => lower.includes(keyword.toLowerCase()))) return null;

    const match = FIRST_NUMERAL.exec(lower);
    if (!match) return null;
    const value = Number.parseFloat(match[0]);
    return Number.isFinite(value) && value > 0 ? value : null;
}

export interface KeywordNumeralOptions {
    url: string;
    fetcher: PageSource;
    keywords?: readonly string[];
    estimateVolume?: VolumeEstimator;
}

export class KeywordNumeralStrategy implements FallbackStrategy {
    readonly name: string;
    private readonly url: string;
    private readonly fetcher: PageSource;
    private readonly keywords: readonly string[];
    private readonly estimateVolume: VolumeEstimator;

    constructor(options: KeywordNumeralOptions) {
        this.name = new URL(options.url).hostname;
        this.url = options.url;
        this.fetcher = options.fetcher;
        this.keywords = options.keywords ?? DEFAULT_FALLBACK_KEYWORDS;
        this.estimateVolume = options.estimateVolume ?? estimateVolume;
    }

    async probe(now: Date): Promise<IndexRecord | null> {
        const html = await this.fetcher.fetch(this.url, 1);
        const text = cheerio.load(html).root().text();

        const close = extractKeywordNumeral(text, this.keywords);
        if (close === null) {
            log.debug(`[Fallback] ${this.name}: no "${this.keywords.join('" + "')}" value in page text`);
            return null;
        }

        const date = startOfDay(now);
        return { date, close, volume: this.estimateVolume(close, date) };
    }
}

// ─── Probe ────────────────────────────────────────────────────────────────────

/** Returns zero or one record; never throws for a single source failing. */
export async function probeFallbackSources(
    strategies: readonly FallbackStrategy[],
    now: Date = new Date()
): Promise<IndexRecord[]> {
    for (const strategy of strategies) {
        log.info(`[Fallback] Trying alternative source: ${strategy.name}`);
        try {
            const record = await strategy.probe(now);
            if (record) {
                log.info(`[Fallback] ✓ ${strategy.name} gave a current value of ${record.close}`);
                return [record];
            }
        } catch (err) {
            log.warning(`[Fallback] ${strategy.name} failed: ${errorMessage(err)}`);
        }
    }

    log.error(`[Fallback] ✗ All ${strategies.length} alternative sources failed`);
    return [];
}
