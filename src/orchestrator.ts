/**
 * src/orchestrator.ts
 *
 * HARVEST ORCHESTRATOR
 *
 * Runs one collection in a strict cascade:
 *
 *   PRIMARY  → paginated listing harvest (PaginationController)
 *   FALLBACK → alternate sources, only when the primary returned nothing
 *
 * The caller persists the records (utils/datasetStore.ts) whenever there are
 * any; with none, no file is touched. Only unexpected programming errors
 * escape from here.
 */

import { log } from 'crawlee';
import type { HarvestConfig } from './config/harvest.js';
import { RecordExtractor } from './extractors/indexTable.js';
import type { NextPageDetector } from './extractors/nextPage.js';
import { PaginationController, type HarvestOutcome } from './paginationController.js';
import { KeywordNumeralStrategy, probeFallbackSources } from './sources/fallbackProbe.js';
import { PageFetcher } from './sources/pageFetcher.js';
import type { FallbackStrategy, IndexRecord, PageSource } from './sources/types.js';

export interface CollectionResult {
    source: 'primary' | 'fallback';
    records: IndexRecord[];
    harvest: HarvestOutcome;
}

export interface OrchestratorDeps {
    primaryFetcher?: PageSource;
    fallbackStrategies?: readonly FallbackStrategy[];
    nextPage?: NextPageDetector;
    sleep?: (ms: number) => Promise<void>;
    now?: () => Date;
}

export function buildFallbackStrategies(config: HarvestConfig): FallbackStrategy[] {
    const fetcher = new PageFetcher({
        timeoutMs: config.fallback.timeoutMs,
        userAgent: config.userAgent,
        proxyUrl: config.proxyUrl,
        label: 'Fallback',
    });
    return config.fallback.urls.map(
        (url) => new KeywordNumeralStrategy({ url, fetcher, keywords: config.fallback.keywords })
    );
}

export async function collectIndexRecords(config: HarvestConfig, deps: OrchestratorDeps = {}): Promise<CollectionResult> {
    const now = deps.now ?? (() => new Date());

    // ── PRIMARY ──────────────────────────────────────────────────────────────
    const fetcher = deps.primaryFetcher ?? new PageFetcher({
        timeoutMs: config.timeoutMs,
        userAgent: config.userAgent,
        pageParam: config.pageParam,
        proxyUrl: config.proxyUrl,
    });
    const controller = new PaginationController({
        fetcher,
        extractor: new RecordExtractor({ minRows: config.minRows }),
        nextPage: deps.nextPage,
        sleep: deps.sleep,
        now,
    });
    const harvest = await controller.run({
        baseUrl: config.baseUrl,
        years: config.years,
        maxPages: config.maxPages,
        politenessDelayMs: config.politenessDelayMs,
    });

    let records: IndexRecord[] = harvest.records;
    let source: 'primary' | 'fallback' = 'primary';

    // ── FALLBACK ─────────────────────────────────────────────────────────────
    if (records.length === 0) {
        log.warning(`[Orchestrator] ⚠ Main source gave no records (${harvest.state}), trying alternatives...`);
        const strategies = deps.fallbackStrategies ?? buildFallbackStrategies(config);
        records = await probeFallbackSources(strategies, now());
        source = 'fallback';
    }

    if (records.length === 0) {
        log.error('[Orchestrator] ✗ Failed to collect data from all sources');
    }
    return { source, records, harvest };
}
