import type { Env } from './envSchema.js';

/** Everything one harvest run needs, resolved from the environment and CLI. */
export interface HarvestConfig {
    baseUrl: string;
    pageParam: string;
    years: number;
    maxPages: number;
    minRows: number;
    politenessDelayMs: number;
    timeoutMs: number;
    userAgent: string;
    proxyUrl?: string;
    fallback: {
        urls: string[];
        keywords: string[];
        timeoutMs: number;
    };
    output: {
        filename?: string;
        outputDir?: string;
    };
}

export interface HarvestOverrides {
    years?: number;
    filename?: string;
}

export function resolveHarvestConfig(env: Env, overrides: HarvestOverrides = {}): HarvestConfig {
    return {
        baseUrl: env.HARVEST_BASE_URL,
        pageParam: env.HARVEST_PAGE_PARAM,
        years: overrides.years ?? env.HARVEST_YEARS,
        maxPages: env.HARVEST_MAX_PAGES,
        minRows: env.HARVEST_MIN_ROWS,
        politenessDelayMs: env.HARVEST_DELAY_MS,
        timeoutMs: env.HARVEST_TIMEOUT_MS,
        userAgent: env.HARVEST_USER_AGENT,
        proxyUrl: env.PROXY_URL,
        fallback: {
            urls: env.FALLBACK_URLS,
            keywords: env.FALLBACK_KEYWORDS,
            timeoutMs: env.FALLBACK_TIMEOUT_MS,
        },
        output: {
            filename: overrides.filename,
            outputDir: env.HARVEST_OUTPUT_DIR,
        },
    };
}
