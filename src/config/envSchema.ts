import { z } from 'zod';

const numFromEnv = z.preprocess((v) => {
    if (v === undefined || v === '') return undefined;
    if (typeof v === 'string') return Number(v);
    return v;
}, z.number().finite());

const positiveIntFromEnv = numFromEnv.pipe(z.number().int().positive());

const csvList = z.preprocess((v) => {
    if (v === undefined) return undefined;
    if (typeof v === 'string') {
        return v.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
    }
    return v;
}, z.array(z.string()));

const optionalString = z.preprocess((v) => {
    if (typeof v === 'string' && v.trim() === '') return undefined;
    return v;
}, z.string().optional());

export const LOG_LEVEL_NAMES = ['ERROR', 'WARNING', 'INFO', 'DEBUG'] as const;
export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

const logLevel = z.preprocess((v) => {
    if (typeof v !== 'string' || v.trim() === '') return undefined;
    return v.trim().toUpperCase();
}, z.enum(LOG_LEVEL_NAMES).default('INFO'));

export const DEFAULT_USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36';

export const envSchema = z.object({
    HARVEST_BASE_URL: z.string().url().default('https://merolagani.com/Indices.aspx'),
    HARVEST_PAGE_PARAM: z.string().min(1).default('page'),
    HARVEST_YEARS: positiveIntFromEnv.default(2),
    HARVEST_MAX_PAGES: positiveIntFromEnv.default(30),
    HARVEST_MIN_ROWS: numFromEnv.pipe(z.number().int().nonnegative()).default(5),
    HARVEST_DELAY_MS: numFromEnv.pipe(z.number().nonnegative()).default(1500),
    HARVEST_TIMEOUT_MS: positiveIntFromEnv.default(30_000),
    HARVEST_USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
    HARVEST_OUTPUT_DIR: optionalString,

    FALLBACK_URLS: csvList.pipe(z.array(z.string().url())).default([
        'https://www.sharesansar.com/today-share-price',
        'https://nepsealpha.com/trading/1',
    ]),
    FALLBACK_KEYWORDS: csvList.pipe(z.array(z.string()).min(1)).default(['nepse', 'index']),
    FALLBACK_TIMEOUT_MS: positiveIntFromEnv.default(20_000),

    PROXY_URL: optionalString.pipe(z.string().url().optional()),

    CRAWLEE_LOG_LEVEL: logLevel,
}).passthrough();

export type Env = z.infer<typeof envSchema>;
