/**
 * src/sources/pageFetcher.ts
 *
 * One HTTP GET per listing page.
 *
 * URL convention:
 *   page 1   → the bare listing URL
 *   page N>1 → the same URL with `?<pageParam>=N` (best-effort; the listing's
 *              real pagination scheme is not guaranteed)
 *
 * Transport:
 *   • Direct: built-in fetch with a browser-like User-Agent and a hard timeout.
 *   • PROXY_URL set: got-scraping through that proxy, retries disabled.
 *
 * Any non-2xx status, network error or timeout becomes a FetchError. There
 * are no retries at this layer; the paginator decides what a failure means.
 */

import { log } from 'crawlee';
import { DEFAULT_USER_AGENT } from '../config/envSchema.js';
import { FetchError, errorMessage } from '../utils/errors.js';
import type { PageSource } from './types.js';

export interface PageFetcherOptions {
    timeoutMs: number;
    userAgent?: string;
    pageParam?: string;
    proxyUrl?: string;
    /** Log prefix, e.g. "Fetcher" or "Fallback". */
    label?: string;
}

export function buildPageUrl(baseUrl: string, pageIndex: number, pageParam = 'page'): string {
    if (pageIndex <= 1) return baseUrl;
    const url = new URL(baseUrl);
    url.searchParams.set(pageParam, String(pageIndex));
    return url.toString();
}

function describeFailure(err: unknown, timeoutMs: number): string {
    if (err instanceof Error && err.name === 'TimeoutError') {
        return `timed out after ${timeoutMs}ms`;
    }
    return errorMessage(err);
}

export class PageFetcher implements PageSource {
    private readonly timeoutMs: number;
    private readonly pageParam: string;
    private readonly proxyUrl?: string;
    private readonly label: string;
    private readonly headers: Record<string, string>;

    constructor(options: PageFetcherOptions) {
        this.timeoutMs = options.timeoutMs;
        this.pageParam = options.pageParam ?? 'page';
        this.proxyUrl = options.proxyUrl;
        this.label = options.label ?? 'Fetcher';
        this.headers = {
            'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
            'Accept': 'text/html,application/xhtml+xml',
            'Accept-Language': 'en-US,en;q=0.9',
        };
    }

    async fetch(url: string, pageIndex: number): Promise<string> {
        const target = buildPageUrl(url, pageIndex, this.pageParam);
        log.debug(`[${this.label}] GET ${target}${this.proxyUrl ? ' (proxy)' : ''}`);
        return this.proxyUrl ? this.fetchViaProxy(target, this.proxyUrl) : this.fetchDirect(target);
    }

    private async fetchDirect(url: string): Promise<string> {
        let resp: Response;
        try {
            resp = await fetch(url, {
                headers: this.headers,
                signal: AbortSignal.timeout(this.timeoutMs),
            });
        } catch (err) {
            throw new FetchError(`GET ${url} failed: ${describeFailure(err, this.timeoutMs)}`, url, { cause: err });
        }

        if (!resp.ok) {
            await resp.body?.cancel();
            throw new FetchError(`GET ${url} returned HTTP ${resp.status}`, url, { status: resp.status });
        }

        try {
            return await resp.text();
        } catch (err) {
            throw new FetchError(`GET ${url} body read failed: ${describeFailure(err, this.timeoutMs)}`, url, {
                status: resp.status,
                cause: err,
            });
        }
    }

    private async fetchViaProxy(url: string, proxyUrl: string): Promise<string> {
        const { gotScraping } = await import('got-scraping');

        let statusCode: number;
        let body: string;
        try {
            const response = await gotScraping({
                url,
                proxyUrl,
                headers: this.headers,
                timeout: { request: this.timeoutMs },
                retry: { limit: 0 },
                throwHttpErrors: false,
            });
            statusCode = response.statusCode;
            body = response.body;
        } catch (err) {
            throw new FetchError(`GET ${url} via proxy failed: ${errorMessage(err)}`, url, { cause: err });
        }

        if (statusCode < 200 || statusCode >= 300) {
            throw new FetchError(`GET ${url} via proxy returned HTTP ${statusCode}`, url, { status: statusCode });
        }
        return body;
    }
}
