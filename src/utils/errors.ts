/**
 * src/utils/errors.ts
 *
 * Error taxonomy for a harvest run.
 *
 *   FetchError         → one page could not be retrieved (HTTP status, network, timeout)
 *   ParseError         → one listing row could not be converted (reported, never thrown)
 *   StructuralMiss     → no selector strategy matched enough rows on a page
 *   WriteError         → the dataset could not be persisted (empty input or I/O)
 *   DatasetFormatError → a persisted dataset could not be read back
 */

export class FetchError extends Error {
    readonly url: string;
    /** HTTP status when the server answered, undefined for network failures. */
    readonly status?: number;

    constructor(message: string, url: string, options: { status?: number; cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.name = 'FetchError';
        this.url = url;
        this.status = options.status;
    }
}

export class ParseError extends Error {
    readonly field: 'cells' | 'date' | 'price';
    readonly text: string;

    constructor(field: 'cells' | 'date' | 'price', text: string) {
        super(field === 'cells' ? `Row has too few cells: "${text}"` : `Unparsable ${field}: "${text}"`);
        this.name = 'ParseError';
        this.field = field;
        this.text = text;
    }
}

export class StructuralMiss extends Error {
    readonly bestRowCount: number;

    constructor(bestRowCount: number, minRows: number) {
        super(`No selector strategy matched more than ${minRows} rows (best: ${bestRowCount})`);
        this.name = 'StructuralMiss';
        this.bestRowCount = bestRowCount;
    }
}

export class WriteError extends Error {
    readonly path?: string;

    constructor(message: string, options: { path?: string; cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.name = 'WriteError';
        this.path = options.path;
    }
}

export class DatasetFormatError extends Error {
    readonly path: string;

    constructor(message: string, path: string, options: { cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.name = 'DatasetFormatError';
        this.path = path;
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
