/**
 * src/extractors/indexTable.ts
 *
 * Cheerio extractor for the daily index listing.
 *
 * Rows are located through an ordered list of strategies (see
 * IndexListingSelectors.rows). Each strategy reports the rows it found;
 * the first one reporting more than `minRows` rows wins. Within the winning
 * row set the date is read from cell 1 and the price from cell 2.
 *
 * Any row that does not convert cleanly is skipped and reported as a
 * ParseError. Nothing in here throws on bad markup.
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { AnyNode } from 'domhandler';
import { isValid, parse } from 'date-fns';
import { DEFAULT_MIN_ROWS, IndexListingSelectors } from '../config/indexListing.js';
import { ParseError, StructuralMiss } from '../utils/errors.js';
import type { IndexCandidate, RawIndexRow } from '../sources/types.js';

const { rows: RowSelectors, columns: Columns } = IndexListingSelectors;

// ─── Strategies ───────────────────────────────────────────────────────────────

/** Cell texts of each data row, header rows already removed. */
export type CellRows = string[][];

export interface RowStrategy {
    readonly name: string;
    collect($: CheerioAPI, minRows: number): CellRows;
}

function cellTexts($: CheerioAPI, row: AnyNode): string[] {
    return $(row)
        .find(RowSelectors.cell)
        .map((_, cell) => $(cell).text().trim())
        .get();
}

/**
 * Each matched container is a table-like block whose first <tr> is the
 * header. Returns the first block with enough rows, else the largest one.
 */
export function containerStrategy(selector: string): RowStrategy {
    return {
        name: selector,
        collect($, minRows) {
            let best: CellRows = [];
            for (const container of $(selector).toArray()) {
                const rows = $(container).find('tr').toArray().slice(1);
                const cells = rows.map((row) => cellTexts($, row));
                if (cells.length > minRows) return cells;
                if (cells.length > best.length) best = cells;
            }
            return best;
        },
    };
}

/** Every matched row counts; rows without a <td> are headers. */
export function bareRowStrategy(selector: string): RowStrategy {
    return {
        name: selector,
        collect($) {
            return $(selector)
                .toArray()
                .filter((row) => $(row).find('td').length > 0)
                .map((row) => cellTexts($, row));
        },
    };
}

export const DEFAULT_ROW_STRATEGIES: readonly RowStrategy[] = [
    ...RowSelectors.containers.map(containerStrategy),
    ...RowSelectors.bareRows.map(bareRowStrategy),
];

// ─── Field parsing ────────────────────────────────────────────────────────────

const LISTING_DATE_SHAPE = /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/;
const DECIMAL_NUMERAL = /^(\d+\.?\d*|\.\d+)$/;

/** Parses `YYYY/MM/DD` (single-digit month/day allowed) into a local calendar date, or null. */
export function parseListingDate(text: string, referenceDate: Date = new Date()): Date | null {
    const match = LISTING_DATE_SHAPE.exec(text.trim());
    if (!match) return null;
    const [, year, month, day] = match;
    const padded = `${year}/${month.padStart(2, '0')}/${day.padStart(2, '0')}`;
    const date = parse(padded, 'yyyy/MM/dd', referenceDate);
    return isValid(date) ? date : null;
}

/** Parses a grouped decimal such as `2,481.35`. Zero and negatives are rejected. */
export function parsePrice(text: string): number | null {
    const cleaned = text.replace(/,/g, '').trim();
    if (!DECIMAL_NUMERAL.test(cleaned)) return null;
    const value = Number.parseFloat(cleaned);
    return Number.isFinite(value) && value > 0 ? value : null;
}

// ─── Extraction ───────────────────────────────────────────────────────────────

export interface RowSelection {
    /** Winning strategy name, or null on a structural miss. */
    strategy: string | null;
    rows: CellRows;
    miss?: StructuralMiss;
}

export interface RawExtraction {
    strategy: string | null;
    rows: RawIndexRow[];
    dropped: ParseError[];
    miss?: StructuralMiss;
}

export interface ExtractionResult {
    strategy: string | null;
    candidates: IndexCandidate[];
    /** Rows dropped for too few cells, empty text, or a failed parse. */
    skipped: number;
    errors: ParseError[];
    miss?: StructuralMiss;
}

export interface RecordExtractorOptions {
    minRows?: number;
    strategies?: readonly RowStrategy[];
}

export class RecordExtractor {
    readonly minRows: number;
    private readonly strategies: readonly RowStrategy[];

    constructor(options: RecordExtractorOptions = {}) {
        this.minRows = options.minRows ?? DEFAULT_MIN_ROWS;
        this.strategies = options.strategies ?? DEFAULT_ROW_STRATEGIES;
    }

    selectRows($: CheerioAPI): RowSelection {
        let best = 0;
        for (const strategy of this.strategies) {
            const rows = strategy.collect($, this.minRows);
            if (rows.length > this.minRows) {
                return { strategy: strategy.name, rows };
            }
            best = Math.max(best, rows.length);
        }
        return { strategy: null, rows: [], miss: new StructuralMiss(best, this.minRows) };
    }

    /** Raw (date, price) texts in document order; short or blank rows dropped. */
    extractRaw(markup: string | CheerioAPI): RawExtraction {
        const $ = typeof markup === 'string' ? cheerio.load(markup) : markup;
        const selection = this.selectRows($);
        const rows: RawIndexRow[] = [];
        const dropped: ParseError[] = [];

        for (const cells of selection.rows) {
            if (cells.length < Columns.minCells) {
                dropped.push(new ParseError('cells', cells.join(' | ')));
                continue;
            }
            const dateText = cells[Columns.date] ?? '';
            const priceText = cells[Columns.price] ?? '';
            if (!dateText || !priceText) {
                dropped.push(new ParseError(dateText ? 'price' : 'date', ''));
                continue;
            }
            rows.push({ dateText, priceText });
        }

        return { strategy: selection.strategy, rows, dropped, miss: selection.miss };
    }

    extract(markup: string | CheerioAPI): ExtractionResult {
        const raw = this.extractRaw(markup);
        const candidates: IndexCandidate[] = [];
        const errors = [...raw.dropped];

        for (const row of raw.rows) {
            const date = parseListingDate(row.dateText);
            const close = parsePrice(row.priceText);
            if (!date) errors.push(new ParseError('date', row.dateText));
            else if (close === null) errors.push(new ParseError('price', row.priceText));
            else candidates.push({ date, close });
        }

        return { strategy: raw.strategy, candidates, skipped: errors.length, errors, miss: raw.miss };
    }
}
