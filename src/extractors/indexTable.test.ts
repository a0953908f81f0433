import { describe, it, expect } from 'vitest';
import * as cheerio from 'cheerio';
import {
    RecordExtractor,
    bareRowStrategy,
    containerStrategy,
    parseListingDate,
    parsePrice,
    type RowStrategy,
} from './indexTable.js';
import { ParseError, StructuralMiss } from '../utils/errors.js';

const HEADER = '<tr><th>#</th><th>Date</th><th>Index</th><th>Change</th></tr>';

function row(n: number, date: string, price: string): string {
    return `<tr><td>${n}</td><td>${date}</td><td>${price}</td><td>0.35</td></tr>`;
}

function table(rows: string[], attrs = ''): string {
    return `<table${attrs}>${HEADER}${rows.join('')}</table>`;
}

function page(body: string): string {
    return `<html><body>${body}</body></html>`;
}

const SIX_ROWS = [
    row(1, '2024/01/10', '2,105.40'),
    row(2, '2024/01/09', '2,098.12'),
    row(3, '2024/01/08', '2,101.00'),
    row(4, '2024/01/07', '2,087.55'),
    row(5, '2024/01/04', '2,079.31'),
    row(6, '2024/01/03', '2,066.90'),
];

describe('parseListingDate', () => {
    it('parses YYYY/MM/DD into a local calendar date', () => {
        expect(parseListingDate('2024/01/05')).toEqual(new Date(2024, 0, 5));
    });

    it('accepts single-digit month and day', () => {
        expect(parseListingDate('2024/1/5')).toEqual(new Date(2024, 0, 5));
    });

    it('rejects impossible and malformed dates', () => {
        expect(parseListingDate('2024/13/01')).toBeNull();
        expect(parseListingDate('2023/02/29')).toBeNull();
        expect(parseListingDate('01/05/2024')).toBeNull();
        expect(parseListingDate('N/A')).toBeNull();
    });
});

describe('parsePrice', () => {
    it('strips digit grouping', () => {
        expect(parsePrice('2,481.35')).toBe(2481.35);
        expect(parsePrice('1,234')).toBe(1234);
    });

    it('rejects zero, negatives and text', () => {
        expect(parsePrice('0')).toBeNull();
        expect(parsePrice('-12.5')).toBeNull();
        expect(parsePrice('N/A')).toBeNull();
        expect(parsePrice('')).toBeNull();
    });
});

describe('RecordExtractor', () => {
    it('reads date from cell 1 and price from cell 2 in document order', () => {
        const result = new RecordExtractor().extract(page(table(SIX_ROWS)));

        expect(result.strategy).toBe('table');
        expect(result.miss).toBeUndefined();
        expect(result.skipped).toBe(0);
        expect(result.candidates).toHaveLength(6);
        expect(result.candidates[0]).toEqual({ date: new Date(2024, 0, 10), close: 2105.4 });
        expect(result.candidates[5]).toEqual({ date: new Date(2024, 0, 3), close: 2066.9 });
    });

    it('skips short, blank and unparsable rows and counts them', () => {
        const rows = [
            ...SIX_ROWS,
            '<tr><td>7</td><td>2024/01/02</td></tr>',
            row(8, '', '2,050.00'),
            row(9, '2024/01/01', 'N/A'),
            row(10, 'not a date', '2,040.00'),
        ];
        const result = new RecordExtractor().extract(page(table(rows)));

        expect(result.candidates).toHaveLength(6);
        expect(result.skipped).toBe(4);
        expect(result.errors.every((e) => e instanceof ParseError)).toBe(true);
        expect(result.errors.map((e) => e.field)).toEqual(['cells', 'date', 'price', 'date']);
        expect(result.errors[2].message).toBe('Unparsable price: "N/A"');
    });

    it('keeps extracting valid rows that follow a skipped one', () => {
        const rows = [
            row(1, '2024/01/10', '2,105.40'),
            '<tr><td>2</td><td>2024/01/09</td></tr>',
            row(3, '2024/01/08', '2,101.00'),
            row(4, '', ''),
            row(5, '2024/01/07', '2,087.55'),
            row(6, '2024/01/06', 'N/A'),
            row(7, '2024/01/05', '2,079.31'),
            row(8, '2024/1/4', '2,070.00'),
        ];
        const result = new RecordExtractor().extract(page(table(rows)));

        expect(result.skipped).toBe(3);
        expect(result.candidates.map((c) => c.date)).toEqual([
            new Date(2024, 0, 10),
            new Date(2024, 0, 8),
            new Date(2024, 0, 7),
            new Date(2024, 0, 5),
            new Date(2024, 0, 4),
        ]);
        expect(result.candidates.map((c) => c.close)).toEqual([2105.4, 2101, 2087.55, 2079.31, 2070]);
    });

    it('takes the first table with more than minRows rows', () => {
        const small = table([row(1, '2023/12/01', '1,900.00')]);
        const result = new RecordExtractor().extract(page(small + table(SIX_ROWS)));

        expect(result.strategy).toBe('table');
        expect(result.candidates).toHaveLength(6);
        expect(result.candidates[0].close).toBe(2105.4);
    });

    it('reports a structural miss when no strategy clears the threshold', () => {
        const result = new RecordExtractor().extract(page(table(SIX_ROWS.slice(0, 5))));

        expect(result.strategy).toBeNull();
        expect(result.candidates).toEqual([]);
        expect(result.miss).toBeInstanceOf(StructuralMiss);
        expect(result.miss?.bestRowCount).toBe(5);
        expect(result.miss?.message).toBe('No selector strategy matched more than 5 rows (best: 5)');
    });

    it('honours a lower minRows', () => {
        const result = new RecordExtractor({ minRows: 2 }).extract(page(table(SIX_ROWS.slice(0, 3))));

        expect(result.candidates).toHaveLength(3);
    });

    it('falls through the cascade to the first strategy with enough rows', () => {
        const calls: string[] = [];
        const fake = (name: string, rows: string[][]): RowStrategy => ({
            name,
            collect() {
                calls.push(name);
                return rows;
            },
        });
        const enough = Array.from({ length: 6 }, (_, i) => [String(i), `2024/02/0${i + 1}`, '1,000']);
        const extractor = new RecordExtractor({
            strategies: [fake('first', [['1', '2024/01/01', '1']]), fake('second', enough), fake('third', enough)],
        });

        const result = extractor.extract(page(''));

        expect(result.strategy).toBe('second');
        expect(calls).toEqual(['first', 'second']);
        expect(result.candidates).toHaveLength(6);
    });
});

describe('row strategies', () => {
    it('containerStrategy drops the header row of each block', () => {
        const $ = cheerio.load(page(table(SIX_ROWS, ' class="data-table"')));
        const rows = containerStrategy('[class*="table"]').collect($, 5);

        expect(rows).toHaveLength(6);
        expect(rows[0]).toEqual(['1', '2024/01/10', '2,105.40', '0.35']);
    });

    it('bareRowStrategy ignores rows without data cells', () => {
        const $ = cheerio.load(page(table(SIX_ROWS.slice(0, 2))));
        const rows = bareRowStrategy('tr').collect($, 5);

        expect(rows).toEqual([
            ['1', '2024/01/10', '2,105.40', '0.35'],
            ['2', '2024/01/09', '2,098.12', '0.35'],
        ]);
    });
});
