/**
 * src/utils/datasetStore.ts
 *
 * Persistence for the harvested series.
 *
 * WRITE ORDER (matters)
 * ─────────────────────
 *  1. drop repeated dates, first occurrence wins
 *  2. sort ascending by date (oldest first, latest at the bottom)
 *  3. validate each row and project to exactly Date, Close, Volume
 *  4. serialize and write atomically (temp file + rename)
 *
 * The file is rebuilt from scratch every run and never merged with an
 * earlier one. Its shape is the contract for downstream consumers:
 *
 *   Date,Close,Volume
 *   01/02/2024,2105.4,"4,512,345.67"
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { log } from 'crawlee';
import { parse as parseCSV } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { compareAsc, format, isValid, parse } from 'date-fns';
import { z } from 'zod';
import { dateKey, dedupeByDate } from './dedup.js';
import { DatasetFormatError, WriteError, errorMessage } from './errors.js';
import { formatVolume, parseVolume } from './volumeEstimate.js';
import type { IndexRecord } from '../sources/types.js';

export const DATASET_COLUMNS = ['Date', 'Close', 'Volume'] as const;

const US_DATE = /^\d{2}\/\d{2}\/\d{4}$/;

const DatasetRowSchema = z.object({
    Date: z.string().regex(US_DATE),
    Close: z.number().finite().positive(),
    Volume: z.number().finite().positive(),
});

type DatasetRow = z.infer<typeof DatasetRowSchema>;

/** One serialized row, exactly as it appears in the file. */
export interface DatasetCsvRow {
    Date: string;
    Close: string;
    Volume: string;
}

export interface DatasetSummary {
    path: string;
    count: number;
    duplicatesRemoved: number;
    invalidDropped: number;
    firstDate: string;
    lastDate: string;
    head: DatasetCsvRow[];
    tail: DatasetCsvRow[];
}

export interface WriteDatasetOptions {
    filename?: string;
    outputDir?: string;
    now?: Date;
    previewSize?: number;
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

export function defaultDatasetFilename(now: Date = new Date()): string {
    return `index_daily_${format(now, 'yyyyMMdd')}.csv`;
}

export function resolveDatasetPath(options: WriteDatasetOptions = {}): string {
    const raw = options.filename?.trim() || defaultDatasetFilename(options.now);
    const filename = raw.toLowerCase().endsWith('.csv') ? raw : `${raw}.csv`;
    return path.resolve(options.outputDir ?? process.cwd(), filename);
}

/** Dedupe (first wins) then sort oldest → newest. */
export function prepareRecords(records: readonly IndexRecord[]): { rows: IndexRecord[]; duplicatesRemoved: number } {
    const { unique, removed } = dedupeByDate(records);
    const rows = [...unique].sort((a, b) => compareAsc(a.date, b.date));
    return { rows, duplicatesRemoved: removed };
}

/** Temp file written beside `target` and renamed over it. */
export function datasetTempPath(target: string): string {
    return `${target}.${process.pid}.tmp`;
}

/** Best-effort; a failed cleanup never hides the write error that caused it. */
export async function removeTempFile(tmp: string): Promise<void> {
    try {
        await fs.rm(tmp, { force: true });
    } catch (err) {
        log.debug(`[Dataset] Could not remove ${tmp}: ${errorMessage(err)}`);
    }
}

function toCsvRow(row: DatasetRow): DatasetCsvRow {
    return { Date: row.Date, Close: String(row.Close), Volume: formatVolume(row.Volume) };
}

// ─── Write ────────────────────────────────────────────────────────────────────

export async function writeDataset(
    records: readonly IndexRecord[],
    options: WriteDatasetOptions = {}
): Promise<DatasetSummary> {
    if (records.length === 0) {
        throw new WriteError('No data to save');
    }

    const target = resolveDatasetPath(options);
    const { rows, duplicatesRemoved } = prepareRecords(records);
    log.info(`[Dataset] Removed ${duplicatesRemoved} duplicate records`);

    const valid: DatasetRow[] = [];
    for (const record of rows) {
        const parsed = DatasetRowSchema.safeParse({
            Date: dateKey(record.date),
            Close: record.close,
            Volume: record.volume,
        });
        if (parsed.success) {
            valid.push(parsed.data);
        } else {
            log.warning(`[Dataset] Dropping invalid row for ${dateKey(record.date)}: ${parsed.error.issues[0]?.message}`);
        }
    }
    if (valid.length === 0) {
        throw new WriteError('No valid rows to save', { path: target });
    }

    const csv = stringify(valid.map(toCsvRow), { header: true, columns: [...DATASET_COLUMNS] });

    try {
        await fs.mkdir(path.dirname(target), { recursive: true });
    } catch (err) {
        throw new WriteError(`Cannot create ${path.dirname(target)}: ${errorMessage(err)}`, { path: target, cause: err });
    }

    const tmp = datasetTempPath(target);
    try {
        await fs.writeFile(tmp, csv, 'utf-8');
        await fs.rename(tmp, target);
    } catch (err) {
        await removeTempFile(tmp);
        throw new WriteError(`Error saving CSV to ${target}: ${errorMessage(err)}`, { path: target, cause: err });
    }

    log.info(`[Dataset] Data saved to ${target}`);

    const previewSize = options.previewSize ?? 3;
    return {
        path: target,
        count: valid.length,
        duplicatesRemoved,
        invalidDropped: rows.length - valid.length,
        firstDate: valid[0].Date,
        lastDate: valid[valid.length - 1].Date,
        head: valid.slice(0, previewSize).map(toCsvRow),
        tail: valid.slice(-previewSize).map(toCsvRow),
    };
}

// ─── Read back ────────────────────────────────────────────────────────────────

const CsvRowSchema = z.object({
    Date: z.string().regex(US_DATE),
    Close: z.string(),
    Volume: z.string(),
});

export async function loadDataset(filePath: string): Promise<IndexRecord[]> {
    const content = await fs.readFile(filePath, 'utf-8');

    let rows: string[][];
    try {
        rows = parseCSV(content, { skip_empty_lines: true });
    } catch (err) {
        throw new DatasetFormatError(`Unparseable CSV: ${errorMessage(err)}`, filePath, { cause: err });
    }

    const [header, ...body] = rows;
    if (!header || header.join(',') !== DATASET_COLUMNS.join(',')) {
        throw new DatasetFormatError(`Expected header ${DATASET_COLUMNS.join(',')}`, filePath);
    }

    return body.map((cells, i) => {
        const line = i + 2;
        const parsed = CsvRowSchema.safeParse({ Date: cells[0], Close: cells[1], Volume: cells[2] });
        if (!parsed.success) {
            throw new DatasetFormatError(`Line ${line}: ${parsed.error.issues[0]?.message}`, filePath);
        }

        const date = parse(parsed.data.Date, 'MM/dd/yyyy', new Date());
        const close = Number(parsed.data.Close);
        const volume = parseVolume(parsed.data.Volume);
        if (!isValid(date) || !(close > 0) || !(volume > 0)) {
            throw new DatasetFormatError(`Line ${line}: invalid Date, Close or Volume`, filePath);
        }
        return { date, close, volume };
    });
}
