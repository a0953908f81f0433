import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
    datasetTempPath,
    defaultDatasetFilename,
    loadDataset,
    prepareRecords,
    removeTempFile,
    resolveDatasetPath,
    writeDataset,
} from './datasetStore.js';
import { DatasetFormatError, WriteError } from './errors.js';
import type { IndexRecord } from '../sources/types.js';

let dir: string;

beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'index-harvest-'));
});

afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
});

const RECORDS: IndexRecord[] = [
    { date: new Date(2024, 0, 3), close: 2105.4, volume: 1000 },
    { date: new Date(2024, 0, 2), close: 100, volume: 4_500_000_000 },
    { date: new Date(2024, 0, 2), close: 101, volume: 2000 },
];

describe('resolveDatasetPath', () => {
    it('appends .csv when missing', () => {
        expect(resolveDatasetPath({ filename: 'series', outputDir: '/data/out' })).toBe('/data/out/series.csv');
        expect(resolveDatasetPath({ filename: 'series.CSV', outputDir: '/data/out' })).toBe('/data/out/series.CSV');
    });

    it('falls back to a dated default name', () => {
        const now = new Date(2024, 4, 9);
        expect(defaultDatasetFilename(now)).toBe('index_daily_20240509.csv');
        expect(resolveDatasetPath({ filename: '  ', outputDir: '/data/out', now })).toBe(
            '/data/out/index_daily_20240509.csv'
        );
    });
});

describe('prepareRecords', () => {
    it('keeps the first of each date and sorts oldest first', () => {
        const { rows, duplicatesRemoved } = prepareRecords(RECORDS);

        expect(duplicatesRemoved).toBe(1);
        expect(rows.map((r) => r.close)).toEqual([100, 2105.4]);
    });
});

describe('writeDataset', () => {
    it('writes exactly Date, Close, Volume with the latest date last', async () => {
        const summary = await writeDataset(RECORDS, { filename: 'series', outputDir: dir });

        const content = await fs.readFile(path.join(dir, 'series.csv'), 'utf-8');
        expect(content).toBe(
            'Date,Close,Volume\n' +
            '01/02/2024,100,"4,500,000,000.00"\n' +
            '01/03/2024,2105.4,"1,000.00"\n'
        );
        expect(summary).toMatchObject({
            path: path.join(dir, 'series.csv'),
            count: 2,
            duplicatesRemoved: 1,
            invalidDropped: 0,
            firstDate: '01/02/2024',
            lastDate: '01/03/2024',
        });
        expect(summary.tail[1]).toEqual({ Date: '01/03/2024', Close: '2105.4', Volume: '1,000.00' });
    });

    it('leaves no temp file behind', async () => {
        await writeDataset(RECORDS, { filename: 'series.csv', outputDir: dir });

        expect(await fs.readdir(dir)).toEqual(['series.csv']);
    });

    it('replaces an earlier file instead of merging', async () => {
        await writeDataset(RECORDS, { filename: 'series', outputDir: dir });
        await writeDataset([{ date: new Date(2024, 1, 1), close: 50, volume: 10 }], { filename: 'series', outputDir: dir });

        const content = await fs.readFile(path.join(dir, 'series.csv'), 'utf-8');
        expect(content).toBe('Date,Close,Volume\n02/01/2024,50,10.00\n');
    });

    it('drops invalid rows and reports them', async () => {
        const summary = await writeDataset(
            [...RECORDS, { date: new Date(2024, 0, 4), close: -1, volume: 5 }],
            { filename: 'series', outputDir: dir }
        );

        expect(summary.count).toBe(2);
        expect(summary.invalidDropped).toBe(1);
    });

    it('reports an output directory it cannot create as a WriteError', async () => {
        await fs.writeFile(path.join(dir, 'blocker'), 'not a directory', 'utf-8');

        const err = await writeDataset(RECORDS, { filename: 'series', outputDir: path.join(dir, 'blocker', 'sub') }).catch(
            (e: unknown) => e
        );

        expect(err).toBeInstanceOf(WriteError);
        expect(err).toMatchObject({ path: path.join(dir, 'blocker', 'sub', 'series.csv') });
        expect((await fs.readdir(dir)).sort()).toEqual(['blocker']);
    });

    it('reports a failed rename as a WriteError and removes the temp file', async () => {
        await fs.mkdir(path.join(dir, 'series.csv'));

        await expect(writeDataset(RECORDS, { filename: 'series', outputDir: dir })).rejects.toBeInstanceOf(WriteError);
        expect(await fs.readdir(dir)).toEqual(['series.csv']);
    });

    it('refuses to write an empty dataset', async () => {
        await expect(writeDataset([], { filename: 'empty', outputDir: dir })).rejects.toBeInstanceOf(WriteError);
        expect(await fs.readdir(dir)).toEqual([]);
    });
});

describe('removeTempFile', () => {
    it('never throws, even when the path cannot be inspected', async () => {
        await fs.writeFile(path.join(dir, 'blocker'), 'x', 'utf-8');
        const tmp = datasetTempPath(path.join(dir, 'blocker', 'series.csv'));

        await expect(removeTempFile(tmp)).resolves.toBeUndefined();
    });
});

describe('loadDataset', () => {
    it('reads back what writeDataset wrote', async () => {
        const summary = await writeDataset(RECORDS, { filename: 'series', outputDir: dir });

        const records = await loadDataset(summary.path);

        expect(records).toEqual([
            { date: new Date(2024, 0, 2), close: 100, volume: 4_500_000_000 },
            { date: new Date(2024, 0, 3), close: 2105.4, volume: 1000 },
        ]);
    });

    it('rejects a file with the wrong header', async () => {
        const file = path.join(dir, 'other.csv');
        await fs.writeFile(file, 'Date,Price\n01/02/2024,100\n', 'utf-8');

        await expect(loadDataset(file)).rejects.toBeInstanceOf(DatasetFormatError);
    });

    it('names the line of a bad row', async () => {
        const file = path.join(dir, 'bad.csv');
        await fs.writeFile(file, 'Date,Close,Volume\n01/02/2024,100,"1,000.00"\n2024-01-03,101,"1,000.00"\n', 'utf-8');

        await expect(loadDataset(file)).rejects.toThrow(/^Line 3: /);
    });
});
