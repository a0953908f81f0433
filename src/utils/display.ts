import chalk from 'chalk';
import type { DatasetCsvRow, DatasetSummary } from './datasetStore.js';

function buildBox(lines: string[]): string {
    const width = Math.max(...lines.map((line) => line.length), 35);
    const top = `┌${'─'.repeat(width + 2)}┐`;
    const body = lines.map((line) => `│ ${line.padEnd(width)} │`).join('\n');
    const bottom = `└${'─'.repeat(width + 2)}┘`;
    return `${top}\n${body}\n${bottom}`;
}

export function printBanner(years: number): void {
    const banner = [
        '╔══════════════════════════════════════╗',
        '║   Daily Index Close & Volume Harvest ║',
        '╚══════════════════════════════════════╝',
    ].join('\n');

    console.log(chalk.cyan(banner));
    console.log(chalk.dim(`Collecting the last ${years} year(s) of daily data`));
    console.log(chalk.dim('Format: Date,Close,Volume (latest date at bottom)'));
    console.log();
}

/** Column-aligned rows, header first, e.g. for the head/tail preview. */
export function formatRows(rows: readonly DatasetCsvRow[]): string[] {
    const headers: DatasetCsvRow = { Date: 'Date', Close: 'Close', Volume: 'Volume' };
    const widths = {
        Date: Math.max(headers.Date.length, ...rows.map((row) => row.Date.length)),
        Close: Math.max(headers.Close.length, ...rows.map((row) => row.Close.length)),
        Volume: Math.max(headers.Volume.length, ...rows.map((row) => row.Volume.length)),
    };

    const formatRow = (row: DatasetCsvRow): string =>
        [
            row.Date.padStart(widths.Date),
            row.Close.padStart(widths.Close),
            row.Volume.padStart(widths.Volume),
        ].join('  ');

    return [formatRow(headers), ...rows.map(formatRow)];
}

export function printSummary(summary: DatasetSummary): void {
    const box = buildBox([
        `✅ Saved ${summary.count} unique records`,
        '',
        `File       : ${summary.path}`,
        `Date range : ${summary.firstDate} to ${summary.lastDate}`,
        `Duplicates : ${summary.duplicatesRemoved} removed`,
    ]);
    console.log(chalk.green(box));

    console.log(chalk.bold('\n📊 First few records:'));
    formatRows(summary.head).forEach((line) => console.log(line));

    console.log(chalk.bold('\n📊 Last few records (latest dates):'));
    formatRows(summary.tail).forEach((line) => console.log(line));
}

export function printFailure(reason: string): void {
    console.error(chalk.red(`❌ ${reason}`));
    console.error(chalk.yellow('Please check your internet connection and try again'));
}
