#!/usr/bin/env node
/**
 * src/main.ts
 *
 * ENTRY POINT: daily index harvest
 *
 *  1. Resolve the run: CLI flags, then prompts for whatever is missing
 *     (TTY only), then .env / defaults.
 *  2. Collect: paginated listing, falling back to alternate sources when it
 *     yields nothing.
 *  3. Persist: sorted, deduplicated Date,Close,Volume CSV.
 *
 * Ctrl+C aborts the run; nothing is written for an interrupted harvest.
 */

import 'dotenv/config';
import { createRequire } from 'node:module';
import chalk from 'chalk';
import { Command } from 'commander';
import { log, LogLevel } from 'crawlee';
import ora from 'ora';
import { normalizeFilename, parseYearsOption, type CliOptions } from './cli/options.js';
import { discardPartialWrite, onInterrupt } from './cli/interrupt.js';
import { promptForMissing, type RunAnswers } from './cli/prompts.js';
import { env } from './config/env.js';
import type { LogLevelName } from './config/envSchema.js';
import { resolveHarvestConfig } from './config/harvest.js';
import { collectIndexRecords } from './orchestrator.js';
import { resolveDatasetPath, writeDataset } from './utils/datasetStore.js';
import { printBanner, printFailure, printSummary } from './utils/display.js';
import { WriteError, errorMessage } from './utils/errors.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { name: string; version: string };

const LOG_LEVELS: Record<LogLevelName, LogLevel> = {
    ERROR: LogLevel.ERROR,
    WARNING: LogLevel.WARNING,
    INFO: LogLevel.INFO,
    DEBUG: LogLevel.DEBUG,
};

function isPromptExit(err: unknown): boolean {
    return err instanceof Error && err.name === 'ExitPromptError';
}

function stopByUser(): never {
    console.log(chalk.yellow('\n⏹️  Harvest stopped by user'));
    process.exit(130);
}

async function main(): Promise<void> {
    const program = new Command();

    program
        .name('index-harvest')
        .description('Collect daily index closes into a Date,Close,Volume CSV (latest date at bottom)')
        .version(pkg.version)
        .option('-y, --years <n>', 'years of history to collect', parseYearsOption)
        .option('-o, --output <file>', 'output CSV filename (default: auto-generated)')
        .option('-v, --verbose', 'debug logging')
        .option('--no-interactive', 'never prompt; use flags and defaults');

    await program.parseAsync(process.argv);
    const options = program.opts<CliOptions>();

    log.setLevel(LOG_LEVELS[options.verbose ? 'DEBUG' : env.CRAWLEE_LOG_LEVEL]);

    const given = { years: options.years, filename: normalizeFilename(options.output) };
    const defaultYears = env.HARVEST_YEARS;
    let answers: RunAnswers = { years: given.years ?? defaultYears, filename: given.filename };
    if (options.interactive && process.stdin.isTTY) {
        try {
            answers = await promptForMissing(given, defaultYears);
        } catch (err) {
            if (isPromptExit(err)) stopByUser();
            throw err;
        }
    }

    const config = resolveHarvestConfig(env, answers);
    printBanner(config.years);

    const releaseCollect = onInterrupt(stopByUser);
    const collected = await collectIndexRecords(config);
    releaseCollect();
    if (collected.records.length === 0) {
        printFailure('Failed to collect data from all sources');
        process.exitCode = 1;
        return;
    }
    if (collected.source === 'fallback') {
        console.log(chalk.yellow('⚠️  Main source failed; saved a single current value from an alternative source'));
    }

    const output = { filename: config.output.filename, outputDir: config.output.outputDir, now: new Date() };
    const releaseWrite = onInterrupt(discardPartialWrite(resolveDatasetPath(output), stopByUser));
    const spinner = ora('Saving dataset...').start();
    try {
        const summary = await writeDataset(collected.records, output);
        spinner.succeed(`Saved ${summary.count} records`);
        printSummary(summary);
    } catch (err) {
        if (err instanceof WriteError) {
            spinner.fail(err.message);
            printFailure('The dataset could not be saved');
            process.exitCode = 1;
            return;
        }
        spinner.stop();
        throw err;
    } finally {
        releaseWrite();
    }
}

main().catch((err) => {
    console.error(chalk.red(`❌ Error: ${errorMessage(err)}`));
    process.exitCode = 1;
});
