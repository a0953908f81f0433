import * as fs from 'fs';
import { datasetTempPath } from '../utils/datasetStore.js';

/**
 * Ctrl+C handling scoped to one phase of the run. Each phase attaches its
 * own handler and releases it when the phase ends.
 */

export type ReleaseInterrupt = () => void;

export function onInterrupt(handler: () => void): ReleaseInterrupt {
    process.once('SIGINT', handler);
    return () => {
        process.removeListener('SIGINT', handler);
    };
}

/**
 * Handler for the write phase: drops the half-written temp file beside
 * `target` before `stop` ends the process. Runs synchronously since the
 * process exits right after.
 */
export function discardPartialWrite(target: string, stop: () => void): () => void {
    return () => {
        try {
            fs.rmSync(datasetTempPath(target), { force: true });
        } finally {
            stop();
        }
    };
}
