import { InvalidArgumentError } from 'commander';

export interface CliOptions {
    years?: number;
    output?: string;
    verbose?: boolean;
    interactive: boolean;
}

/** Strict positive integer: "3" → 3; "0", "-1", "2.5", "two" are rejected. */
export function toPositiveInt(value: string): number | null {
    const trimmed = value.trim();
    if (!/^\d+$/.test(trimmed)) return null;
    const n = Number.parseInt(trimmed, 10);
    return n > 0 ? n : null;
}

/** commander argument parser for `--years`. */
export function parseYearsOption(value: string): number {
    const years = toPositiveInt(value);
    if (years === null) {
        throw new InvalidArgumentError('Expected a positive whole number of years.');
    }
    return years;
}

/** A blank filename answer means "auto-generate". */
export function normalizeFilename(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}
