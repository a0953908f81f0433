/**
 * src/utils/volumeEstimate.ts
 *
 * Synthetic daily turnover for the Volume column. The listing carries no
 * volume, so a plausible magnitude is derived from the close and the
 * weekday. Nothing downstream treats it as real; the only guarantees are
 * that it is positive and deterministic for a given (close, date).
 */

import { getDay } from 'date-fns';
import type { VolumeEstimator } from '../sources/types.js';

const BASE_VOLUME = 4_500_000_000;
const REFERENCE_CLOSE = 2500;

// getDay(): 0 = Sunday … 6 = Saturday
const WEEKDAY_FACTOR: Record<number, number> = {
    1: 1.2,
    5: 0.9,
};

export const estimateVolume: VolumeEstimator = (close, date) => {
    const priceFactor = (Math.max(close, 0) / REFERENCE_CLOSE) * 0.3 + 0.85;
    const dayFactor = WEEKDAY_FACTOR[getDay(date)] ?? 1;

    const digits = close.toFixed(2).replace(/\D/g, '');
    const variation = 0.7 + (Number(digits.slice(-2)) % 60) / 100;

    return BASE_VOLUME * priceFactor * dayFactor * variation;
};

const volumeFormat = new Intl.NumberFormat('en-US', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
    useGrouping: true,
});

/** `4512345.678` → `"4,512,345.68"` */
export function formatVolume(volume: number): string {
    return volumeFormat.format(volume);
}

/** Inverse of formatVolume; NaN for anything that is not a grouped decimal. */
export function parseVolume(text: string): number {
    const cleaned = text.replace(/,/g, '').trim();
    return /^\d+(\.\d+)?$/.test(cleaned) ? Number(cleaned) : Number.NaN;
}
