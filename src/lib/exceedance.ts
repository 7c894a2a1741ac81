import { REGION_THRESHOLDS } from "./thresholds";

// accumulation windows in weeks, as returned by estimateSstExceedance
export const ACCUMULATION_WEEKS = [4, 8, 12] as const;

// column order of an ExceedanceMatrix
export const MATRIX_WEEKS = [12, 8, 4] as const;

export type WindowTriple = [number, number, number];

/** rows = regions north -> south, columns = [12 week, 8 week, 4 week] */
export type ExceedanceMatrix = WindowTriple[];

/** Decimal rounding with exact ties going to the even digit (0.125 -> 0.12, 0.375 -> 0.38). */
export function roundTo(value: number, digits: number): number {
    const f = 10 ** digits;
    const scaled = Math.abs(value) * f;
    const lo = Math.floor(scaled);
    const rem = scaled - lo;
    const n = rem > 0.5 || (rem === 0.5 && lo % 2 === 1) ? lo + 1 : lo;
    const r = n / f;
    return value < 0 ? -r : r;
}

/**
 * SST excess above the bleaching threshold needed to accumulate `dhw` °C-weeks
 * over 4, 8 and 12 weeks (in that order), rounded to 2 decimals.
 *
 * Assumes a finite `dhw`; NaN or Infinity pass straight through.
 */
export function estimateSstExceedance(dhw: number): WindowTriple {
    const [w4, w8, w12] = ACCUMULATION_WEEKS;
    return [roundTo(dhw / w4, 2), roundTo(dhw / w8, 2), roundTo(dhw / w12, 2)];
}

/**
 * 4x3 matrix of SST values: one row per region (north to south), columns are the
 * 12, 8 and 4 week estimates. Always a fresh matrix.
 */
export function estimateExceedanceValue(dhw: number): ExceedanceMatrix {
    const excess = estimateSstExceedance(dhw);
    return REGION_THRESHOLDS.map((t) => {
        const [v4, v8, v12] = excess.map((e) => t.mmm + e);
        return [v12, v8, v4];
    });
}
