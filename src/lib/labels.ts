import type { PointTuple } from "leaflet";
import { MATRIX_WEEKS, roundTo, type WindowTriple } from "./exceedance";

function celsius(v: number): string {
    return `${roundTo(v, 1).toFixed(1)}°C`;
}

export function formatRegionLabel(row: WindowTriple, mmm: number): string {
    const lines = MATRIX_WEEKS.map((weeks, i) => `${weeks} weeks: ${celsius(row[i])}`);
    lines.push(`Threshold: ${celsius(mmm)}`);
    return lines.join("\n");
}

/**
 * Pixel offsets for each region label (north to south). Labels are right-aligned
 * on the region centroid, so a positive x pushes the text east of it.
 * Hand-tuned for the default map size.
 */
export const REGION_LABEL_OFFSETS: readonly PointTuple[] = [
    [150, 0],
    [150, 0],
    [-90, 10],
    [-100, 10],
];
