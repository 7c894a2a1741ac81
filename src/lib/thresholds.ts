/**
 * Maximum Monthly Mean (MMM) SST baselines for the four GBR management regions.
 *
 * Bleaching threshold is MMM + 1°C. The MMM is the warmest of the 12 monthly mean
 * climatology values over the 1985-1990 + 1993 baseline, as published in NOAA Coral
 * Reef Watch's Regional Virtual Station time series for the Great Barrier Reef
 * (retrieved 2025-06-12).
 */

export type RegionKey = "gbr_farnorth" | "gbr_north" | "gbr_central" | "gbr_south";

export type RegionThreshold = {
    key: RegionKey;
    name: string;
    // AREA_DESCR of the matching feature in the management areas dataset
    areaName: string;
    mmm: number;
};

const THRESHOLDS: RegionThreshold[] = [
    { key: "gbr_farnorth", name: "Far North", areaName: "Far Northern Management Area", mmm: 28.7694 },
    { key: "gbr_north", name: "North", areaName: "Cairns/Cooktown Management Area", mmm: 28.7041 },
    { key: "gbr_central", name: "Central", areaName: "Townsville/Whitsunday Management Area", mmm: 28.3422 },
    { key: "gbr_south", name: "South", areaName: "Mackay/Capricorn Management Area", mmm: 27.657 },
];

// north -> south; row order of every ExceedanceMatrix
export const REGION_THRESHOLDS: readonly Readonly<RegionThreshold>[] = Object.freeze(
    THRESHOLDS.map((t) => Object.freeze(t))
);
