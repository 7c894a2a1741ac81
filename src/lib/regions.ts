import * as turf from "@turf/turf";
import type { LatLngBoundsLiteral, LatLngTuple } from "leaflet";
import { z } from "zod";
import { log } from "./log";
import { REGION_THRESHOLDS, type RegionThreshold } from "./thresholds";

export class RegionDataError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "RegionDataError";
    }
}

const Position = z.array(z.number()).min(2);
const Ring = z.array(Position).min(4);

const AreaGeometry = z.discriminatedUnion("type", [
    z.object({ type: z.literal("Polygon"), coordinates: z.array(Ring).min(1) }),
    z.object({ type: z.literal("MultiPolygon"), coordinates: z.array(z.array(Ring).min(1)).min(1) }),
]);

const AreaFeature = z.object({
    type: z.literal("Feature"),
    properties: z.object({ AREA_DESCR: z.string() }).passthrough(),
    geometry: AreaGeometry,
});

const AreaCollection = z.object({
    type: z.literal("FeatureCollection"),
    features: z.array(AreaFeature),
});

export type AreaFeature = z.infer<typeof AreaFeature>;
export type RegionCollection = z.infer<typeof AreaCollection>;

export type RegionArea = {
    threshold: Readonly<RegionThreshold>;
    feature: AreaFeature;
    // [lat, lon]
    centroid: LatLngTuple;
};

export function parseRegionCollection(json: unknown): RegionCollection {
    const parsed = AreaCollection.safeParse(json);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
            .join("; ");
        throw new RegionDataError(`Management area data is malformed: ${issues}`);
    }
    return parsed.data;
}

/**
 * Joins dataset features to the threshold table by area name and returns them in
 * threshold (north to south) order. Throws if a region is missing or duplicated,
 * or if the centroids do not run north to south in that order, since labels and
 * offsets are indexed by position.
 */
export function orderRegions(collection: RegionCollection): RegionArea[] {
    const byName = new Map<string, AreaFeature>();
    for (const f of collection.features) {
        const name = f.properties.AREA_DESCR;
        if (!REGION_THRESHOLDS.some((t) => t.areaName === name)) {
            log.debug(`ignoring area "${name}"`);
            continue;
        }
        if (byName.has(name)) throw new RegionDataError(`Duplicate management area: ${name}`);
        byName.set(name, f);
    }

    const areas = REGION_THRESHOLDS.map((threshold): RegionArea => {
        const feature = byName.get(threshold.areaName);
        if (!feature) {
            throw new RegionDataError(`Missing management area: ${threshold.areaName}`);
        }
        const [lon, lat] = turf.centroid(feature).geometry.coordinates;
        return { threshold, feature, centroid: [lat, lon] };
    });

    for (let i = 1; i < areas.length; i++) {
        const prev = areas[i - 1];
        const cur = areas[i];
        if (cur.centroid[0] >= prev.centroid[0]) {
            throw new RegionDataError(
                `Management areas out of north-to-south order: ${cur.threshold.name} is not south of ${prev.threshold.name}`
            );
        }
    }

    return areas;
}

export function regionBounds(areas: RegionArea[]): LatLngBoundsLiteral {
    let [west, south, east, north] = [Infinity, Infinity, -Infinity, -Infinity];
    for (const a of areas) {
        const [w, s, e, n] = turf.bbox(a.feature);
        west = Math.min(west, w);
        south = Math.min(south, s);
        east = Math.max(east, e);
        north = Math.max(north, n);
    }
    return [
        [south, west],
        [north, east],
    ];
}

export async function loadRegions(
    url: string,
    fetcher: (input: string) => Promise<Response> = fetch
): Promise<RegionArea[]> {
    log.debug("Loading spatial data...");
    const res = await fetcher(url);
    if (!res.ok) {
        throw new RegionDataError(`Couldn't load management areas (${res.status}).`);
    }
    const areas = orderRegions(parseRegionCollection(await res.json()));
    log.debug(`Loaded ${areas.length} management areas`);
    return areas;
}
