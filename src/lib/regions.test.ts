import { readFileSync } from "node:fs";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
    loadRegions,
    orderRegions,
    parseRegionCollection,
    regionBounds,
    RegionDataError,
    type RegionCollection,
} from "./regions";

function square(name: string, north: number) {
    return {
        type: "Feature" as const,
        properties: { AREA_DESCR: name },
        geometry: {
            type: "Polygon" as const,
            coordinates: [
                [
                    [140, north],
                    [141, north],
                    [141, north - 1],
                    [140, north - 1],
                    [140, north],
                ],
            ],
        },
    };
}

const FAR_NORTH = square("Far Northern Management Area", -10);
const NORTH = square("Cairns/Cooktown Management Area", -14);
const CENTRAL = square("Townsville/Whitsunday Management Area", -17);
const SOUTH = square("Mackay/Capricorn Management Area", -21);

function collection(...features: ReturnType<typeof square>[]): RegionCollection {
    return { type: "FeatureCollection", features };
}

describe("parseRegionCollection", () => {
    it("accepts polygon features with an area name", () => {
        const json: unknown = JSON.parse(JSON.stringify(collection(FAR_NORTH, SOUTH)));
        expect(parseRegionCollection(json).features).toHaveLength(2);
    });

    it("rejects features without an area name", () => {
        const bad = { type: "FeatureCollection", features: [{ ...FAR_NORTH, properties: {} }] };
        expect(() => parseRegionCollection(bad)).toThrow(RegionDataError);
        expect(() => parseRegionCollection(bad)).toThrow(/features\.0\.properties\.AREA_DESCR/);
    });

    it("rejects non-polygon geometry", () => {
        const bad = {
            type: "FeatureCollection",
            features: [{ ...FAR_NORTH, geometry: { type: "Point", coordinates: [140, -10] } }],
        };
        expect(() => parseRegionCollection(bad)).toThrow(RegionDataError);
    });
});

describe("orderRegions", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("joins features to thresholds by name, north to south", () => {
        vi.spyOn(console, "debug").mockImplementation(() => {});
        const areas = orderRegions(
            collection(SOUTH, square("Some Other Area", 0), FAR_NORTH, CENTRAL, NORTH)
        );
        expect(areas.map((a) => a.threshold.name)).toEqual(["Far North", "North", "Central", "South"]);
        expect(areas.map((a) => a.feature.properties.AREA_DESCR)).toEqual([
            "Far Northern Management Area",
            "Cairns/Cooktown Management Area",
            "Townsville/Whitsunday Management Area",
            "Mackay/Capricorn Management Area",
        ]);
        expect(areas[0].centroid).toEqual([-10.5, 140.5]);
        expect(areas[3].centroid).toEqual([-21.5, 140.5]);
    });

    it("fails when a region is missing", () => {
        expect(() => orderRegions(collection(FAR_NORTH, NORTH, CENTRAL))).toThrow(
            "Missing management area: Mackay/Capricorn Management Area"
        );
    });

    it("fails when a region appears twice", () => {
        expect(() => orderRegions(collection(FAR_NORTH, NORTH, NORTH, CENTRAL, SOUTH))).toThrow(
            "Duplicate management area: Cairns/Cooktown Management Area"
        );
    });

    it("fails when the names and latitudes disagree", () => {
        const northInCentralSpot = square("Cairns/Cooktown Management Area", -17);
        const centralInNorthSpot = square("Townsville/Whitsunday Management Area", -14);
        expect(() =>
            orderRegions(collection(FAR_NORTH, northInCentralSpot, centralInNorthSpot, SOUTH))
        ).toThrow("Management areas out of north-to-south order: Central is not south of North");
    });
});

describe("regionBounds", () => {
    it("covers every area", () => {
        const areas = orderRegions(collection(FAR_NORTH, NORTH, CENTRAL, SOUTH));
        expect(regionBounds(areas)).toEqual([
            [-22, 140],
            [-10, 141],
        ]);
    });
});

describe("loadRegions", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("fetches and orders the dataset", async () => {
        vi.spyOn(console, "debug").mockImplementation(() => {});
        const body = JSON.stringify(collection(CENTRAL, SOUTH, NORTH, FAR_NORTH));
        const fetcher = vi.fn(async (_url: string) => new Response(body, { status: 200 }));

        const areas = await loadRegions("/data/areas.geojson", fetcher);

        expect(fetcher).toHaveBeenCalledWith("/data/areas.geojson");
        expect(areas.map((a) => a.threshold.key)).toEqual([
            "gbr_farnorth",
            "gbr_north",
            "gbr_central",
            "gbr_south",
        ]);
    });

    it("fails on an HTTP error", async () => {
        vi.spyOn(console, "debug").mockImplementation(() => {});
        const fetcher = vi.fn(async (_url: string) => new Response("not found", { status: 404 }));
        await expect(loadRegions("/missing.geojson", fetcher)).rejects.toThrow(
            "Couldn't load management areas (404)."
        );
    });

    it("orders the bundled management areas", () => {
        const raw = readFileSync(
            new URL("../../public/data/gbr_management_areas.geojson", import.meta.url),
            "utf8"
        );
        const areas = orderRegions(parseRegionCollection(JSON.parse(raw)));
        expect(areas.map((a) => a.threshold.name)).toEqual(["Far North", "North", "Central", "South"]);
    });
});
