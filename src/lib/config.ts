const BASE_URL = import.meta.env.BASE_URL;

export const REGIONS_URL =
    import.meta.env.VITE_REGIONS_URL ?? `${BASE_URL}data/gbr_management_areas.geojson`;

export const DEFAULT_DHW_TEXT = import.meta.env.VITE_DEFAULT_DHW ?? "20.0";

// empty string turns the base map off and leaves only the region outlines
export const TILE_URL =
    import.meta.env.VITE_TILE_URL ?? "https://{s}.tile.openstreetmap.org/{z}/{x}/{y}.png";

export const TILE_ATTRIBUTION = "&copy; OpenStreetMap contributors";
