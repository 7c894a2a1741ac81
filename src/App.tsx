import { useEffect, useMemo, useReducer, useState } from "react";
import { CircleMarker, GeoJSON, MapContainer, TileLayer, Tooltip, useMap } from "react-leaflet";
import type { LatLngBoundsLiteral, LatLngExpression, PathOptions } from "leaflet";
import "leaflet/dist/leaflet.css";
import "./App.css";

import DhwControls from "./components/DhwControls";
import ExceedanceTable from "./components/ExceedanceTable";
import { DEFAULT_DHW_TEXT, REGIONS_URL, TILE_ATTRIBUTION, TILE_URL } from "./lib/config";
import { applyUpdate, dhwFieldReducer, initDhwField } from "./lib/dhwInput";
import { estimateExceedanceValue, type ExceedanceMatrix } from "./lib/exceedance";
import { formatRegionLabel, REGION_LABEL_OFFSETS } from "./lib/labels";
import { log } from "./lib/log";
import { loadRegions, regionBounds, type RegionArea } from "./lib/regions";

const GBR_CENTER: LatLngExpression = [-18.5, 147.5];

const OUTLINE: PathOptions = {
    color: "black",
    weight: 2,
    fill: false,
    fillOpacity: 0,
};

const ANCHOR: PathOptions = {
    color: "black",
    fillColor: "black",
    fillOpacity: 1,
    weight: 1,
};

function FitToRegions({ bounds }: { bounds: LatLngBoundsLiteral | null }) {
    const map = useMap();
    useEffect(() => {
        if (bounds) map.fitBounds(bounds, { padding: [20, 20] });
    }, [map, bounds]);
    return null;
}

function Explanation() {
    return (
        <div style={{ opacity: 0.9, lineHeight: 1.5, fontSize: "0.9rem" }}>
            <p style={{ marginTop: 0 }}>
                This dashboard assists in determining how hot, in terms of sea surface temperature (°C),
                ocean water has to get to achieve a specified DHW across the four management regions of
                the Great Barrier Reef. The bleaching threshold methodology described by NOAA is adopted
                here: the threshold is +1°C above the average historic Maximum Monthly Mean (MMM) for each
                Regional Virtual Station. The reference period for the historic MMM is 1985 - 1990, plus 1993.
            </p>
            <p>
                Reported annual maximum DHWs use a 12-week rolling window. For the target DHW to be reached,
                the indicated temperature must be held for any 12-week period over the year.
            </p>
            <p>DHW at 4 and 8°C-weeks are also reported as they correspond to ecological thresholds:</p>
            <ul style={{ paddingLeft: "1.1rem" }}>
                <li>At 4°C-weeks, widespread bleaching becomes observable.</li>
                <li>At 8°C-weeks, significant coral mortality begins and recovery is much less likely.</li>
            </ul>
            <p>Further detail on the methodology:</p>
            <ul style={{ paddingLeft: "1.1rem" }}>
                <li>
                    <a href="https://coralreefwatch.noaa.gov/product/5km/methodology.php" target="_blank" rel="noreferrer">
                        Methodology
                    </a>
                </li>
                <li>
                    <a href="https://coralreefwatch.noaa.gov/product/vs/description.php#graphs" target="_blank" rel="noreferrer">
                        Time Series
                    </a>
                </li>
            </ul>
            <p style={{ marginBottom: 0 }}>
                Bleaching threshold values were taken directly from the NOAA{" "}
                <a
                    href="https://coralreefwatch.noaa.gov/product/vs/timeseries/great_barrier_reef.php"
                    target="_blank"
                    rel="noreferrer"
                >
                    GBR datasets
                </a>
                .
            </p>
        </div>
    );
}

export default function App() {
    const [field, dispatch] = useReducer(dhwFieldReducer, DEFAULT_DHW_TEXT, initDhwField);

    const [matrix, setMatrix] = useState<ExceedanceMatrix>(() => estimateExceedanceValue(field.value));
    const [shownDhw, setShownDhw] = useState<number>(field.value);

    const [areas, setAreas] = useState<RegionArea[]>([]);
    const [areasLoading, setAreasLoading] = useState<boolean>(true);
    const [errorMsg, setErrorMsg] = useState<string>("");

    useEffect(() => {
        let cancelled = false;

        const boot = async () => {
            try {
                const loaded = await loadRegions(REGIONS_URL);
                if (!cancelled) setAreas(loaded);
            } catch (e: unknown) {
                log.error(e);
                if (!cancelled) {
                    setErrorMsg(e instanceof Error ? e.message : "couldn't load management areas.");
                }
            } finally {
                if (!cancelled) setAreasLoading(false);
            }
        };

        void boot();
        return () => {
            cancelled = true;
        };
    }, []);

    const bounds = useMemo(() => (areas.length ? regionBounds(areas) : null), [areas]);

    const handleUpdate = () => {
        const next = applyUpdate(field, matrix);
        if (next === matrix) return;
        setMatrix(next);
        setShownDhw(field.value);
        log.debug("Plots updated!");
    };

    return (
        <div style={{ display: "flex", height: "100vh", width: "100vw" }}>
            <div
                style={{
                    width: 320,
                    padding: "1rem",
                    background: "#111827",
                    color: "white",
                    fontFamily: "system-ui",
                    display: "flex",
                    flexDirection: "column",
                    gap: "0.8rem",
                    boxSizing: "border-box",
                    overflow: "auto",
                }}
            >
                <div>
                    <h2 style={{ margin: 0 }}>Sea Temperature to DHW</h2>
                    <div style={{ opacity: 0.85, marginTop: 6, fontSize: "0.92rem" }}>
                        SST needed to accumulate a target DHW over 12, 8 and 4 weeks.
                    </div>
                </div>

                <DhwControls
                    field={field}
                    onEdit={(text) => dispatch({ type: "edit", text })}
                    onUpdate={handleUpdate}
                />

                {areasLoading && <div style={{ opacity: 0.9 }}>Loading management areas…</div>}
                {errorMsg && <div style={{ color: "#f87171", fontWeight: 900 }}>{errorMsg}</div>}

                <div style={{ background: "rgba(255,255,255,0.05)", borderRadius: 14, padding: 12 }}>
                    <div style={{ fontWeight: 950, marginBottom: 6 }}>SST (°C) for DHW {shownDhw}</div>
                    <ExceedanceTable matrix={matrix} />
                </div>

                <div>
                    <h4 style={{ margin: "0.4rem 0" }}>Explanation</h4>
                    <Explanation />
                </div>
            </div>

            <div style={{ flex: 1 }}>
                <div className="mapWrap">
                    <div className="mapTitle">SST Accumulation by Region</div>
                    <MapContainer
                        center={GBR_CENTER}
                        zoom={5}
                        style={{ height: "100%", width: "100%" }}
                        dragging={false}
                        scrollWheelZoom={false}
                        doubleClickZoom={false}
                        boxZoom={false}
                        keyboard={false}
                        touchZoom={false}
                        zoomControl={false}
                    >
                        {TILE_URL ? <TileLayer url={TILE_URL} attribution={TILE_ATTRIBUTION} /> : null}

                        <FitToRegions bounds={bounds} />

                        {areas.map((a) => (
                            <GeoJSON key={a.threshold.key} data={a.feature} style={OUTLINE} />
                        ))}

                        {areas.map((a, i) => (
                            <CircleMarker key={`${a.threshold.key}-label`} center={a.centroid} radius={2} pathOptions={ANCHOR}>
                                <Tooltip
                                    permanent
                                    direction="left"
                                    offset={REGION_LABEL_OFFSETS[i]}
                                    className="regionLabel"
                                >
                                    {formatRegionLabel(matrix[i], a.threshold.mmm)}
                                </Tooltip>
                            </CircleMarker>
                        ))}
                    </MapContainer>
                </div>
            </div>
        </div>
    );
}
