import { MATRIX_WEEKS, roundTo, type ExceedanceMatrix } from "../lib/exceedance";
import { REGION_THRESHOLDS } from "../lib/thresholds";

const cell = { padding: "0.3rem 0.4rem", textAlign: "right" } as const;

function fmt1(n: number): string {
    if (!Number.isFinite(n)) return "—";
    return roundTo(n, 1).toFixed(1);
}

export default function ExceedanceTable({ matrix }: { matrix: ExceedanceMatrix }) {
    return (
        <table style={{ width: "100%", borderCollapse: "collapse", fontSize: "0.88rem" }}>
            <thead>
                <tr style={{ borderBottom: "1px solid rgba(255,255,255,0.18)" }}>
                    <th style={{ ...cell, textAlign: "left" }}>Region</th>
                    {MATRIX_WEEKS.map((w) => (
                        <th key={w} style={cell}>
                            {w} wk
                        </th>
                    ))}
                    <th style={cell}>MMM</th>
                </tr>
            </thead>
            <tbody>
                {REGION_THRESHOLDS.map((t, i) => (
                    <tr key={t.key} style={{ borderBottom: "1px solid rgba(255,255,255,0.06)" }}>
                        <td style={{ ...cell, textAlign: "left", fontWeight: 800 }}>{t.name}</td>
                        {matrix[i].map((v, j) => (
                            <td key={MATRIX_WEEKS[j]} style={cell}>
                                {fmt1(v)}
                            </td>
                        ))}
                        <td style={{ ...cell, opacity: 0.75 }}>{fmt1(t.mmm)}</td>
                    </tr>
                ))}
            </tbody>
        </table>
    );
}
