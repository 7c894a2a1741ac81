import type { DhwField } from "../lib/dhwInput";

export default function DhwControls({
    field,
    onEdit,
    onUpdate,
}: {
    field: DhwField;
    onEdit: (text: string) => void;
    onUpdate: () => void;
}) {
    return (
        <div style={{ display: "flex", flexDirection: "column", gap: "0.6rem" }}>
            <label htmlFor="dhw-input" style={{ fontWeight: 800 }}>
                Target DHW:
            </label>
            <input
                id="dhw-input"
                type="text"
                inputMode="decimal"
                value={field.text}
                aria-invalid={!field.valid}
                onChange={(e) => onEdit(e.target.value)}
                onKeyDown={(e) => {
                    if (e.key === "Enter") onUpdate();
                }}
                style={{
                    padding: "0.55rem 0.7rem",
                    borderRadius: 10,
                    border: field.valid ? "1px solid rgba(255,255,255,0.18)" : "2px solid red",
                    background: "rgba(255,255,255,0.06)",
                    color: "white",
                    fontSize: "1rem",
                }}
            />
            {!field.valid && (
                <div style={{ color: "#f87171", fontSize: "0.85rem" }}>
                    enter a number
                </div>
            )}

            <button
                onClick={onUpdate}
                disabled={!field.valid}
                style={{
                    padding: "0.7rem",
                    borderRadius: 10,
                    border: "none",
                    background: field.valid ? "#10b981" : "#059669",
                    color: "white",
                    fontWeight: 900,
                    cursor: field.valid ? "pointer" : "not-allowed",
                    opacity: field.valid ? 1 : 0.6,
                }}
            >
                Update
            </button>
        </div>
    );
}
