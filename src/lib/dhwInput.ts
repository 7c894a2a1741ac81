import { estimateExceedanceValue, type ExceedanceMatrix } from "./exceedance";
import { log } from "./log";

const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export type DhwField = {
    text: string;
    // last value that parsed; kept while the text is invalid
    value: number;
    valid: boolean;
};

export type DhwFieldAction = { type: "edit"; text: string };

/** Target DHW from free text, or null when it is not a finite number. */
export function parseDhw(text: string): number | null {
    const s = text.trim();
    if (!NUMERIC.test(s)) return null;
    const n = Number(s);
    return Number.isFinite(n) ? n : null;
}

export function initDhwField(text: string): DhwField {
    const v = parseDhw(text);
    return { text, value: v ?? 0, valid: v !== null };
}

export function dhwFieldReducer(state: DhwField, action: DhwFieldAction): DhwField {
    switch (action.type) {
        case "edit": {
            const v = parseDhw(action.text);
            if (v === null) return { ...state, text: action.text, valid: false };
            return { text: action.text, value: v, valid: true };
        }
    }
}

/** Matrix to show after an Update click; `current` is handed back untouched while the input is invalid. */
export function applyUpdate(field: DhwField, current: ExceedanceMatrix): ExceedanceMatrix {
    if (!field.valid) {
        log.warn("Invalid DHW value - skipping update");
        return current;
    }
    log.debug("Updating plots...");
    return estimateExceedanceValue(field.value);
}
