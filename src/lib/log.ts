const PREFIX = "[dhw-sst]";

const DEBUG = import.meta.env.DEV || import.meta.env.VITE_DEBUG === "1";

export const log = {
    debug(...args: unknown[]) {
        if (DEBUG) console.debug(PREFIX, ...args);
    },
    info(...args: unknown[]) {
        console.info(PREFIX, ...args);
    },
    warn(...args: unknown[]) {
        console.warn(PREFIX, ...args);
    },
    error(...args: unknown[]) {
        console.error(PREFIX, ...args);
    },
};
