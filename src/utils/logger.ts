export type LogLevel = "debug" | "info" | "warning" | "error";

export interface Logger {
    debug: (messageOrLambda: () => string, namespace: string) => void;
    info: (messageOrLambda: string | (() => string), namespace: string) => void;
    warning: (messageOrLambda: string | (() => string), namespace: string) => void;
    error: (messageOrLambda: string, namespace: string) => void;
}

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warning: 2,
    error: 3,
};

/** Only applies to the default console logger */
let minLevel: LogLevel = "info";

function enabled(level: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[minLevel];
}

function format(messageOrLambda: string | (() => string), namespace: string): string {
    return `[${new Date().toISOString()}] ${namespace}: ${typeof messageOrLambda === "function" ? messageOrLambda() : messageOrLambda}`;
}

/* v8 ignore next -- @preserve */
export const consoleLogger: Logger = {
    debug: (messageOrLambda, namespace) => {
        if (enabled("debug")) {
            console.debug(format(messageOrLambda, namespace));
        }
    },
    info: (messageOrLambda, namespace) => {
        if (enabled("info")) {
            console.info(format(messageOrLambda, namespace));
        }
    },
    warning: (messageOrLambda, namespace) => {
        if (enabled("warning")) {
            console.warn(format(messageOrLambda, namespace));
        }
    },
    error: (message, namespace) => console.error(format(message, namespace)),
};

export let logger: Logger = consoleLogger;

/* v8 ignore next -- @preserve */
export function setLogger(l: Logger): void {
    logger = l;
}

export function setLogLevel(level: LogLevel): void {
    minLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
    return value in LOG_LEVEL_ORDER;
}
