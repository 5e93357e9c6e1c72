export interface Logger {
    debug: (messageOrLambda: () => string, namespace: string) => void;
    info: (messageOrLambda: string | (() => string), namespace: string) => void;
    warning: (messageOrLambda: string | (() => string), namespace: string) => void;
    error: (messageOrLambda: string, namespace: string) => void;
}

export type LogLevel = "debug" | "info" | "warning" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warning: 2,
    error: 3,
};

function format(namespace: string, messageOrLambda: string | (() => string)): string {
    return `[${new Date().toISOString()}] ${namespace}: ${typeof messageOrLambda === "function" ? messageOrLambda() : messageOrLambda}`;
}

/**
 * Console-backed logger dropping everything below `minLevel`. Lambdas of dropped messages are never evaluated.
 */
/* v8 ignore start -- @preserve */
export function createConsoleLogger(minLevel: LogLevel = "debug"): Logger {
    const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];

    return {
        debug: (messageOrLambda, namespace) => {
            if (enabled("debug")) {
                console.debug(format(namespace, messageOrLambda));
            }
        },
        info: (messageOrLambda, namespace) => {
            if (enabled("info")) {
                console.info(format(namespace, messageOrLambda));
            }
        },
        warning: (messageOrLambda, namespace) => {
            if (enabled("warning")) {
                console.warn(format(namespace, messageOrLambda));
            }
        },
        error: (message, namespace) => console.error(format(namespace, message)),
    };
}
/* v8 ignore stop -- @preserve */

export let logger: Logger = createConsoleLogger();

/* v8 ignore next -- @preserve */
export function setLogger(l: Logger): void {
    logger = l;
}
