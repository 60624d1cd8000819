/**
 * Scoped console logging
 *
 * Every line is written to stderr as `[scope] message`, leaving stdout to
 * command output such as `--json` reports.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

export const LOG_LEVEL_ENV = "TUNNELKEEPER_LOG_LEVEL";

let activeLevel: LogLevel = parseLogLevel(process.env[LOG_LEVEL_ENV]) ?? "info";

function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === "string" && Object.hasOwn(LEVEL_ORDER, value);
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
    const normalized = value?.trim().toLowerCase();
    return isLogLevel(normalized) ? normalized : undefined;
}

/**
 * Sets the process-wide level. The environment variable wins over the argument
 * so an operator can raise verbosity without editing config.json.
 */
export function setLogLevel(level: LogLevel): void {
    activeLevel = parseLogLevel(process.env[LOG_LEVEL_ENV]) ?? level;
}

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

export function createLogger(scope: string): Logger {
    const write = (level: LogLevel, message: string): void => {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[activeLevel]) return;
        console.error(`[${scope}] ${message}`);
    };

    return {
        debug: (message) => write("debug", message),
        info: (message) => write("info", message),
        warn: (message) => write("warn", message),
        error: (message) => write("error", message),
    };
}
