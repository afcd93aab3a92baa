import { Logger as TsLogger, ILogObj } from "tslog"

export type Logger = TsLogger<ILogObj>

/**
 * tslog levels: 0 silly, 1 trace, 2 debug, 3 info, 4 warn, 5 error, 6 fatal
 */
export const LOG_LEVEL_DEBUG = 2
export const LOG_LEVEL_INFO = 3
export const LOG_LEVEL_FATAL = 6

let logVerbosity = parseLogLevel(process.env.STACKPLAN_LOG_LEVEL, LOG_LEVEL_INFO)

/**
 * Parse a log level from a raw string. Returns fallback when value is absent or not a level.
 */
export function parseLogLevel(raw: string | undefined, fallback: number): number {
    if (raw === undefined || raw.trim() === '') {
        return fallback
    }
    const level = Number(raw)
    if (!Number.isInteger(level) || level < 0 || level > LOG_LEVEL_FATAL) {
        return fallback
    }
    return level
}

/**
 * Set minimum log level for loggers created after this call.
 */
export function setLogVerbosity(level: number): void {
    logVerbosity = level
}

export function getLogger(name: string): Logger {
    return new TsLogger<ILogObj>({
        name: name,
        minLevel: logVerbosity,
        type: "pretty",
        prettyLogTemplate: "{{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ",
        hideLogPositionForProduction: true,
    })
}
