import { pino, type DestinationStream, type Logger } from "pino";

export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;
export type LogLevel = typeof LOG_LEVELS[number];

export interface LoggerOptions {
    level?: LogLevel;
    name?: string;
    // tests pass a stream to capture lines
    destination?: DestinationStream;
}

/**
 * -v => debug, anything above is still debug (no trace level exposed).
 */
export function levelFromVerbosity(verbosity: number, fallback: LogLevel = "info"): LogLevel {
    if (verbosity >= 1) return "debug";
    return fallback;
}

export function createLogger(options: LoggerOptions = {}): Logger {
    const { level = "info", name = "clinic-carbon", destination } = options;
    if (destination) {
        return pino({ level, name }, destination);
    }
    // stderr keeps stdout clean for --json / --csv output
    return pino({ level, name }, pino.destination({ dest: 2, sync: true }));
}

export type { Logger };
