import pino from 'pino';
import { PinoPretty } from 'pino-pretty';
import type { LogLevel } from '../types/index.js';

const STDERR = 2;

/**
 * Where formatted lines go. Swapped by `initLogger()`; the root logger
 * writes through it, so loggers taken at import time follow the switch.
 */
let sink: pino.DestinationStream = prettySink();

/**
 * Logger singleton. Modules take it once at import time; `initLogger()`
 * reconfigures it in place at startup.
 * Logs go to stderr so that commands printing records keep stdout clean.
 */
const rootLogger: pino.Logger = pino(
    { level: 'info', base: { app: 'citenet' } },
    { write: (line: string) => sink.write(line) }
);

/**
 * Set level and output format. Should be called once at CLI startup.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    sink = jsonLogs ? pino.destination({ dest: STDERR, sync: true }) : prettySink();
    rootLogger.level = level;

    return rootLogger;
}

/**
 * Get the logger instance. Defaults to pretty output at info level.
 */
export function getLogger(): pino.Logger {
    return rootLogger;
}

function prettySink(): pino.DestinationStream {
    return PinoPretty({
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname,app',
        destination: STDERR,
        sync: true,
    });
}
