/**
 * Logging for the syntax package language server.
 */

import { Logger, LogLevel } from './types';

export const LOG_PREFIX = '[SyntaxDev]';

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
    error: 0,
    warn: 1,
    info: 2,
    debug: 3,
};

/**
 * Wrap a log sink so messages below `level` are dropped and every message
 * carries the server prefix. `log` is the debug channel.
 */
export function createLeveledLogger(target: Logger, level: LogLevel): Logger {
    const enabled = (messageLevel: LogLevel) => LEVEL_ORDER[messageLevel] <= LEVEL_ORDER[level];
    return {
        error: message => {
            if (enabled('error')) target.error(`${LOG_PREFIX} ${message}`);
        },
        warn: message => {
            if (enabled('warn')) target.warn(`${LOG_PREFIX} ${message}`);
        },
        info: message => {
            if (enabled('info')) target.info(`${LOG_PREFIX} ${message}`);
        },
        log: message => {
            if (enabled('debug')) target.log(`${LOG_PREFIX} ${message}`);
        },
    };
}

export const silentLogger: Logger = {
    error: () => undefined,
    warn: () => undefined,
    info: () => undefined,
    log: () => undefined,
};
