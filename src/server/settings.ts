/**
 * Settings resolution for the syntax package language server.
 *
 * Initialization options and configuration payloads come from the client
 * untyped; every field is narrowed on its own and falls back to the default.
 */

import { DEFAULT_SETTINGS } from './constants';
import { LogLevel, Settings, ValidationSettings } from './types';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLogLevel(value: unknown): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

function booleanOr(value: unknown, fallback: boolean): boolean {
    return typeof value === 'boolean' ? value : fallback;
}

/**
 * Merge untrusted settings over a base (the defaults unless given).
 */
export function resolveSettings(value: unknown, base: Readonly<Settings> = DEFAULT_SETTINGS): Settings {
    const input = isRecord(value) ? value : {};

    const packagesPaths = Array.isArray(input.packagesPaths)
        ? input.packagesPaths.filter((p): p is string => typeof p === 'string' && p.length > 0)
        : [...base.packagesPaths];

    const logLevel = isLogLevel(input.logLevel) ? input.logLevel : base.logLevel;

    const max = input.maxCompletionItems;
    const maxCompletionItems = typeof max === 'number' && Number.isInteger(max) && max > 0
        ? max
        : base.maxCompletionItems;

    const validationInput = isRecord(input.validation) ? input.validation : {};
    const validation: ValidationSettings = {
        unknownKeys: booleanOr(validationInput.unknownKeys, base.validation.unknownKeys),
        unknownScopes: booleanOr(validationInput.unknownScopes, base.validation.unknownScopes),
        invalidValues: booleanOr(validationInput.invalidValues, base.validation.invalidValues),
    };

    return { packagesPaths, logLevel, maxCompletionItems, validation };
}

/**
 * Pull this server's section out of a `workspace/didChangeConfiguration`
 * payload (`{ settings: { syntaxDev: {...} } }`).
 */
export function settingsSection(payload: unknown, section = 'syntaxDev'): unknown {
    if (!isRecord(payload)) return undefined;
    const settings = payload.settings;
    if (!isRecord(settings)) return undefined;
    return settings[section];
}

export { isRecord };
