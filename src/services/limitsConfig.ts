import { readFileSync } from 'node:fs';

import { AMCS_HARD_LIMITS, DEFAULT_AMCS_LIMITS } from '../constants/control';
import type { AmcsLimits } from '../types';

export const LIMITS_CONFIG_VERSION = 1;
export const LIMITS_FILE_ENV = 'AMCS_LIMITS_FILE';

const LIMIT_KEYS: ReadonlyArray<keyof AmcsLimits> = ['jmax', 'amax', 'vmax'];

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null;

export const isValidLimit = (key: keyof AmcsLimits, value: unknown): value is number =>
    typeof value === 'number' &&
    Number.isFinite(value) &&
    value > 0 &&
    value <= AMCS_HARD_LIMITS[key];

/**
 * Parse a versioned limits payload. Fields that are missing or outside
 * (0, hard limit] fall back to the defaults.
 * Returns null if nothing is given or the payload cannot be used at all.
 */
export const loadAmcsLimits = (text: string | null | undefined): AmcsLimits | null => {
    if (!text) {
        return null;
    }
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch {
        return null;
    }
    if (!isRecord(parsed) || parsed['version'] !== LIMITS_CONFIG_VERSION) {
        return null;
    }
    const limits = parsed['limits'];
    if (!isRecord(limits)) {
        return null;
    }

    const result: AmcsLimits = { ...DEFAULT_AMCS_LIMITS };
    for (const key of LIMIT_KEYS) {
        const value = limits[key];
        if (isValidLimit(key, value)) {
            result[key] = value;
        }
    }
    return result;
};

/**
 * Load limits from the JSON file named by `AMCS_LIMITS_FILE`, falling back to
 * the defaults when the variable is unset. A named file that cannot be read
 * or parsed is an error.
 */
export const loadAmcsLimitsFromEnv = (
    env: Record<string, string | undefined>,
    readFile: (path: string) => string = (path) => readFileSync(path, 'utf8'),
): AmcsLimits => {
    const path = env[LIMITS_FILE_ENV];
    if (!path) {
        return { ...DEFAULT_AMCS_LIMITS };
    }
    const limits = loadAmcsLimits(readFile(path));
    if (!limits) {
        throw new Error(`Limits file ${path} is not a version ${LIMITS_CONFIG_VERSION} limits payload`);
    }
    return limits;
};

export const serializeAmcsLimits = (limits: AmcsLimits): string =>
    JSON.stringify({ version: LIMITS_CONFIG_VERSION, limits });
