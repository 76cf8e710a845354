import { AMCS_COMMAND_TOPIC } from '../constants/control';
import type { AmcsLimits, OnOff } from '../types';

export type CommandParseErrorReason = 'topic' | 'decode' | 'schema';

export interface CommandParseError {
    reason: CommandParseErrorReason;
    message: string;
    commandId?: string;
    cause?: unknown;
}

export type AmcsCommand =
    | { command: 'moveAz'; position: number; velocity: number }
    | { command: 'crawlAz'; velocity: number }
    | { command: 'stopAz' }
    | { command: 'park' }
    | { command: 'inflate'; action: OnOff }
    | { command: 'fans'; action: OnOff }
    | { command: 'config'; limits: Partial<AmcsLimits> };

export interface ParsedCommand {
    commandId: string;
    body: AmcsCommand;
}

export type CommandParseResult =
    | { ok: true; value: ParsedCommand }
    | { ok: false; error: CommandParseError };

const decoder = new TextDecoder('utf-8', { fatal: true });

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const isOnOff = (value: unknown): value is OnOff => value === 'ON' || value === 'OFF';

const toFiniteNumber = (value: unknown): number | null => {
    if (typeof value === 'number' && Number.isFinite(value)) {
        return value;
    }
    if (typeof value === 'string' && value.trim().length > 0) {
        const parsed = Number(value);
        if (Number.isFinite(parsed)) {
            return parsed;
        }
    }
    return null;
};

const schemaError = (message: string, commandId?: string): CommandParseResult => ({
    ok: false,
    error: { reason: 'schema', message, commandId },
});

type BodyResult = { ok: true; body: AmcsCommand } | { ok: false; message: string };

const requireNumber = (
    parameters: Record<string, unknown>,
    command: string,
    key: string,
): number | string => {
    const value = toFiniteNumber(parameters[key]);
    return value ?? `Command "${command}" requires numeric parameter "${key}"`;
};

const parseBody = (command: string, parameters: Record<string, unknown>): BodyResult => {
    switch (command) {
        case 'moveAz': {
            const position = requireNumber(parameters, command, 'position');
            const velocity = requireNumber(parameters, command, 'velocity');
            if (typeof position === 'string') {
                return { ok: false, message: position };
            }
            if (typeof velocity === 'string') {
                return { ok: false, message: velocity };
            }
            return { ok: true, body: { command: 'moveAz', position, velocity } };
        }
        case 'crawlAz': {
            const velocity = requireNumber(parameters, command, 'velocity');
            if (typeof velocity === 'string') {
                return { ok: false, message: velocity };
            }
            return { ok: true, body: { command: 'crawlAz', velocity } };
        }
        case 'stopAz':
            return { ok: true, body: { command: 'stopAz' } };
        case 'park':
            return { ok: true, body: { command: 'park' } };
        case 'inflate':
        case 'fans': {
            const action = parameters['action'];
            if (!isOnOff(action)) {
                return {
                    ok: false,
                    message: `Command "${command}" requires "action" to be ON or OFF`,
                };
            }
            return {
                ok: true,
                body: command === 'fans' ? { command: 'fans', action } : { command: 'inflate', action },
            };
        }
        case 'config': {
            const limits: Partial<AmcsLimits> = {};
            for (const key of ['jmax', 'amax', 'vmax'] as const) {
                if (parameters[key] === undefined) {
                    continue;
                }
                const value = requireNumber(parameters, command, key);
                if (typeof value === 'string') {
                    return { ok: false, message: value };
                }
                limits[key] = value;
            }
            return { ok: true, body: { command: 'config', limits } };
        }
        default:
            return { ok: false, message: `Unknown command "${command}"` };
    }
};

export const parseCommandMessage = (topic: string, payload: Uint8Array): CommandParseResult => {
    if (topic !== AMCS_COMMAND_TOPIC) {
        return {
            ok: false,
            error: {
                reason: 'topic',
                message: `Topic "${topic}" is not the command topic "${AMCS_COMMAND_TOPIC}"`,
            },
        };
    }

    let jsonText: string;
    try {
        jsonText = decoder.decode(payload);
    } catch (error) {
        return {
            ok: false,
            error: {
                reason: 'decode',
                message: 'Unable to decode command payload as UTF-8',
                cause: error,
            },
        };
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(jsonText);
    } catch (error) {
        return {
            ok: false,
            error: {
                reason: 'decode',
                message: 'Unable to parse command payload as JSON',
                cause: error,
            },
        };
    }

    if (!isRecord(parsed)) {
        return schemaError('Command payload must be an object');
    }

    const idSource = parsed['commandId'];
    if (
        !(typeof idSource === 'number' && Number.isFinite(idSource)) &&
        !(typeof idSource === 'string' && idSource.trim().length > 0)
    ) {
        return schemaError('Command payload missing "commandId"');
    }
    const commandId = String(idSource);

    const command = parsed['command'];
    if (typeof command !== 'string') {
        return schemaError('Command payload missing string "command"', commandId);
    }

    const parametersValue = parsed['parameters'] ?? {};
    if (!isRecord(parametersValue)) {
        return schemaError(`Parameters of "${command}" must be an object`, commandId);
    }

    const body = parseBody(command, parametersValue);
    if (!body.ok) {
        return schemaError(body.message, commandId);
    }
    return { ok: true, value: { commandId, body: body.body } };
};
