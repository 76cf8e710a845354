import { normalizeCommandError, type NormalizedCommandError } from '../utils/commandErrors';

import type { AmcsStatus } from './amcsStatus';
import type { AmcsCommand, ParsedCommand } from './commandParser';

export type CommandResponseStatus = 'ack' | 'done' | 'error';

export interface CommandResponsePayload {
    commandId: string;
    command: string;
    status: CommandResponseStatus;
    result?: Record<string, number>;
    errors?: NormalizedCommandError[];
}

const execute = (amcs: AmcsStatus, body: AmcsCommand, tai: number): Record<string, number> => {
    switch (body.command) {
        case 'moveAz':
            return { duration: amcs.moveAz(tai, body.position, body.velocity) };
        case 'crawlAz':
            return { duration: amcs.crawlAz(tai, body.velocity) };
        case 'stopAz':
            amcs.stopAz(tai);
            return {};
        case 'park':
            return { endTai: amcs.park(tai) };
        case 'inflate':
            amcs.inflate(tai, body.action);
            return {};
        case 'fans':
            amcs.fans(tai, body.action);
            return {};
        case 'config': {
            const { jmax, amax, vmax } = amcs.config(tai, body.limits);
            return { jmax, amax, vmax };
        }
    }
};

export const createAck = ({ commandId, body }: ParsedCommand): CommandResponsePayload => ({
    commandId,
    command: body.command,
    status: 'ack',
});

/**
 * Run a parsed command against the AMCS at `tai` and describe the outcome.
 * Command failures become an error response; nothing is thrown.
 */
export const dispatchCommand = (
    amcs: AmcsStatus,
    { commandId, body }: ParsedCommand,
    tai: number,
): CommandResponsePayload => {
    try {
        const result = execute(amcs, body, tai);
        return { commandId, command: body.command, status: 'done', result };
    } catch (error) {
        return {
            commandId,
            command: body.command,
            status: 'error',
            errors: [normalizeCommandError(error)],
        };
    }
};
