export type MotionErrorKind = 'invalid-command' | 'time-travel' | 'unreachable-phase';

export abstract class MotionError extends Error {
    public abstract readonly kind: MotionErrorKind;
}

/** A command violated its preconditions; nothing was changed. */
export class InvalidCommandError extends MotionError {
    public readonly kind = 'invalid-command';

    public readonly command: string;

    constructor(command: string, message: string) {
        super(message);
        this.name = 'InvalidCommandError';
        this.command = command;
    }
}

/** A query or command is stamped before the engine's recorded start time. */
export class TimeTravelError extends MotionError {
    public readonly kind = 'time-travel';

    public readonly tai: number;

    public readonly startTai: number;

    constructor(tai: number, startTai: number) {
        super(`Encountered TAI ${tai} which is smaller than start TAI ${startTai}`);
        this.name = 'TimeTravelError';
        this.tai = tai;
        this.startTai = startTai;
    }
}

/** The motion model has no definition for the phase combination it met. */
export class UnreachablePhaseError extends MotionError {
    public readonly kind = 'unreachable-phase';

    public readonly phase: string;

    constructor(phase: string, context: string) {
        super(`Commanded phase ${phase} cannot occur ${context}`);
        this.name = 'UnreachablePhaseError';
        this.phase = phase;
    }
}

export const isMotionError = (error: unknown): error is MotionError => error instanceof MotionError;

export interface NormalizedCommandError {
    code: string;
    reason: string;
    message: string;
}

export const normalizeCommandError = (error: unknown): NormalizedCommandError => {
    if (isMotionError(error)) {
        return {
            code: error.kind,
            reason: error.name,
            message: error.message,
        };
    }

    if (error instanceof Error) {
        return {
            code: 'error',
            reason: error.name,
            message: error.message,
        };
    }

    return {
        code: 'error',
        reason: 'unknown',
        message: 'Command failed',
    };
};
