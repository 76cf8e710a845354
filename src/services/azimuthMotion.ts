import type { CommandedPhase, EngineState, MotionPhase, MotionSample } from '../types';
import {
    InvalidCommandError,
    TimeTravelError,
    UnreachablePhaseError,
} from '../utils/commandErrors';
import { wrapNonNegative } from '../utils/angle';

export interface AzimuthMotionOptions {
    startPosition: number; // rad
    maxSpeed: number; // rad/s
    startTai: number;
}

const isFiniteNumber = (value: number): boolean => Number.isFinite(value);

const assertFinite = (command: string, name: string, value: number): void => {
    if (!isFiniteNumber(value)) {
        throw new InvalidCommandError(command, `${name} must be a finite number, got ${value}`);
    }
};

const freezeState = (state: EngineState): Readonly<EngineState> => Object.freeze({ ...state });

const planDuration = (startPosition: number, endPosition: number, maxSpeed: number): number =>
    Math.abs(endPosition - startPosition) / maxSpeed;

const postTransitSample = (state: Readonly<EngineState>, tai: number): MotionSample => {
    const phase = state.commandedPhase;
    switch (phase) {
        case 'PARKING':
            return { position: state.endPosition, velocity: 0, phase: 'PARKED' };
        case 'STOPPING':
            return { position: state.endPosition, velocity: 0, phase: 'STOPPED' };
        case 'MOVING':
        case 'CRAWLING': {
            const base = phase === 'CRAWLING' ? state.startPosition : state.endPosition;
            const position = base + state.crawlVelocity * (tai - state.endTime);
            if (state.crawlVelocity === 0) {
                return { position, velocity: 0, phase: 'STOPPED' };
            }
            return { position, velocity: state.crawlVelocity, phase: 'CRAWLING' };
        }
        default: {
            const unknown: never = phase;
            throw new UnreachablePhaseError(String(unknown), 'after the transit leg');
        }
    }
};

const transitSample = (state: Readonly<EngineState>, tai: number): MotionSample => {
    const distance = state.endPosition - state.startPosition;
    const frac = (tai - state.startTime) / (state.endTime - state.startTime);
    const position = state.startPosition + distance * frac;
    const velocity = distance < 0 ? -state.maxSpeed : state.maxSpeed;
    const phase = state.commandedPhase;
    switch (phase) {
        case 'MOVING':
            return { position, velocity, phase: 'MOVING' };
        case 'PARKING':
            return { position, velocity, phase: 'PARKING' };
        case 'STOPPING':
            return { position, velocity: 0, phase: 'STOPPED' };
        case 'CRAWLING':
            // Crawling has no transit leg, so its end time equals its start time.
            throw new UnreachablePhaseError(phase, 'during a transit leg');
        default: {
            const unknown: never = phase;
            throw new UnreachablePhaseError(String(unknown), 'during a transit leg');
        }
    }
};

/**
 * Computes position, velocity and phase of the axis at `tai` from an engine
 * state. Pure: the state is only read. The raw position is wrapped into
 * [0, 2π) once, on the returned value.
 */
export const evaluateMotion = (state: Readonly<EngineState>, tai: number): MotionSample => {
    assertFinite('evaluate', 'tai', tai);
    if (tai < state.startTime) {
        throw new TimeTravelError(tai, state.startTime);
    }
    const sample = tai < state.endTime ? transitSample(state, tai) : postTransitSample(state, tai);
    return {
        position: wrapNonNegative(sample.position),
        velocity: sample.velocity,
        phase: sample.phase,
    };
};

/**
 * Closed-form simulator of the dome azimuth axis.
 *
 * The axis either moves to a target at maximum speed and then crawls at the
 * requested crawl velocity, or crawls right away. Velocity changes are
 * instantaneous. Every command replaces the engine state as a whole, so a
 * reader never sees a mix of old and new parameters, and queries never
 * change it.
 */
export class AzimuthMotion {
    private state: Readonly<EngineState>;

    private maxSpeed: number;

    constructor({ startPosition, maxSpeed, startTai }: AzimuthMotionOptions) {
        assertFinite('init', 'startPosition', startPosition);
        assertFinite('init', 'startTai', startTai);
        this.assertValidMaxSpeed('init', maxSpeed);
        this.maxSpeed = maxSpeed;
        const position = wrapNonNegative(startPosition);
        this.state = freezeState({
            startPosition: position,
            startTime: startTai,
            endPosition: position,
            endTime: startTai,
            crawlVelocity: 0,
            commandedPhase: 'STOPPING',
            maxSpeed,
        });
    }

    public getState(): Readonly<EngineState> {
        return this.state;
    }

    /**
     * Changes the speed limit used by the next plan. The plan in progress
     * keeps the speed it was made with.
     */
    public setMaxSpeed(maxSpeed: number): void {
        this.assertValidMaxSpeed('config', maxSpeed);
        this.maxSpeed = maxSpeed;
    }

    public evaluate(tai: number): MotionSample {
        return evaluateMotion(this.state, tai);
    }

    /**
     * Plans a move to `endPosition` followed by a crawl, or a crawl that
     * starts immediately, and returns the duration [s] of the move. The
     * end position is ignored when crawling.
     */
    public setTarget(
        issuedAt: number,
        endPosition: number,
        crawlVelocity: number,
        requestedPhase: MotionPhase,
    ): number {
        const command = 'setTarget';
        if (requestedPhase !== 'MOVING' && requestedPhase !== 'CRAWLING') {
            throw new InvalidCommandError(
                command,
                `Requested phase should be MOVING or CRAWLING, got ${requestedPhase}`,
            );
        }
        assertFinite(command, 'issuedAt', issuedAt);
        assertFinite(command, 'crawlVelocity', crawlVelocity);
        if (requestedPhase === 'MOVING') {
            assertFinite(command, 'endPosition', endPosition);
        }
        if (Math.abs(crawlVelocity) > this.maxSpeed) {
            throw new InvalidCommandError(
                command,
                `The target crawl speed ${Math.abs(crawlVelocity)} is larger than the max speed ${this.maxSpeed}`,
            );
        }

        const { position } = this.evaluate(issuedAt);
        const target = requestedPhase === 'CRAWLING' ? position : endPosition;
        return this.replan(issuedAt, position, target, crawlVelocity, requestedPhase);
    }

    /** Stops the motion instantaneously at the position reached at `issuedAt`. */
    public stop(issuedAt: number): void {
        assertFinite('stop', 'issuedAt', issuedAt);
        const { position } = this.evaluate(issuedAt);
        this.state = freezeState({
            startPosition: position,
            startTime: issuedAt,
            endPosition: position,
            endTime: issuedAt,
            crawlVelocity: 0,
            commandedPhase: 'STOPPING',
            maxSpeed: this.maxSpeed,
        });
    }

    /** Moves the axis to 0 rad and returns the TAI time at which it is parked. */
    public park(issuedAt: number): number {
        assertFinite('park', 'issuedAt', issuedAt);
        const { position } = this.evaluate(issuedAt);
        this.replan(issuedAt, position, 0, 0, 'PARKING');
        return this.state.endTime;
    }

    private replan(
        issuedAt: number,
        startPosition: number,
        endPosition: number,
        crawlVelocity: number,
        commandedPhase: CommandedPhase,
    ): number {
        const duration =
            commandedPhase === 'CRAWLING' ? 0 : planDuration(startPosition, endPosition, this.maxSpeed);
        this.state = freezeState({
            startPosition,
            startTime: issuedAt,
            endPosition,
            endTime: issuedAt + duration,
            crawlVelocity,
            commandedPhase,
            maxSpeed: this.maxSpeed,
        });
        return duration;
    }

    private assertValidMaxSpeed(command: string, maxSpeed: number): void {
        if (!isFiniteNumber(maxSpeed) || maxSpeed <= 0) {
            throw new InvalidCommandError(command, `Max speed must be positive, got ${maxSpeed}`);
        }
    }
}
