import { AMCS_HARD_LIMITS, DEFAULT_AMCS_LIMITS, NO_ERROR } from '../constants/control';
import type { AmcsLimits, AmcsSnapshot, OnOff, SensorChannels } from '../types';
import { degToRad, radToDeg, wrapNonNegativeDeg } from '../utils/angle';
import { InvalidCommandError } from '../utils/commandErrors';

import { AzimuthMotion, evaluateMotion } from './azimuthMotion';
import { isValidLimit } from './limitsConfig';
import type { ScopedLogger } from './logStore';
import { createDriftSensorModel, type SensorModel } from './sensorModel';

export interface AmcsStatusOptions {
    startTai: number;
    startPosition?: number; // deg
    limits?: AmcsLimits;
    sensorModel?: SensorModel;
    logger?: ScopedLogger;
}

type CommandedTarget =
    | { kind: 'position'; positionDeg: number; velocityDeg: number }
    | { kind: 'tracking'; velocityDeg: number };

const freezeChannels = (channels: SensorChannels): { [K in keyof SensorChannels]: readonly number[] } => ({
    driveTorqueActual: Object.freeze([...channels.driveTorqueActual]),
    driveTorqueCommanded: Object.freeze([...channels.driveTorqueCommanded]),
    driveCurrentActual: Object.freeze([...channels.driveCurrentActual]),
    driveTemperature: Object.freeze([...channels.driveTemperature]),
    encoderHeadRaw: Object.freeze([...channels.encoderHeadRaw]),
    encoderHeadCalibrated: Object.freeze([...channels.encoderHeadCalibrated]),
    resolverRaw: Object.freeze([...channels.resolverRaw]),
    resolverCalibrated: Object.freeze([...channels.resolverCalibrated]),
});

/**
 * Status of the Azimuth Motion Control System in simulation mode.
 *
 * Commands take degrees and are handed to the azimuth engine in radians.
 * `determineStatus` samples the engine and the sensor model once and returns
 * a frozen snapshot; a new snapshot is built for every call.
 */
export class AmcsStatus {
    private readonly startTai: number;

    private readonly azimuth: AzimuthMotion;

    private readonly sensorModel: SensorModel;

    private readonly logger: ScopedLogger | null;

    private limits: AmcsLimits;

    private commanded: CommandedTarget;

    private fansEnabled: OnOff = 'OFF';

    private sealInflated: OnOff = 'OFF';

    private readonly error: readonly string[] = [NO_ERROR];

    private latest: AmcsSnapshot | null = null;

    constructor({
        startTai,
        startPosition = 0,
        limits = DEFAULT_AMCS_LIMITS,
        sensorModel = createDriftSensorModel(),
        logger,
    }: AmcsStatusOptions) {
        this.startTai = startTai;
        this.limits = { ...limits };
        this.sensorModel = sensorModel;
        this.logger = logger ?? null;
        this.azimuth = new AzimuthMotion({
            startPosition: degToRad(startPosition),
            maxSpeed: degToRad(this.limits.vmax),
            startTai,
        });
        this.commanded = {
            kind: 'position',
            positionDeg: radToDeg(this.azimuth.getState().endPosition),
            velocityDeg: 0,
        };
    }

    public getLimits(): AmcsLimits {
        return { ...this.limits };
    }

    public getLatestSnapshot(): AmcsSnapshot | null {
        return this.latest;
    }

    public determineStatus(tai: number): AmcsSnapshot {
        // One read of the engine state serves the whole snapshot.
        const state = this.azimuth.getState();
        const { position, velocity, phase } = evaluateMotion(state, tai);
        const positionDeg = wrapNonNegativeDeg(radToDeg(position));
        const velocityDeg = radToDeg(velocity);
        const channels = this.sensorModel.sample({
            elapsed: tai - this.startTai,
            positionDeg,
            velocityDeg,
            maxSpeedDeg: radToDeg(state.maxSpeed),
        });
        const commanded = this.commanded;
        const snapshot: AmcsSnapshot = Object.freeze({
            status: Object.freeze({
                error: Object.freeze([...this.error]),
                status: phase,
                fans: this.fansEnabled,
                inflate: this.sealInflated,
            }),
            positionActual: positionDeg,
            positionCommanded: commanded.kind === 'position' ? commanded.positionDeg : positionDeg,
            velocityActual: velocityDeg,
            velocityCommanded: commanded.velocityDeg,
            ...freezeChannels(channels),
            timestamp: tai,
        });
        this.latest = snapshot;
        return snapshot;
    }

    /**
     * Move the dome at maximum velocity to `position` [deg] and crawl at
     * `velocity` [deg/s] once there. Returns the duration [s] of the move.
     */
    public moveAz(tai: number, position: number, velocity: number): number {
        const duration = this.run('moveAz', { position, velocity }, () =>
            this.azimuth.setTarget(tai, degToRad(position), degToRad(velocity), 'MOVING'),
        );
        this.commanded = { kind: 'position', positionDeg: position, velocityDeg: velocity };
        return duration;
    }

    /** Crawl in the direction of the sign of `velocity` [deg/s]. */
    public crawlAz(tai: number, velocity: number): number {
        const duration = this.run('crawlAz', { velocity }, () =>
            this.azimuth.setTarget(tai, Number.NaN, degToRad(velocity), 'CRAWLING'),
        );
        this.commanded = { kind: 'tracking', velocityDeg: velocity };
        return duration;
    }

    public stopAz(tai: number): void {
        this.run('stopAz', {}, () => this.azimuth.stop(tai));
        this.commanded = {
            kind: 'position',
            positionDeg: radToDeg(this.azimuth.getState().endPosition),
            velocityDeg: 0,
        };
    }

    /** Park the dome at azimuth 0. Returns the TAI time at which it is parked. */
    public park(tai: number): number {
        const endTai = this.run('park', {}, () => this.azimuth.park(tai));
        this.commanded = { kind: 'position', positionDeg: 0, velocityDeg: 0 };
        return endTai;
    }

    public inflate(tai: number, action: OnOff): void {
        this.run('inflate', { action }, () => {
            this.assertNotBefore('inflate', tai);
        });
        this.sealInflated = action;
    }

    public fans(tai: number, action: OnOff): void {
        this.run('fans', { action }, () => {
            this.assertNotBefore('fans', tai);
        });
        this.fansEnabled = action;
    }

    /**
     * Update the motion limits. Every given limit must lie in (0, hard limit];
     * otherwise nothing changes. A new vmax applies from the next motion command.
     */
    public config(tai: number, limits: Partial<AmcsLimits>): AmcsLimits {
        return this.run('config', { ...limits }, () => {
            this.assertNotBefore('config', tai);
            const next: AmcsLimits = { ...this.limits };
            for (const key of ['jmax', 'amax', 'vmax'] as const) {
                const value = limits[key];
                if (value === undefined) {
                    continue;
                }
                if (!isValidLimit(key, value)) {
                    throw new InvalidCommandError(
                        'config',
                        `${key}=${value} must be larger than 0 and at most ${AMCS_HARD_LIMITS[key]}`,
                    );
                }
                next[key] = value;
            }
            this.azimuth.setMaxSpeed(degToRad(next.vmax));
            this.limits = next;
            return { ...next };
        });
    }

    // Auxiliary commands carry no motion, but a timestamp before the current
    // plan still points at a clock or ordering bug upstream.
    private assertNotBefore(command: string, tai: number): void {
        if (!Number.isFinite(tai)) {
            throw new InvalidCommandError(command, `issuedAt must be a finite number, got ${tai}`);
        }
        this.azimuth.evaluate(tai);
    }

    private run<T>(command: string, parameters: Record<string, unknown>, action: () => T): T {
        try {
            const result = action();
            this.logger?.logInfo(`${command} accepted`, parameters);
            return result;
        } catch (error) {
            this.logger?.logWarning(`${command} rejected`, {
                ...parameters,
                error: error instanceof Error ? error.message : String(error),
            });
            throw error;
        }
    }
}
