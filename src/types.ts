export type MotionPhase = 'STOPPED' | 'MOVING' | 'CRAWLING' | 'PARKING' | 'PARKED' | 'STOPPING';

// Phases that can be stored as the engine's commanded phase.
export type CommandedPhase = Extract<MotionPhase, 'MOVING' | 'CRAWLING' | 'PARKING' | 'STOPPING'>;

export type OnOff = 'ON' | 'OFF';

export interface MotionSample {
    position: number; // rad, wrapped into [0, 2π)
    velocity: number; // rad/s
    phase: MotionPhase;
}

export interface EngineState {
    startPosition: number;
    startTime: number;
    endPosition: number;
    endTime: number;
    crawlVelocity: number;
    commandedPhase: CommandedPhase;
    maxSpeed: number;
}

export interface AmcsLimits {
    jmax: number; // deg/s^3
    amax: number; // deg/s^2
    vmax: number; // deg/s
}

export interface SensorChannels {
    driveTorqueActual: number[];
    driveTorqueCommanded: number[];
    driveCurrentActual: number[];
    driveTemperature: number[];
    encoderHeadRaw: number[];
    encoderHeadCalibrated: number[];
    resolverRaw: number[];
    resolverCalibrated: number[];
}

export interface AmcsStatusFlags {
    error: readonly string[];
    status: MotionPhase;
    fans: OnOff;
    inflate: OnOff;
}

export interface AmcsSnapshot {
    readonly status: Readonly<AmcsStatusFlags>;
    readonly positionActual: number; // deg
    readonly positionCommanded: number; // deg
    readonly velocityActual: number; // deg/s
    readonly velocityCommanded: number; // deg/s
    readonly driveTorqueActual: readonly number[];
    readonly driveTorqueCommanded: readonly number[];
    readonly driveCurrentActual: readonly number[];
    readonly driveTemperature: readonly number[];
    readonly encoderHeadRaw: readonly number[];
    readonly encoderHeadCalibrated: readonly number[];
    readonly resolverRaw: readonly number[];
    readonly resolverCalibrated: readonly number[];
    readonly timestamp: number; // TAI s
}
