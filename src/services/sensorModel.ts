import {
    DEFAULT_AMBIENT_TEMPERATURE_C,
    DEFAULT_ENCODER_OFFSETS_DEG,
    DEFAULT_MAX_TEMPERATURE_RISE_C,
    DEFAULT_RATED_TORQUE_NM,
    DEFAULT_THERMAL_TIME_CONSTANT_S,
    DEFAULT_TORQUE_CONSTANT_NM_PER_A,
    NUM_MOTORS,
} from '../constants/control';
import type { SensorChannels } from '../types';

export interface SensorInput {
    elapsed: number; // s since the aggregator started
    positionDeg: number;
    velocityDeg: number;
    maxSpeedDeg: number;
}

export interface SensorModel {
    sample(input: SensorInput): SensorChannels;
}

export interface DriftSensorModelOptions {
    numMotors?: number;
    ambientTemperature?: number;
    maxTemperatureRise?: number;
    thermalTimeConstant?: number;
    ratedTorque?: number;
    torqueConstant?: number;
    encoderOffsets?: number[];
}

const fill = (count: number, value: number): number[] => Array.from({ length: count }, () => value);

/**
 * Synthetic drive channels with no claim to physical accuracy. Every value is
 * a deterministic function of its input: torque follows the velocity, the
 * temperature rises towards a bounded plateau, and the encoders report the
 * azimuth plus a fixed per-motor offset on the raw channels.
 */
export const createDriftSensorModel = ({
    numMotors = NUM_MOTORS,
    ambientTemperature = DEFAULT_AMBIENT_TEMPERATURE_C,
    maxTemperatureRise = DEFAULT_MAX_TEMPERATURE_RISE_C,
    thermalTimeConstant = DEFAULT_THERMAL_TIME_CONSTANT_S,
    ratedTorque = DEFAULT_RATED_TORQUE_NM,
    torqueConstant = DEFAULT_TORQUE_CONSTANT_NM_PER_A,
    encoderOffsets = DEFAULT_ENCODER_OFFSETS_DEG,
}: DriftSensorModelOptions = {}): SensorModel => ({
    sample: ({ elapsed, positionDeg, velocityDeg, maxSpeedDeg }) => {
        const torque = maxSpeedDeg > 0 ? (ratedTorque * velocityDeg) / maxSpeedDeg : 0;
        const current = Math.abs(torque) / torqueConstant;
        const rise = maxTemperatureRise * (1 - Math.exp(-Math.max(0, elapsed) / thermalTimeConstant));
        const offsets = Array.from({ length: numMotors }, (_, index) => encoderOffsets[index] ?? 0);
        return {
            driveTorqueActual: fill(numMotors, torque),
            driveTorqueCommanded: fill(numMotors, torque),
            driveCurrentActual: fill(numMotors, current),
            driveTemperature: fill(numMotors, ambientTemperature + rise),
            encoderHeadRaw: offsets.map((offset) => positionDeg + offset),
            encoderHeadCalibrated: fill(numMotors, positionDeg),
            resolverRaw: offsets.map((offset) => positionDeg - offset),
            resolverCalibrated: fill(numMotors, positionDeg),
        };
    },
});
