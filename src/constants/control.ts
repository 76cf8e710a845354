import type { AmcsLimits } from '../types';

export const NUM_MOTORS = 5;

// Hard limits of the drive; configured limits may be lower but never higher.
export const AMCS_HARD_LIMITS: AmcsLimits = {
    jmax: 3.0,
    amax: 0.75,
    vmax: 1.5,
};

export const DEFAULT_AMCS_LIMITS: AmcsLimits = { ...AMCS_HARD_LIMITS };

export const TELEMETRY_PERIOD_MS = 200;

export const TAI_UTC_OFFSET_S = 37;

export const NO_ERROR = 'No Error';

export const AMCS_COMMAND_TOPIC = 'dome/amcs/cmd';
export const AMCS_RESPONSE_TOPIC = 'dome/amcs/cmd/resp';
export const AMCS_STATUS_TOPIC = 'dome/amcs/status';

export const DEFAULT_AMBIENT_TEMPERATURE_C = 20.0;
export const DEFAULT_MAX_TEMPERATURE_RISE_C = 15.0;
export const DEFAULT_THERMAL_TIME_CONSTANT_S = 1_800;
export const DEFAULT_RATED_TORQUE_NM = 40.0;
export const DEFAULT_TORQUE_CONSTANT_NM_PER_A = 2.0;
export const DEFAULT_ENCODER_OFFSETS_DEG = [0.0, 0.25, 0.5, 0.75, 1.0];
