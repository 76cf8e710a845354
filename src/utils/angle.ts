export const TWO_PI = 2 * Math.PI;

const RAD_TO_DEG = 180 / Math.PI;
const DEG_TO_RAD = Math.PI / 180;

export const degToRad = (deg: number): number => deg * DEG_TO_RAD;

export const radToDeg = (rad: number): number => rad * RAD_TO_DEG;

// Values already inside [0, period) come back unchanged, bit for bit.
const wrapInto = (value: number, period: number): number => {
    const remainder = value % period;
    if (remainder < 0) {
        const shifted = remainder + period;
        // A tiny negative remainder can round up to the period itself.
        return shifted < period ? shifted : 0;
    }
    return remainder + 0; // -0 becomes 0
};

/**
 * Wraps an angle in radians into [0, 2π).
 */
export const wrapNonNegative = (rad: number): number => wrapInto(rad, TWO_PI);

/**
 * Wraps an angle in degrees into [0, 360).
 */
export const wrapNonNegativeDeg = (deg: number): number => wrapInto(deg, 360);
