// src/utils/rounding.ts

/**
 * Round to the nearest integer, halves away from zero (2.5 -> 3, -2.5 -> -3)
 *
 * Non-finite values pass through unchanged. Never returns -0.
 */
export function roundHalfAwayFromZero(value: number): number {
    if (!Number.isFinite(value)) {
        return value;
    }

    const rounded = Math.round(Math.abs(value));
    return value < 0 && rounded !== 0 ? -rounded : rounded;
}
