/**
 * Integer helpers shared by planning and resolution.
 *
 * @module tessera
 */

/** Round to nearest, ties away from zero for positive input (2.5 -> 3). */
export function roundHalfUp(value: number): number {
    return Math.floor(value + 0.5);
}

export function ceilDiv(a: number, b: number): number {
    return Math.ceil(a / b);
}

export function clamp(value: number, min: number, max: number): number {
    return value < min ? min : value > max ? max : value;
}

export function isNonNegativeInt(value: unknown): value is number {
    return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

export function isPositiveInt(value: unknown): value is number {
    return isNonNegativeInt(value) && value > 0;
}

/**
 * Normalize a scalar-or-pair parameter to a `[width, height]` pair.
 */
export function toPair(value: number | readonly [number, number]): [number, number] {
    if (typeof value === 'number') return [value, value];
    return [value[0], value[1]];
}
