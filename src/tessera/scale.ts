import type { AxisTag } from '../tessera-types.js';
import { clamp, roundHalfUp } from '../tessera-utils.js';
import { InconsistentScaleError, InvalidParameterError } from './errors.js';

export interface ScaledAxis {
    extent: number;
    unitSize: number;
    overlap: number;
    unitCount: number;
}

function checkSizes(observed: readonly number[], tagged: readonly number[]): void {
    if (observed.length === 0 || observed.length !== tagged.length) {
        throw new InvalidParameterError(`detectScale: need one observed size per tagged size (got ${observed.length} and ${tagged.length})`);
    }
    for (const v of [...observed, ...tagged]) {
        if (!Number.isFinite(v) || v <= 0) throw new InvalidParameterError(`detectScale: sizes must be positive (got ${v})`);
    }
}

function verify(observed: readonly number[], tagged: readonly number[], factor: number, tolerance: number): void {
    for (let k = 0; k < observed.length; k++) {
        const expected = roundHalfUp(tagged[k] * factor);
        if (Math.abs(observed[k] - expected) > tolerance) {
            throw new InconsistentScaleError(
                `Non-uniform resize: size ${observed[k]} (tagged ${tagged[k]}) does not match scale factor ` +
                `${factor.toFixed(4)} (expected ${expected} ± ${tolerance})`,
            );
        }
    }
}

/**
 * Scale factor implied by observed vs tagged sizes of one unit, one entry per
 * axis. The first axis fixes the factor; the others must agree within
 * `tolerance` samples.
 */
export function detectScale(observed: readonly number[], tagged: readonly number[], tolerance = 1): number {
    checkSizes(observed, tagged);
    const factor = observed[0] / tagged[0];
    verify(observed, tagged, factor, tolerance);
    return factor;
}

/**
 * Checks every unit of one reconstruction against one factor: the one it is
 * given, or else the one implied by the first unit it sees.
 */
export class ScaleDetector {
    private factor: number | null;

    constructor(private readonly tolerance: number = 1, factor: number | null = null) {
        this.factor = factor;
    }

    observe(observed: readonly number[], tagged: readonly number[]): number {
        if (this.factor === null) {
            this.factor = detectScale(observed, tagged, this.tolerance);
            return this.factor;
        }
        checkSizes(observed, tagged);
        verify(observed, tagged, this.factor, this.tolerance);
        return this.factor;
    }
}

/**
 * Apply a scale factor to the geometry of an axis. The unit count is topology
 * and is kept. Overlap is clamped so the stride stays positive.
 */
export function scaleAxis(tag: AxisTag, factor: number): ScaledAxis {
    const unitSize = Math.max(1, roundHalfUp(tag.unitSize * factor));
    const overlap = clamp(roundHalfUp(tag.overlap * factor), 0, unitSize - 1);
    const extent = Math.max(1, roundHalfUp(tag.extent * factor));
    return { extent, unitSize, overlap, unitCount: tag.unitCount };
}
