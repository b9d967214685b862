import type { Awaitable, Frame } from '../tessera-types.js';
import { InvalidParameterError } from './errors.js';

export type TesseraLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

export type InpaintMethod = 'telea' | 'ns' | 'fsr' | 'fillmargins' | 'fixborders';

/**
 * Pluggable synthesis capability for the `inpaint` fill mode. Receives the
 * source frame and returns it grown by `right` x `bottom` samples.
 */
export interface Inpainter {
    supports(method: InpaintMethod): boolean;
    extend(frame: Frame, border: { right: number; bottom: number }, method: InpaintMethod): Awaitable<Frame>;
}

/**
 * Weight ramp for the overlap region. Every ramp decreases monotonically.
 *
 * - `linear`: 1 - p/O, starts at 1
 * - `cosine`: (1 + cos(pi * p/O)) / 2, starts at 1
 * - `centered`: 1 - (p + 0.5)/O, samples the linear ramp at pixel centres, so
 *   it starts at 1 - 1/(2O) and is symmetric around the seam
 */
export type RampKind = 'linear' | 'cosine' | 'centered';

export type ReconstructionMode = 'crop' | 'fade';

/**
 * Reproducible reconstruction presets.
 *
 * - `exact`: hard crop at the middle of each overlap (default)
 * - `feather`: linear cross-fade across overlaps
 * - `seamless`: cosine cross-fade across overlaps
 */
export type ReconstructionPreset = 'exact' | 'feather' | 'seamless';

export const RECONSTRUCTION_PRESETS: Record<ReconstructionPreset, { fade: boolean; ramp: RampKind }> = {
    exact:    { fade: false, ramp: 'linear' },
    feather:  { fade: true,  ramp: 'linear' },
    seamless: { fade: true,  ramp: 'cosine' },
};

export type TesseraOptions = {
    /** Optional logger hook; nothing in src/ writes to the console. */
    logger?: TesseraLogger | null;
    /** Upper bound on tiles per frame (default 1024). */
    maxTilesPerFrame?: number;
    /** Samples of slack allowed when checking that a resize was uniform (default 1). */
    scaleTolerance?: number;
    /** Overlap ramp used in fade mode (default `linear`). */
    ramp?: RampKind;
    /** Required for the `inpaint` fill mode. */
    inpainter?: Inpainter | null;
};

export const DEFAULT_OPTIONS: Readonly<Required<TesseraOptions>> = Object.freeze({
    logger: null,
    maxTilesPerFrame: 1024,
    scaleTolerance: 1,
    ramp: 'linear',
    inpainter: null,
});

export function resolveOptions(options: TesseraOptions = {}): Required<TesseraOptions> {
    const merged: Required<TesseraOptions> = { ...DEFAULT_OPTIONS };
    if (options.logger !== undefined) merged.logger = options.logger;
    if (options.maxTilesPerFrame !== undefined) merged.maxTilesPerFrame = options.maxTilesPerFrame;
    if (options.scaleTolerance !== undefined) merged.scaleTolerance = options.scaleTolerance;
    if (options.ramp !== undefined) merged.ramp = options.ramp;
    if (options.inpainter !== undefined) merged.inpainter = options.inpainter;

    if (!Number.isInteger(merged.maxTilesPerFrame) || merged.maxTilesPerFrame < 1) {
        throw new InvalidParameterError(`maxTilesPerFrame must be a positive integer (got ${merged.maxTilesPerFrame})`);
    }
    if (!Number.isFinite(merged.scaleTolerance) || merged.scaleTolerance < 0) {
        throw new InvalidParameterError(`scaleTolerance can not be negative (got ${merged.scaleTolerance})`);
    }
    return merged;
}
