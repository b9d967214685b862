import type {
    Axis,
    AxisTag,
    BoundaryTag,
    FrameFormat,
    FrameShape,
    SequenceSource,
    Tile,
    TileMetadata,
    Window,
    WindowMetadata,
} from '../tessera-types.js';
import { toPair } from '../tessera-utils.js';
import {
    AmbiguousAxisError,
    InvalidParameterError,
    MissingParameterError,
    ShapeMismatchError,
} from './errors.js';
import { frameShape } from './frame.js';
import { describeAxis, sameCall } from './metadata.js';
import { countUnits } from './partition.js';
import type { AxisLayout } from './reconstruct.js';
import { detectScale, scaleAxis, ScaleDetector } from './scale.js';
import type { RampKind, ReconstructionMode, TesseraLogger, TesseraOptions } from './types.js';
import { resolveOptions } from './types.js';

export interface AxisOverrides {
    fullExtent?: number;
    unitSize?: number;
    overlap?: number;
}

export interface AxisEvidence {
    axis: Axis;
    /** Tag read from the first unit, if it carried metadata. */
    tag?: AxisTag;
    /** Observed size of the first unit along the axis. */
    observed: number;
    /** Scale factor detected on the first unit (1 without metadata). */
    factor: number;
    /** Units present along the axis, when it can be counted. */
    present: number | null;
}

export interface ResolvedAxis extends AxisLayout {
    axis: Axis;
    /** Extent the reconstruction aims for, in current (possibly resized) samples. */
    fullExtent: number;
    boundary: BoundaryTag | null;
    scale: number;
    source: 'auto' | 'manual';
}

export interface TileReconstructionPlan {
    kind: 'tile';
    columns: ResolvedAxis;
    rows: ResolvedAxis;
    tilesPerFrame: number;
    frameCount: number;
    format: FrameFormat;
    mode: ReconstructionMode;
    ramp: RampKind;
    /** Metadata of the first tile; every other tile must come from the same call. */
    reference: TileMetadata | null;
}

export interface WindowReconstructionPlan {
    kind: 'window';
    time: ResolvedAxis;
    /** Shape of the first frame of the first window. */
    shape: FrameShape;
    mode: ReconstructionMode;
    ramp: RampKind;
    reference: WindowMetadata | null;
}

export interface UntileParams {
    /** Blend across overlaps instead of cropping them. */
    fade?: boolean;
    ramp?: RampKind;
    fullWidth?: number;
    fullHeight?: number;
    tileWidth?: number;
    tileHeight?: number;
    /** Scalar, or `[width, height]`. */
    overlap?: number | readonly [number, number];
}

export interface UnwindowParams {
    fade?: boolean;
    ramp?: RampKind;
    fullLength?: number;
    windowLength?: number;
    overlap?: number;
}

/**
 * Natural length of a tagged unit: full size, except the last unit of an axis
 * left short by the `none` policy.
 */
export function taggedUnitLength(tag: AxisTag): number {
    if (tag.boundary !== 'none' || tag.index !== tag.unitCount - 1) return tag.unitSize;
    const stride = tag.unitSize - tag.overlap;
    const deficit = Math.max(0, tag.unitCount * stride + tag.overlap - tag.extent);
    return tag.unitSize - deficit;
}

function checkOverride(value: number | undefined, name: string, op: string, min: number): void {
    if (value === undefined) return;
    if (!Number.isInteger(value) || value < min) {
        throw new InvalidParameterError(`${op}: ${name} must be an integer >= ${min} (got ${value})`);
    }
}

/**
 * Reconcile manual overrides with what the metadata and the first unit say.
 */
export function resolveAxis(
    evidence: AxisEvidence,
    overrides: AxisOverrides,
    op: string,
    logger: TesseraLogger | null = null,
): ResolvedAxis {
    const { axis, tag, observed, factor, present } = evidence;
    const manual = overrides.fullExtent !== undefined || overrides.unitSize !== undefined || overrides.overlap !== undefined;

    checkOverride(overrides.fullExtent, `full ${axis} extent`, op, 1);
    checkOverride(overrides.unitSize, `${axis} unit size`, op, 1);
    checkOverride(overrides.overlap, `${axis} overlap`, op, 0);

    let detected: { fullExtent: number; unitSize: number; overlap: number; unitCount: number; outputExtent: number } | null = null;
    if (tag) {
        const scaled = scaleAxis(tag, factor);
        const unitSize = taggedUnitLength(tag) === tag.unitSize && tag.index === 0 ? observed : scaled.unitSize;
        const overlap = Math.min(scaled.overlap, unitSize - 1);
        const stride = unitSize - overlap;
        const coverage = scaled.unitCount * stride + overlap;
        let outputExtent: number;
        if (tag.boundary === 'discard') {
            outputExtent = coverage;
        } else if (scaled.extent > coverage) {
            // rounding of a non-integer scale can leave the scaled extent a few samples past the units
            if (scaled.extent - coverage > scaled.unitCount) {
                throw new ShapeMismatchError(
                    `${op}: ${axis} extent ${scaled.extent} is not covered by ${scaled.unitCount} unit(s) of ${unitSize} (overlap ${overlap})`,
                );
            }
            outputExtent = coverage;
        } else {
            outputExtent = scaled.extent;
        }
        detected = { fullExtent: scaled.extent, unitSize, overlap, unitCount: scaled.unitCount, outputExtent };
    }

    if (!manual) {
        if (!detected) {
            throw new AmbiguousAxisError(
                `${op}: units carry no metadata for the ${axis} axis. Did you pass the right sequence? You can also provide the parameters manually.`,
            );
        }
        const stride = detected.unitSize - detected.overlap;
        if (present !== null && present !== detected.unitCount) {
            throw new ShapeMismatchError(
                `${op}: found ${present} unit(s) along ${axis} but metadata says ${detected.unitCount}. ` +
                'If boundary units were dropped after partitioning, pass the reduced full extent manually.',
            );
        }
        return {
            axis,
            fullExtent: detected.fullExtent,
            unitSize: detected.unitSize,
            overlap: detected.overlap,
            stride,
            unitCount: detected.unitCount,
            outputExtent: detected.outputExtent,
            boundary: tag ? tag.boundary : null,
            scale: factor,
            source: 'auto',
        };
    }

    const fullExtent = overrides.fullExtent ?? detected?.outputExtent;
    const unitSize = overrides.unitSize ?? detected?.unitSize ?? observed;
    const overlap = overrides.overlap ?? detected?.overlap;
    if (fullExtent === undefined) {
        throw new MissingParameterError(`${op}: full ${axis} extent is required when units carry no metadata`);
    }
    if (overlap === undefined) {
        throw new MissingParameterError(`${op}: ${axis} overlap is required when units carry no metadata`);
    }
    if (overlap >= unitSize) {
        throw new InvalidParameterError(`${op}: ${axis} overlap must be smaller than unit size (overlap ${overlap}, unit ${unitSize})`);
    }
    if (tag) {
        logger?.warn?.(`[${op}] manual ${axis} parameters override metadata (${describeAxis(tag)})`);
    }

    const unitCount = countUnits(fullExtent, unitSize, overlap);
    if (present !== null && present !== unitCount) {
        throw new ShapeMismatchError(
            `${op}: found ${present} unit(s) along ${axis} but full extent ${fullExtent} with unit ${unitSize} and overlap ${overlap} needs ${unitCount}`,
        );
    }
    return {
        axis,
        fullExtent,
        unitSize,
        overlap,
        stride: unitSize - overlap,
        unitCount,
        outputExtent: fullExtent,
        boundary: tag ? tag.boundary : null,
        scale: factor,
        source: 'manual',
    };
}

/**
 * Check one window against the resolved time axis: same forward call, tagged
 * at its position, resized by the plan's factor, and of the expected length
 * (the last window may be shorter).
 */
export function checkWindow(
    unit: Window,
    index: number,
    time: ResolvedAxis,
    reference: WindowMetadata | null,
    scale: ScaleDetector,
): void {
    const { content, meta } = unit;

    if (reference) {
        if (!meta) {
            if (time.source === 'auto') throw new ShapeMismatchError(`unwindow: window ${index} lost its metadata`);
        } else {
            if (!sameCall(meta, reference)) {
                throw new ShapeMismatchError(`unwindow: window ${index} comes from a different window() call`);
            }
            if (meta.axes.time.index !== index) {
                throw new ShapeMismatchError(
                    `unwindow: window ${index} is tagged ${meta.axes.time.index}. Was the sequence reordered?`,
                );
            }
            if (content.length > 0) scale.observe([content.length], [taggedUnitLength(meta.axes.time)]);
        }
    }
    const isLast = index === time.unitCount - 1;
    if (isLast ? content.length === 0 || content.length > time.unitSize : content.length !== time.unitSize) {
        throw new ShapeMismatchError(
            `unwindow: window ${index} has ${content.length} frame(s), expected ${isLast ? `1 to ${time.unitSize}` : time.unitSize}`,
        );
    }
}

function tileMeta(tile: Tile, op: string): TileMetadata | null {
    if (!tile.meta) return null;
    if (tile.meta.kind !== 'tile') throw new ShapeMismatchError(`${op}: expected tile metadata, found ${tile.meta.kind}`);
    return tile.meta;
}

function windowMeta(window: Window, op: string): WindowMetadata | null {
    if (!window.meta) return null;
    if (window.meta.kind !== 'window') throw new ShapeMismatchError(`${op}: expected window metadata, found ${window.meta.kind}`);
    return window.meta;
}

/**
 * Inspect the first tile and build the reconstruction plan of a tiled
 * sequence.
 */
export async function resolveTiles(
    tiles: SequenceSource<Tile>,
    params: UntileParams = {},
    options: TesseraOptions = {},
): Promise<TileReconstructionPlan> {
    const op = 'untile';
    const opts = resolveOptions(options);
    const total = tiles.length();
    if (total === 0) throw new ShapeMismatchError(`${op}: no tiles to reconstruct`);

    const first = await tiles.get(0);
    const meta = tileMeta(first, op);
    const observed: [number, number] = [first.content.width, first.content.height];
    const factor = meta
        ? detectScale(observed, [meta.axes.width.unitSize, meta.axes.height.unitSize], opts.scaleTolerance)
        : 1;

    const overlap = params.overlap === undefined ? [undefined, undefined] : toPair(params.overlap);
    const columns = resolveAxis(
        { axis: 'width', tag: meta?.axes.width, observed: observed[0], factor, present: null },
        { fullExtent: params.fullWidth, unitSize: params.tileWidth, overlap: overlap[0] },
        op,
        opts.logger,
    );
    const rows = resolveAxis(
        { axis: 'height', tag: meta?.axes.height, observed: observed[1], factor, present: null },
        { fullExtent: params.fullHeight, unitSize: params.tileHeight, overlap: overlap[1] },
        op,
        opts.logger,
    );

    const tilesPerFrame = columns.unitCount * rows.unitCount;
    if (tilesPerFrame > opts.maxTilesPerFrame) {
        throw new InvalidParameterError(
            `${op}: this would assemble ${tilesPerFrame} tiles per frame (max ${opts.maxTilesPerFrame}). Check the manual parameters.`,
        );
    }
    if (total % tilesPerFrame !== 0) {
        throw new ShapeMismatchError(
            `${op}: sequence length (${total} tiles) is not divisible by the tiles per frame (${tilesPerFrame}). Was the sequence trimmed after tiling?`,
        );
    }

    const mode: ReconstructionMode = params.fade ? 'fade' : 'crop';
    const ramp = params.ramp ?? opts.ramp;
    opts.logger?.info?.(
        `[${op}] ${columns.unitCount}x${rows.unitCount} tiles of ${columns.unitSize}x${rows.unitSize} ` +
        `-> ${columns.outputExtent}x${rows.outputExtent} (${columns.source}, ${mode}${mode === 'fade' ? `/${ramp}` : ''})`,
    );
    if (factor !== 1) opts.logger?.info?.(`[${op}] tiles were resized by ${factor.toFixed(4)}`);

    return {
        kind: 'tile',
        columns,
        rows,
        tilesPerFrame,
        frameCount: total / tilesPerFrame,
        format: first.content.format,
        mode,
        ramp,
        reference: meta,
    };
}

/**
 * Inspect the first and last window and build the reconstruction plan of a
 * windowed sequence.
 */
export async function resolveWindows(
    windows: SequenceSource<Window>,
    params: UnwindowParams = {},
    options: TesseraOptions = {},
): Promise<WindowReconstructionPlan> {
    const op = 'unwindow';
    const opts = resolveOptions(options);
    const total = windows.length();
    if (total === 0) throw new ShapeMismatchError(`${op}: no windows to reconstruct`);

    const first = await windows.get(0);
    const meta = windowMeta(first, op);
    if (first.content.length === 0) throw new ShapeMismatchError(`${op}: window 0 is empty`);
    const factor = meta
        ? detectScale([first.content.length], [taggedUnitLength(meta.axes.time)], opts.scaleTolerance)
        : 1;

    const resolved = resolveAxis(
        { axis: 'time', tag: meta?.axes.time, observed: first.content.length, factor, present: total },
        { fullExtent: params.fullLength, unitSize: params.windowLength, overlap: params.overlap },
        op,
        opts.logger,
    );

    // the last window may be short (policy `none`); the output stops where it ends
    const last = total === 1 ? first : await windows.get(total - 1);
    checkWindow(last, total - 1, resolved, meta, new ScaleDetector(opts.scaleTolerance, resolved.scale));
    const reach = (resolved.unitCount - 1) * resolved.stride + last.content.length;
    const time: ResolvedAxis = { ...resolved, outputExtent: Math.min(resolved.outputExtent, reach) };

    const mode: ReconstructionMode = params.fade ? 'fade' : 'crop';
    const ramp = params.ramp ?? opts.ramp;
    opts.logger?.info?.(
        `[${op}] ${time.unitCount} window(s) of ${time.unitSize} (overlap ${time.overlap}) -> ${time.outputExtent} frames ` +
        `(${time.source}, ${mode}${mode === 'fade' ? `/${ramp}` : ''})`,
    );
    if (factor !== 1) opts.logger?.info?.(`[${op}] windows were retimed by ${factor.toFixed(4)}`);

    return { kind: 'window', time, shape: frameShape(first.content[0]), mode, ramp, reference: meta };
}
