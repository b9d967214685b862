/**
 * Core data types shared by the forward (tile/window) and inverse
 * (untile/unwindow) paths.
 *
 * @module tessera
 */

/**
 * Channel layout of a frame. `peak` is the sample value that maps to 255 on the
 * 8-bit scale: 1 for float content, 255 for 8-bit, 65535 for 16-bit.
 */
export interface FrameFormat {
    channels: number;
    peak: number;
}

/**
 * One rectangular grid of samples. Samples are interleaved by channel and
 * stored row-major: index = (y * width + x) * channels + c.
 */
export interface Frame {
    width: number;
    height: number;
    format: FrameFormat;
    data: Float32Array;
}

export interface FrameShape {
    width: number;
    height: number;
    format: FrameFormat;
}

export type Axis = 'width' | 'height' | 'time';

export type Awaitable<T> = T | Promise<T>;

/**
 * Random-access provider consumed by the engine. The engine fetches in order,
 * never more than one unit ahead, and may fetch the same index again.
 */
export interface SequenceSource<T> {
    length(): number;
    get(index: number): Awaitable<T>;
}

export interface FrameSequence extends SequenceSource<Frame> {
    shape(): FrameShape;
}

/**
 * Boundary policy tag as it travels in unit metadata.
 * `pad:<mode>` records the fill mode name used for the boundary unit.
 */
export type BoundaryTag = `pad:${string}` | 'discard' | 'none';

/** Per-axis provenance recorded on every produced unit. */
export interface AxisTag {
    /** Extent of the source along this axis before partitioning. */
    extent: number;
    unitSize: number;
    overlap: number;
    unitCount: number;
    index: number;
    boundary: BoundaryTag;
}

export const METADATA_VERSION = 1;

export interface TileMetadata {
    version: typeof METADATA_VERSION;
    kind: 'tile';
    axes: { width: AxisTag; height: AxisTag };
}

export interface WindowMetadata {
    version: typeof METADATA_VERSION;
    kind: 'window';
    axes: { time: AxisTag };
}

export type UnitMetadata = TileMetadata | WindowMetadata;

/**
 * A partitioned piece. Content may be replaced by an external stage; metadata
 * must survive untouched. A unit without metadata can only be reconstructed
 * with manual parameters.
 */
export interface Unit<C, M extends UnitMetadata = UnitMetadata> {
    content: C;
    meta?: M;
}

export type Tile = Unit<Frame, TileMetadata>;
export type Window = Unit<readonly Frame[], WindowMetadata>;
