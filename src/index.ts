/**
 * Tessera Public API
 *
 * @module tessera
 */

import type { Frame } from './tessera-types.js';
import { encodeUnitMetadata, decodeUnitMetadata } from './tessera/metadata.js';
import { parseBoundary, planAxis, planGrid, type PaddingSpec } from './tessera/partition.js';
import { fromFrames, mapUnits } from './tessera/sequence.js';
import { tile, untile } from './tessera/tile.js';
import { RECONSTRUCTION_PRESETS, resolveOptions, type TesseraOptions } from './tessera/types.js';
import { window, unwindow } from './tessera/window.js';
import { toPair } from './tessera-utils.js';

export type {
    Axis,
    AxisTag,
    Awaitable,
    BoundaryTag,
    Frame,
    FrameFormat,
    FrameSequence,
    FrameShape,
    SequenceSource,
    Tile,
    TileMetadata,
    Unit,
    UnitMetadata,
    Window,
    WindowMetadata,
} from './tessera-types.js';
export { METADATA_VERSION } from './tessera-types.js';
export type {
    InpaintMethod,
    Inpainter,
    RampKind,
    ReconstructionMode,
    ReconstructionPreset,
    TesseraLogger as Logger,
    TesseraOptions as Options,
} from './tessera/types.js';
export { DEFAULT_OPTIONS, RECONSTRUCTION_PRESETS } from './tessera/types.js';
export {
    AmbiguousAxisError,
    InconsistentScaleError,
    InvalidParameterError,
    MetadataError,
    MissingParameterError,
    ShapeMismatchError,
    TesseraError,
    UnsupportedModeError,
} from './tessera/errors.js';
export type { BoundaryPolicy, GridPlan, PaddingSpec, PartitionPlan } from './tessera/partition.js';
export { countUnits, parseBoundary, planAxis, planGrid, unitSpan } from './tessera/partition.js';
export type { FillMode, FillSpec } from './tessera/fill.js';
export { extendFrame, extendFrames, parseFillMode, readRegion } from './tessera/fill.js';
export type { Region, WeightedFrame } from './tessera/frame.js';
export { blendFrames, createFrame, cropFrame, solidFrame } from './tessera/frame.js';
export { decodeUnitMetadata, encodeUnitMetadata, parseUnitMetadata, sameCall, tagTile, tagWindow } from './tessera/metadata.js';
export { detectScale, scaleAxis, ScaleDetector } from './tessera/scale.js';
export type { AxisLayout, Contribution } from './tessera/reconstruct.js';
export { axisContributions, contributions, rampWeight } from './tessera/reconstruct.js';
export type {
    ResolvedAxis,
    TileReconstructionPlan,
    UntileParams,
    UnwindowParams,
    WindowReconstructionPlan,
} from './tessera/resolve.js';
export { resolveTiles, resolveWindows } from './tessera/resolve.js';
export { filterUnits, fromFrames, LazyFrameSequence, LazySequence, mapUnits, PartitionedSequence } from './tessera/sequence.js';
export type { TileParams } from './tessera/tile.js';
export { reconstructTiles, TILE_DEFAULTS, tile, untile } from './tessera/tile.js';
export type { WindowParams } from './tessera/window.js';
export { reconstructWindows, unwindow, WINDOW_DEFAULTS, window } from './tessera/window.js';

// The Tessera Namespace Object
export const Tessera = {
    /**
     * Splits every frame into overlapping tiles.
     */
    tile,

    /**
     * Reassembles frames from tiles, reading the parameters from their metadata.
     */
    untile,

    /**
     * Groups consecutive frames into overlapping windows.
     */
    window,

    /**
     * Rebuilds the frame sequence from windows.
     */
    unwindow,

    /**
     * Plans a spatial partition without reading any frame.
     */
    planTiles: (
        width: number,
        height: number,
        tileSize: number | readonly [number, number],
        overlap: number | readonly [number, number],
        padding: PaddingSpec = 'mirror',
        options?: TesseraOptions,
    ) => planGrid(width, height, toPair(tileSize), toPair(overlap), parseBoundary(padding), resolveOptions(options).maxTilesPerFrame),

    /**
     * Plans a temporal partition without reading any frame.
     */
    planWindows: (length: number, windowLength: number, overlap: number, padding: PaddingSpec = 'mirror') =>
        planAxis(length, windowLength, overlap, parseBoundary(padding)),

    /**
     * Applies an external per-unit transform, keeping the metadata.
     */
    mapUnits,

    /**
     * Wraps in-memory frames as a sequence.
     */
    fromFrames: (frames: readonly Frame[]) => fromFrames(frames),

    /**
     * Metadata transport for stages that only keep opaque bytes.
     */
    metadata: {
        encode: encodeUnitMetadata,
        decode: decodeUnitMetadata,
    },

    /**
     * Reproducible reconstruction presets (`exact`, `feather`, `seamless`).
     */
    presets: RECONSTRUCTION_PRESETS,
};

export default Tessera;
