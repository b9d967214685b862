/**
 * Spatial partition: frames -> overlapping tiles, and back.
 *
 * Tiles are emitted interleaved by frame, row-major inside a frame: tile `k`
 * belongs to frame `floor(k / T)` and sits at grid cell `k % T`, where `T` is
 * the number of tiles per frame.
 */

import type { Frame, FrameSequence, FrameShape, SequenceSource, Tile } from '../tessera-types.js';
import { toPair } from '../tessera-utils.js';
import { InvalidParameterError, ShapeMismatchError, UnsupportedModeError } from './errors.js';
import { normalizeColor, readRegion, type Border } from './fill.js';
import { createFrame, cropFrame, describeShape, sameFormat, sameShape } from './frame.js';
import { sameCall, tagTile } from './metadata.js';
import { parseBoundary, planGrid, type BoundaryPolicy, type GridPlan, type PaddingSpec } from './partition.js';
import { axisContributions, gridContributions, type Contribution } from './reconstruct.js';
import { resolveTiles, type TileReconstructionPlan, type UntileParams } from './resolve.js';
import { ScaleDetector } from './scale.js';
import { LazyFrameSequence, PartitionedSequence } from './sequence.js';
import { resolveOptions, type Inpainter, type TesseraOptions } from './types.js';

export interface TileParams {
    /** Tile width in samples (default 256). */
    width?: number;
    /** Tile height in samples (default 256). */
    height?: number;
    /** Scalar, or `[width, height]` (default 16). */
    overlap?: number | readonly [number, number];
    /** Fill for the right and bottom boundary tiles, or `discard` (default `mirror`). */
    padding?: Exclude<PaddingSpec, 'none'>;
}

export const TILE_DEFAULTS: Readonly<Required<TileParams>> = Object.freeze({ width: 256, height: 256, overlap: 16, padding: 'mirror' });

function checkFill(boundary: BoundaryPolicy, grid: GridPlan, shape: FrameShape, inpainter: Inpainter | null): void {
    if (boundary.kind !== 'pad') return;
    const { fill } = boundary;
    if (fill.mode === 'color') normalizeColor(fill.color, shape.format);
    if (fill.mode === 'falloff' && fill.color) normalizeColor(fill.color, shape.format);
    if (fill.mode === 'inpaint' && (grid.columns.deficit > 0 || grid.rows.deficit > 0)) {
        if (!inpainter || !inpainter.supports(fill.method)) {
            throw new UnsupportedModeError(`tile: fill mode '${fill.method}' needs an inpainter that supports it`);
        }
    }
}

/**
 * Split every frame into a grid of overlapping tiles. Nothing is read until a
 * tile is requested; each request fetches exactly one source frame.
 */
export function tile(
    frames: FrameSequence,
    params: TileParams = {},
    options: TesseraOptions = {},
): PartitionedSequence<Tile, GridPlan> {
    const opts = resolveOptions(options);
    const shape = frames.shape();
    const boundary = parseBoundary(params.padding ?? TILE_DEFAULTS.padding);
    const grid = planGrid(
        shape.width,
        shape.height,
        [params.width ?? TILE_DEFAULTS.width, params.height ?? TILE_DEFAULTS.height],
        toPair(params.overlap ?? TILE_DEFAULTS.overlap),
        boundary,
        opts.maxTilesPerFrame,
    );
    checkFill(boundary, grid, shape, opts.inpainter);

    const { columns, rows, tilesPerFrame } = grid;
    const border: Border = boundary.kind === 'pad'
        ? { right: columns.deficit, bottom: rows.deficit }
        : { right: 0, bottom: 0 };

    opts.logger?.info?.(
        `[tile] ${describeShape(shape)} -> ${columns.unitCount}x${rows.unitCount} tiles of ` +
        `${columns.unitSize}x${rows.unitSize} (overlap ${columns.overlap}x${rows.overlap}, ${boundary.kind})`,
    );

    return new PartitionedSequence(grid, frames.length() * tilesPerFrame, async index => {
        const cell = index % tilesPerFrame;
        const col = cell % columns.unitCount;
        const row = Math.floor(cell / columns.unitCount);
        const frameIndex = Math.floor(index / tilesPerFrame);

        const frame = await frames.get(frameIndex);
        if (!sameShape(frame, shape)) {
            throw new ShapeMismatchError(`tile: frame ${frameIndex} is ${describeShape(frame)}, expected ${describeShape(shape)}`);
        }
        const region = { left: col * columns.stride, top: row * rows.stride, width: columns.unitSize, height: rows.unitSize };
        const content = boundary.kind === 'pad'
            ? await readRegion(frame, region, border, boundary.fill, opts.inpainter)
            : cropFrame(frame, region);
        return { content, meta: tagTile(grid, col, row) };
    });
}

function checkTile(unit: Tile, col: number, row: number, index: number, plan: TileReconstructionPlan, scale: ScaleDetector): void {
    const { columns, rows, reference } = plan;
    const { content, meta } = unit;

    if (reference) {
        if (!meta) {
            if (columns.source === 'auto') throw new ShapeMismatchError(`untile: tile ${index} lost its metadata`);
        } else {
            if (!sameCall(meta, reference)) {
                throw new ShapeMismatchError(`untile: tile ${index} comes from a different tile() call`);
            }
            if (meta.axes.width.index !== col || meta.axes.height.index !== row) {
                throw new ShapeMismatchError(
                    `untile: tile ${index} is tagged (${meta.axes.width.index}, ${meta.axes.height.index}) ` +
                    `but sits at (${col}, ${row}). Was the sequence reordered?`,
                );
            }
            scale.observe([content.width, content.height], [meta.axes.width.unitSize, meta.axes.height.unitSize]);
        }
    }
    if (content.width !== columns.unitSize || content.height !== rows.unitSize) {
        throw new ShapeMismatchError(
            `untile: tile ${index} is ${content.width}x${content.height}, expected ${columns.unitSize}x${rows.unitSize}`,
        );
    }
    if (!sameFormat(content.format, plan.format)) {
        throw new ShapeMismatchError(`untile: tile ${index} has ${content.format.channels} channel(s), expected ${plan.format.channels}`);
    }
}

function assemble(
    grid: readonly Frame[],
    plan: TileReconstructionPlan,
    colParts: readonly Contribution[][],
    rowParts: readonly Contribution[][],
): Frame {
    const width = plan.columns.outputExtent;
    const height = plan.rows.outputExtent;
    const out = createFrame(width, height, plan.format);
    const channels = plan.format.channels;
    const tileWidth = plan.columns.unitSize;

    for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
            const dst = (y * width + x) * channels;
            for (const part of gridContributions(colParts[x], rowParts[y])) {
                const source = grid[part.row * plan.columns.unitCount + part.col];
                const src = (part.offsetY * tileWidth + part.offsetX) * channels;
                for (let c = 0; c < channels; c++) out.data[dst + c] += part.weight * source.data[src + c];
            }
        }
    }
    return out;
}

/**
 * Assemble frames from tiles along a resolved plan. Output frame `f` fetches
 * the `T` tiles of that frame and nothing else.
 */
export function reconstructTiles(
    tiles: SequenceSource<Tile>,
    plan: TileReconstructionPlan,
    options: TesseraOptions = {},
): LazyFrameSequence {
    const opts = resolveOptions(options);
    const colParts = axisContributions(plan.columns, plan.mode, plan.ramp);
    const rowParts = axisContributions(plan.rows, plan.mode, plan.ramp);
    if (plan.frameCount * plan.tilesPerFrame > tiles.length()) {
        throw new InvalidParameterError(`untile: plan needs ${plan.frameCount * plan.tilesPerFrame} tiles, sequence has ${tiles.length()}`);
    }
    const shape = { width: plan.columns.outputExtent, height: plan.rows.outputExtent, format: plan.format };

    return new LazyFrameSequence(shape, plan.frameCount, async frameIndex => {
        const scale = new ScaleDetector(opts.scaleTolerance, plan.columns.scale);
        const base = frameIndex * plan.tilesPerFrame;
        const grid: Frame[] = [];
        for (let cell = 0; cell < plan.tilesPerFrame; cell++) {
            const unit = await tiles.get(base + cell);
            checkTile(unit, cell % plan.columns.unitCount, Math.floor(cell / plan.columns.unitCount), base + cell, plan, scale);
            grid.push(unit.content);
        }
        return assemble(grid, plan, colParts, rowParts);
    });
}

/**
 * Reassemble full frames from (possibly processed and resized) tiles.
 *
 * Parameters are read from the tiles' metadata; any value passed in `params`
 * overrides it. Tiles without metadata need `fullWidth`, `fullHeight` and
 * `overlap`.
 */
export async function untile(
    tiles: SequenceSource<Tile>,
    params: UntileParams = {},
    options: TesseraOptions = {},
): Promise<LazyFrameSequence> {
    const plan = await resolveTiles(tiles, params, options);
    return reconstructTiles(tiles, plan, options);
}
