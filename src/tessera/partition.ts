import type { BoundaryTag } from '../tessera-types.js';
import { ceilDiv } from '../tessera-utils.js';
import { InvalidParameterError } from './errors.js';
import { fillModeName, parseFillMode, type FillMode, type FillSpec } from './fill.js';

export type BoundaryPolicy =
    | { kind: 'pad'; fill: FillMode }
    | { kind: 'discard' }
    | { kind: 'none' };

/** Public form of a boundary policy: a fill for `pad`, or the policy name. */
export type PaddingSpec = FillSpec | 'discard' | 'none';

export const PAD_MIRROR: BoundaryPolicy = Object.freeze({ kind: 'pad', fill: Object.freeze({ mode: 'mirror' }) });

/**
 * Partition of one axis. Frozen once built.
 */
export interface PartitionPlan {
    readonly extent: number;
    readonly unitSize: number;
    readonly overlap: number;
    readonly stride: number;
    readonly unitCount: number;
    /** Shortfall of the last unit before the boundary policy was applied. */
    readonly deficit: number;
    readonly boundary: BoundaryPolicy;
    /** Samples covered by the emitted units (may exceed `extent` when padded). */
    readonly coveredExtent: number;
    /** Size of the final unit; smaller than `unitSize` only under `none`. */
    readonly lastUnitSize: number;
}

export interface GridPlan {
    readonly columns: PartitionPlan;
    readonly rows: PartitionPlan;
    readonly tilesPerFrame: number;
}

export interface UnitSpan {
    origin: number;
    size: number;
}

/**
 * Number of units needed to cover `extent` with the given unit size and
 * overlap, before any boundary policy.
 */
export function countUnits(extent: number, unitSize: number, overlap: number): number {
    const stride = unitSize - overlap;
    if (extent <= overlap) return 1;
    return Math.max(1, ceilDiv(extent - overlap, stride));
}

/**
 * Build the partition plan of one axis.
 *
 * Units start at `index * stride`. When the last unit would run past the
 * extent, the boundary policy decides: `pad` keeps the unit at full size (the
 * fill strategy supplies the missing samples), `discard` drops it, `none`
 * leaves it short.
 */
export function planAxis(
    extent: number,
    unitSize: number,
    overlap: number,
    boundary: BoundaryPolicy = PAD_MIRROR,
): PartitionPlan {
    if (!Number.isInteger(extent) || !Number.isInteger(unitSize) || !Number.isInteger(overlap)) {
        throw new InvalidParameterError(`planAxis: extent, unit size and overlap must be integers (got ${extent}, ${unitSize}, ${overlap})`);
    }
    if (unitSize <= 0) throw new InvalidParameterError(`planAxis: unit size must be positive (got ${unitSize})`);
    if (overlap < 0) throw new InvalidParameterError(`planAxis: overlap can not be negative (got ${overlap})`);
    if (overlap >= unitSize) {
        throw new InvalidParameterError(`planAxis: overlap must be smaller than unit size (overlap ${overlap}, unit ${unitSize})`);
    }
    if (extent <= 0) throw new InvalidParameterError(`planAxis: extent must be positive (got ${extent})`);

    const stride = unitSize - overlap;
    let unitCount = countUnits(extent, unitSize, overlap);
    const deficit = unitCount * stride + overlap - extent;

    let coveredExtent = unitCount * stride + overlap;
    let lastUnitSize = unitSize;

    if (deficit > 0) {
        switch (boundary.kind) {
            case 'pad':
                break;
            case 'discard':
                if (unitCount === 1) {
                    throw new InvalidParameterError(`planAxis: can not discard the only unit (extent ${extent} is smaller than unit size ${unitSize})`);
                }
                unitCount -= 1;
                coveredExtent = unitCount * stride + overlap;
                break;
            case 'none':
                lastUnitSize = unitSize - deficit;
                coveredExtent = extent;
                break;
        }
    }

    return Object.freeze({
        extent,
        unitSize,
        overlap,
        stride,
        unitCount,
        deficit,
        boundary,
        coveredExtent,
        lastUnitSize,
    });
}

export function unitSpan(plan: PartitionPlan, index: number): UnitSpan {
    if (!Number.isInteger(index) || index < 0 || index >= plan.unitCount) {
        throw new RangeError(`unitSpan: index ${index} out of range [0, ${plan.unitCount})`);
    }
    const size = index === plan.unitCount - 1 ? plan.lastUnitSize : plan.unitSize;
    return { origin: index * plan.stride, size };
}

/**
 * Compose independent width and height plans into a row-major tile grid.
 */
export function planGrid(
    width: number,
    height: number,
    tileSize: readonly [number, number],
    overlap: readonly [number, number],
    boundary: BoundaryPolicy,
    maxTilesPerFrame: number,
): GridPlan {
    if (boundary.kind === 'none') {
        throw new InvalidParameterError('planGrid: tiles can not be left short, use a padding mode or discard');
    }
    const columns = planAxis(width, tileSize[0], overlap[0], boundary);
    const rows = planAxis(height, tileSize[1], overlap[1], boundary);
    const tilesPerFrame = columns.unitCount * rows.unitCount;
    if (tilesPerFrame > maxTilesPerFrame) {
        throw new InvalidParameterError(
            `planGrid: this would create ${tilesPerFrame} tiles per frame (max ${maxTilesPerFrame}). Reduce overlap or increase tile size.`,
        );
    }
    return Object.freeze({ columns, rows, tilesPerFrame });
}

export function boundaryTag(boundary: BoundaryPolicy): BoundaryTag {
    switch (boundary.kind) {
        case 'pad':
            return `pad:${fillModeName(boundary.fill)}`;
        case 'discard':
            return 'discard';
        case 'none':
            return 'none';
    }
}

export function parseBoundary(padding: PaddingSpec | string): BoundaryPolicy {
    if (padding === 'discard') return { kind: 'discard' };
    if (padding === 'none') return { kind: 'none' };
    return { kind: 'pad', fill: parseFillMode(padding) };
}
