/**
 * Position -> contributing units, for crop and fade reconstruction.
 *
 * Crop splits every overlap at `a = floor(O / 2)`: unit `i` keeps local
 * `[i > 0 ? a : 0, U - (i < n - 1 ? O - a : 0))`, so output position `x` comes
 * from unit `clamp(floor((x - a) / S), 0, n - 1)`.
 *
 * Fade merges units in index order. Where the accumulated result overlaps unit
 * `j` at local position `p`, the result becomes `w(p) * acc + (1 - w(p)) * unit_j`.
 * Unrolling the fold gives one weight per covering unit; the weights are a
 * convex combination and sum to 1.
 */

import { clamp } from '../tessera-utils.js';
import { InvalidParameterError } from './errors.js';
import type { RampKind, ReconstructionMode } from './types.js';

export interface AxisLayout {
    unitSize: number;
    overlap: number;
    stride: number;
    unitCount: number;
    outputExtent: number;
}

export interface Contribution {
    index: number;
    offset: number;
    weight: number;
}

export interface GridContribution {
    col: number;
    row: number;
    offsetX: number;
    offsetY: number;
    weight: number;
}

/**
 * Weight kept by the earlier unit at overlap position `p` in `[0, overlap)`.
 * `linear` and `cosine` give 1 at `p = 0`; `centered` gives `1 - 1 / (2 * overlap)`.
 */
export function rampWeight(kind: RampKind, p: number, overlap: number): number {
    switch (kind) {
        case 'linear':
            return 1 - p / overlap;
        case 'cosine':
            return (1 + Math.cos((Math.PI * p) / overlap)) / 2;
        case 'centered':
            return 1 - (p + 0.5) / overlap;
    }
}

export function checkLayout(layout: AxisLayout): void {
    const { unitSize, overlap, stride, unitCount, outputExtent } = layout;
    if (unitSize <= 0 || overlap < 0 || overlap >= unitSize || stride !== unitSize - overlap || unitCount < 1) {
        throw new InvalidParameterError(`Invalid layout: unit=${unitSize} overlap=${overlap} stride=${stride} count=${unitCount}`);
    }
    if (outputExtent <= 0 || outputExtent > unitCount * stride + overlap) {
        throw new InvalidParameterError(
            `Invalid layout: output extent ${outputExtent} is not covered by ${unitCount} unit(s) of ${unitSize} with overlap ${overlap}`,
        );
    }
}

export function contributions(
    position: number,
    layout: AxisLayout,
    mode: ReconstructionMode,
    ramp: RampKind = 'linear',
): Contribution[] {
    const { unitSize, overlap, stride, unitCount, outputExtent } = layout;
    if (!Number.isInteger(position) || position < 0 || position >= outputExtent) {
        throw new RangeError(`Position ${position} out of range [0, ${outputExtent})`);
    }

    if (mode === 'crop' || overlap === 0) {
        const lead = Math.floor(overlap / 2);
        const index = clamp(Math.floor((position - lead) / stride), 0, unitCount - 1);
        return [{ index, offset: position - index * stride, weight: 1 }];
    }

    const first = Math.max(0, Math.ceil((position - unitSize + 1) / stride));
    const last = Math.min(unitCount - 1, Math.floor(position / stride));

    const parts: Contribution[] = [{ index: first, offset: position - first * stride, weight: 1 }];
    for (let j = first + 1; j <= last; j++) {
        const offset = position - j * stride;
        const keep = rampWeight(ramp, offset, overlap);
        for (const part of parts) part.weight *= keep;
        parts.push({ index: j, offset, weight: 1 - keep });
    }
    return parts.filter(part => part.weight !== 0);
}

/**
 * Contributions for every position of the axis, computed once per plan.
 */
export function axisContributions(layout: AxisLayout, mode: ReconstructionMode, ramp: RampKind = 'linear'): Contribution[][] {
    checkLayout(layout);
    const out: Contribution[][] = [];
    for (let x = 0; x < layout.outputExtent; x++) out.push(contributions(x, layout, mode, ramp));
    return out;
}

/**
 * 2-D contributions as the separable product of the column and row
 * contributions. Equivalent to fading every row horizontally, then fading the
 * rows vertically.
 */
export function gridContributions(columns: readonly Contribution[], rows: readonly Contribution[]): GridContribution[] {
    const out: GridContribution[] = [];
    for (const r of rows) {
        for (const c of columns) {
            out.push({ col: c.index, row: r.index, offsetX: c.offset, offsetY: r.offset, weight: c.weight * r.weight });
        }
    }
    return out;
}
