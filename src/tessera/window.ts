/**
 * Temporal partition: frames -> overlapping windows of consecutive frames, and
 * back.
 */

import type { Frame, FrameSequence, SequenceSource, Window } from '../tessera-types.js';
import { ShapeMismatchError, UnsupportedModeError } from './errors.js';
import { extendFrames, normalizeColor } from './fill.js';
import { blendFrames, describeShape, sameShape, type WeightedFrame } from './frame.js';
import { tagWindow } from './metadata.js';
import { parseBoundary, planAxis, unitSpan, type BoundaryPolicy, type PaddingSpec, type PartitionPlan } from './partition.js';
import { checkLayout, contributions } from './reconstruct.js';
import { checkWindow, resolveWindows, type UnwindowParams, type WindowReconstructionPlan } from './resolve.js';
import { ScaleDetector } from './scale.js';
import { LazyFrameSequence, PartitionedSequence } from './sequence.js';
import { resolveOptions, type TesseraOptions } from './types.js';

export interface WindowParams {
    /** Frames per window (default 20). */
    length?: number;
    /** Frames shared by consecutive windows (default 5). */
    overlap?: number;
    /** Fill for the last window, `discard` or `none` (default `mirror`). */
    padding?: PaddingSpec;
}

export const WINDOW_DEFAULTS: Readonly<Required<WindowParams>> = Object.freeze({ length: 20, overlap: 5, padding: 'mirror' });

function checkFill(boundary: BoundaryPolicy, frames: FrameSequence): void {
    if (boundary.kind !== 'pad') return;
    const { fill } = boundary;
    if (fill.mode === 'inpaint') {
        throw new UnsupportedModeError(`window: fill mode '${fill.method}' is spatial only and can not extend a window`);
    }
    const { format } = frames.shape();
    if (fill.mode === 'color') normalizeColor(fill.color, format);
    if (fill.mode === 'falloff' && fill.color) normalizeColor(fill.color, format);
}

/**
 * Group consecutive frames into overlapping windows. Window `i` fetches only
 * the source frames it covers.
 */
export function window(
    frames: FrameSequence,
    params: WindowParams = {},
    options: TesseraOptions = {},
): PartitionedSequence<Window, PartitionPlan> {
    const opts = resolveOptions(options);
    const boundary = parseBoundary(params.padding ?? WINDOW_DEFAULTS.padding);
    checkFill(boundary, frames);
    const plan = planAxis(
        frames.length(),
        params.length ?? WINDOW_DEFAULTS.length,
        params.overlap ?? WINDOW_DEFAULTS.overlap,
        boundary,
    );
    const shape = frames.shape();

    opts.logger?.info?.(
        `[window] ${plan.extent} frame(s) -> ${plan.unitCount} window(s) of ${plan.unitSize} ` +
        `(overlap ${plan.overlap}, ${boundary.kind})`,
    );

    return new PartitionedSequence(plan, plan.unitCount, async index => {
        const { origin, size } = unitSpan(plan, index);
        const available = Math.min(size, plan.extent - origin);
        const content: Frame[] = [];
        for (let k = 0; k < available; k++) {
            const frame = await frames.get(origin + k);
            if (!sameShape(frame, shape)) {
                throw new ShapeMismatchError(`window: frame ${origin + k} is ${describeShape(frame)}, expected ${describeShape(shape)}`);
            }
            content.push(frame);
        }
        const full = boundary.kind === 'pad' && available < size
            ? extendFrames(content, size - available, boundary.fill)
            : content;
        return { content: full, meta: tagWindow(plan, index) };
    });
}

/**
 * Rebuild the frame sequence along a resolved plan. Output frame `k` fetches
 * only the windows that cover it, in index order.
 */
export function reconstructWindows(
    windows: SequenceSource<Window>,
    plan: WindowReconstructionPlan,
    options: TesseraOptions = {},
): LazyFrameSequence {
    const opts = resolveOptions(options);
    const { time } = plan;
    checkLayout(time);

    return new LazyFrameSequence(plan.shape, time.outputExtent, async position => {
        const scale = new ScaleDetector(opts.scaleTolerance, time.scale);
        const parts: WeightedFrame[] = [];
        for (const part of contributions(position, time, plan.mode, plan.ramp)) {
            const unit = await windows.get(part.index);
            checkWindow(unit, part.index, time, plan.reference, scale);
            if (part.offset >= unit.content.length) {
                throw new ShapeMismatchError(
                    `unwindow: frame ${position} needs frame ${part.offset} of window ${part.index}, which has ${unit.content.length}`,
                );
            }
            parts.push({ frame: unit.content[part.offset], weight: part.weight });
        }
        return blendFrames(parts);
    });
}

/**
 * Rebuild a frame sequence from (possibly processed and retimed) windows.
 *
 * Parameters are read from the windows' metadata; any value passed in
 * `params` overrides it. Windows without metadata need `fullLength` and
 * `overlap`.
 */
export async function unwindow(
    windows: SequenceSource<Window>,
    params: UnwindowParams = {},
    options: TesseraOptions = {},
): Promise<LazyFrameSequence> {
    const plan = await resolveWindows(windows, params, options);
    return reconstructWindows(windows, plan, options);
}
