/**
 * Fill strategies for boundary units.
 *
 * Only the boundary unit of an axis is ever extended; interior units are plain
 * crops. Index modes (mirror, wrap, repeat) map a position past the edge back
 * into the source, colour modes synthesize a constant, `falloff` fades the edge
 * sample towards a colour, and `inpaint` is handed to an external `Inpainter`.
 */

import type { Frame, FrameFormat } from '../tessera-types.js';
import { clamp } from '../tessera-utils.js';
import { InvalidParameterError, ShapeMismatchError, UnsupportedModeError } from './errors.js';
import { createFrame, cropFrame, solidFrame, type Region } from './frame.js';
import type { InpaintMethod, Inpainter } from './types.js';

export type FillMode =
    | { mode: 'mirror' }
    | { mode: 'wrap' }
    | { mode: 'repeat' }
    | { mode: 'black' }
    | { mode: 'color'; color: readonly number[] }
    | { mode: 'falloff'; color?: readonly number[] }
    | { mode: 'inpaint'; method: InpaintMethod };

export type IndexFillMode = 'mirror' | 'wrap' | 'repeat';

export type FillName = IndexFillMode | 'loop' | 'black' | 'falloff' | InpaintMethod;

/** Anything the public surface accepts as a fill: a name, an 8-bit colour, or a parsed mode. */
export type FillSpec = FillName | FillMode | number | readonly number[];

const INPAINT_METHODS: readonly InpaintMethod[] = ['telea', 'ns', 'fsr', 'fillmargins', 'fixborders'];

function isInpaintMethod(name: string): name is InpaintMethod {
    return INPAINT_METHODS.some(method => method === name);
}

function isFillMode(spec: FillMode | readonly number[]): spec is FillMode {
    return 'mode' in spec;
}

export function parseFillMode(spec: FillSpec | string): FillMode {
    if (typeof spec === 'number') return { mode: 'color', color: [spec] };
    if (typeof spec !== 'string') {
        return isFillMode(spec) ? spec : { mode: 'color', color: Array.from(spec) };
    }

    switch (spec) {
        case 'mirror':
            return { mode: 'mirror' };
        case 'wrap':
        case 'loop':
            return { mode: 'wrap' };
        case 'repeat':
            return { mode: 'repeat' };
        case 'black':
            return { mode: 'black' };
        case 'falloff':
            return { mode: 'falloff' };
        default:
            if (isInpaintMethod(spec)) return { mode: 'inpaint', method: spec };
            throw new UnsupportedModeError(
                `Unknown fill mode '${spec}'. Use 'mirror', 'wrap', 'loop', 'repeat', 'black', 'falloff', ` +
                `${INPAINT_METHODS.map(m => `'${m}'`).join(', ')}, or colour values [128, 128, 128].`,
            );
    }
}

export function fillModeName(fill: FillMode): string {
    switch (fill.mode) {
        case 'inpaint':
            return fill.method;
        default:
            return fill.mode;
    }
}

/**
 * Convert an 8-bit scale colour to the sample range of `format`. A short list
 * is broadcast by repeating its last value.
 */
export function normalizeColor(color: readonly number[], format: FrameFormat): number[] {
    if (color.length === 0) throw new InvalidParameterError('Colour needs at least one value');
    if (color.length > format.channels) {
        throw new InvalidParameterError(`Too many colour values (${color.length}) for ${format.channels} channel(s)`);
    }
    for (const v of color) {
        if (!Number.isFinite(v) || v < 0 || v > 255) {
            throw new InvalidParameterError(`Colour values must be in range 0-255 (got ${v})`);
        }
    }
    const out: number[] = [];
    for (let c = 0; c < format.channels; c++) {
        const v = color[Math.min(c, color.length - 1)];
        out.push(format.peak === 255 ? v : (v * format.peak) / 255);
    }
    return out;
}

function fillColor(fill: FillMode, format: FrameFormat): number[] {
    if (fill.mode === 'color') return normalizeColor(fill.color, format);
    if (fill.mode === 'falloff' && fill.color) return normalizeColor(fill.color, format);
    return new Array<number>(format.channels).fill(0);
}

/**
 * Map a position of the extended axis to a position inside a source of
 * `length` samples. Positions inside the source map to themselves.
 *
 * - mirror: ping-pong without repeating the edge (`a b c | b a b c`)
 * - wrap: periodic (`a b c | a b c`)
 * - repeat: edge clamp (`a b c | c c c`)
 */
export function sourceIndex(mode: IndexFillMode, position: number, length: number): number {
    if (length <= 0) throw new InvalidParameterError(`sourceIndex: source length must be positive (got ${length})`);
    if (position >= 0 && position < length) return position;
    if (length === 1) return 0;

    switch (mode) {
        case 'mirror': {
            const period = 2 * (length - 1);
            const m = ((position % period) + period) % period;
            return m < length ? m : period - m;
        }
        case 'wrap':
            return ((position % length) + length) % length;
        case 'repeat':
            return clamp(position, 0, length - 1);
    }
}

/**
 * Extend a short window by `deficit` frames. The extension continues from the
 * end of the window.
 */
export function extendFrames(frames: readonly Frame[], deficit: number, fill: FillMode): Frame[] {
    if (frames.length === 0) throw new InvalidParameterError('extendFrames: window is empty');
    if (!Number.isInteger(deficit) || deficit < 0) {
        throw new InvalidParameterError(`extendFrames: deficit must be a non-negative integer (got ${deficit})`);
    }
    const out = [...frames];
    if (deficit === 0) return out;

    const last = frames[frames.length - 1];
    switch (fill.mode) {
        case 'mirror':
        case 'wrap':
        case 'repeat':
            for (let k = 0; k < deficit; k++) {
                out.push(frames[sourceIndex(fill.mode, frames.length + k, frames.length)]);
            }
            return out;
        case 'black':
        case 'color': {
            const blank = solidFrame(last, fillColor(fill, last.format));
            for (let k = 0; k < deficit; k++) out.push(blank);
            return out;
        }
        case 'falloff': {
            const color = fillColor(fill, last.format);
            for (let k = 1; k <= deficit; k++) out.push(fadeToward(last, color, k / (deficit + 1)));
            return out;
        }
        case 'inpaint':
            throw new UnsupportedModeError(`Fill mode '${fill.method}' is spatial only and can not extend a window`);
    }
}

function fadeToward(frame: Frame, color: readonly number[], t: number): Frame {
    const out = createFrame(frame.width, frame.height, frame.format);
    const channels = frame.format.channels;
    for (let i = 0; i < frame.data.length; i++) {
        out.data[i] = frame.data[i] * (1 - t) + color[i % channels] * t;
    }
    return out;
}

export interface Border {
    right: number;
    bottom: number;
}

/**
 * Read `region` of the frame extended by `border` on its right and bottom
 * edges. Only the requested region is materialized.
 */
export async function readRegion(
    frame: Frame,
    region: Region,
    border: Border,
    fill: FillMode,
    inpainter: Inpainter | null = null,
): Promise<Frame> {
    const fullWidth = frame.width + border.right;
    const fullHeight = frame.height + border.bottom;
    if (region.left < 0 || region.top < 0 || region.left + region.width > fullWidth || region.top + region.height > fullHeight) {
        throw new ShapeMismatchError(
            `readRegion: region ${region.width}x${region.height}+${region.left}+${region.top} exceeds extended frame ${fullWidth}x${fullHeight}`,
        );
    }
    if (region.left + region.width <= frame.width && region.top + region.height <= frame.height) {
        return cropFrame(frame, region);
    }

    if (fill.mode === 'inpaint') {
        if (!inpainter || !inpainter.supports(fill.method)) {
            throw new UnsupportedModeError(`Fill mode '${fill.method}' needs an inpainter that supports it`);
        }
        const extended = await inpainter.extend(frame, border, fill.method);
        if (extended.width !== fullWidth || extended.height !== fullHeight) {
            throw new ShapeMismatchError(
                `Inpainter returned ${extended.width}x${extended.height}, expected ${fullWidth}x${fullHeight}`,
            );
        }
        return cropFrame(extended, region);
    }

    const channels = frame.format.channels;
    const out = createFrame(region.width, region.height, frame.format);
    const color = fillColor(fill, frame.format);

    for (let y = 0; y < region.height; y++) {
        const gy = region.top + y;
        for (let x = 0; x < region.width; x++) {
            const gx = region.left + x;
            const dst = (y * region.width + x) * channels;
            const inside = gx < frame.width && gy < frame.height;

            switch (fill.mode) {
                case 'mirror':
                case 'wrap':
                case 'repeat': {
                    const sx = sourceIndex(fill.mode, gx, frame.width);
                    const sy = sourceIndex(fill.mode, gy, frame.height);
                    const src = (sy * frame.width + sx) * channels;
                    for (let c = 0; c < channels; c++) out.data[dst + c] = frame.data[src + c];
                    break;
                }
                case 'black':
                case 'color': {
                    const src = (gy * frame.width + gx) * channels;
                    for (let c = 0; c < channels; c++) out.data[dst + c] = inside ? frame.data[src + c] : color[c];
                    break;
                }
                case 'falloff': {
                    const sx = Math.min(gx, frame.width - 1);
                    const sy = Math.min(gy, frame.height - 1);
                    const tx = gx >= frame.width ? (gx - frame.width + 1) / (border.right + 1) : 0;
                    const ty = gy >= frame.height ? (gy - frame.height + 1) / (border.bottom + 1) : 0;
                    const t = Math.max(tx, ty);
                    const src = (sy * frame.width + sx) * channels;
                    for (let c = 0; c < channels; c++) out.data[dst + c] = frame.data[src + c] * (1 - t) + color[c] * t;
                    break;
                }
            }
        }
    }
    return out;
}

/** Grow the whole frame by `border`. */
export function extendFrame(frame: Frame, border: Border, fill: FillMode, inpainter: Inpainter | null = null): Promise<Frame> {
    return readRegion(
        frame,
        { left: 0, top: 0, width: frame.width + border.right, height: frame.height + border.bottom },
        border,
        fill,
        inpainter,
    );
}
