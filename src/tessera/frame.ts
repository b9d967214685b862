import type { Frame, FrameFormat, FrameShape } from '../tessera-types.js';
import { InvalidParameterError, ShapeMismatchError } from './errors.js';

export interface Region {
    left: number;
    top: number;
    width: number;
    height: number;
}

export function createFrame(width: number, height: number, format: FrameFormat, data?: Float32Array): Frame {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
        throw new InvalidParameterError(`createFrame: dimensions must be positive integers (got ${width}x${height})`);
    }
    if (!Number.isInteger(format.channels) || format.channels <= 0) {
        throw new InvalidParameterError(`createFrame: channel count must be a positive integer (got ${format.channels})`);
    }
    const size = width * height * format.channels;
    if (data && data.length !== size) {
        throw new ShapeMismatchError(`createFrame: expected ${size} samples for ${width}x${height}x${format.channels}, got ${data.length}`);
    }
    return { width, height, format: { channels: format.channels, peak: format.peak }, data: data ?? new Float32Array(size) };
}

export function frameShape(frame: Frame): FrameShape {
    return { width: frame.width, height: frame.height, format: frame.format };
}

export function sameFormat(a: FrameFormat, b: FrameFormat): boolean {
    return a.channels === b.channels && a.peak === b.peak;
}

export function sameShape(a: FrameShape, b: FrameShape): boolean {
    return a.width === b.width && a.height === b.height && sameFormat(a.format, b.format);
}

export function describeShape(shape: FrameShape): string {
    return `${shape.width}x${shape.height}x${shape.format.channels}`;
}

/**
 * Frame of the given shape with every pixel set to `color` (one value per
 * channel, already in the frame's sample range).
 */
export function solidFrame(shape: FrameShape, color: readonly number[]): Frame {
    const frame = createFrame(shape.width, shape.height, shape.format);
    const channels = shape.format.channels;
    for (let i = 0; i < frame.data.length; i += channels) {
        for (let c = 0; c < channels; c++) frame.data[i + c] = color[c];
    }
    return frame;
}

export function cropFrame(frame: Frame, region: Region): Frame {
    const { left, top, width, height } = region;
    if (left < 0 || top < 0 || width <= 0 || height <= 0 || left + width > frame.width || top + height > frame.height) {
        throw new ShapeMismatchError(
            `cropFrame: region ${width}x${height}+${left}+${top} does not fit in ${frame.width}x${frame.height}`,
        );
    }
    if (left === 0 && top === 0 && width === frame.width && height === frame.height) return frame;

    const channels = frame.format.channels;
    const out = createFrame(width, height, frame.format);
    const rowLen = width * channels;
    for (let y = 0; y < height; y++) {
        const src = ((top + y) * frame.width + left) * channels;
        out.data.set(frame.data.subarray(src, src + rowLen), y * rowLen);
    }
    return out;
}

export interface WeightedFrame {
    frame: Frame;
    weight: number;
}

/**
 * Per-sample weighted sum of equally shaped frames. A single part with weight 1
 * is returned as is.
 */
export function blendFrames(parts: readonly WeightedFrame[]): Frame {
    if (parts.length === 0) throw new InvalidParameterError('blendFrames: nothing to blend');
    const first = parts[0].frame;
    if (parts.length === 1 && parts[0].weight === 1) return first;

    for (const part of parts) {
        if (!sameShape(part.frame, first)) {
            throw new ShapeMismatchError(
                `blendFrames: can not blend ${describeShape(part.frame)} with ${describeShape(first)}`,
            );
        }
    }

    const out = createFrame(first.width, first.height, first.format);
    for (const { frame, weight } of parts) {
        const src = frame.data;
        for (let i = 0; i < src.length; i++) out.data[i] += weight * src[i];
    }
    return out;
}
