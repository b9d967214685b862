import type { Frame, FrameFormat, FrameSequence, SequenceSource } from '../../src/tessera-types.js';
import { createFrame } from '../../src/tessera/frame.js';
import { fromFrames } from '../../src/tessera/sequence.js';

export const GRAY: FrameFormat = { channels: 1, peak: 255 };
export const RGB: FrameFormat = { channels: 3, peak: 255 };

/**
 * Frame whose sample at (x, y, c) is `seed * 1000 + y * width + x + c / 10`.
 * Every sample of a small test frame is distinct.
 */
export function patternFrame(width: number, height: number, seed = 0, format: FrameFormat = GRAY): Frame {
    const frame = createFrame(width, height, format);
    const channels = format.channels;
    for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
            for (let c = 0; c < channels; c++) {
                frame.data[(y * width + x) * channels + c] = seed * 1000 + y * width + x + c / 10;
            }
        }
    }
    return frame;
}

/** Frame with every sample set to `value`. */
export function constantFrame(width: number, height: number, value: number, format: FrameFormat = GRAY): Frame {
    return createFrame(width, height, format, new Float32Array(width * height * format.channels).fill(value));
}

export function patternSequence(count: number, width: number, height: number, format: FrameFormat = GRAY): FrameSequence {
    const frames: Frame[] = [];
    for (let i = 0; i < count; i++) frames.push(patternFrame(width, height, i, format));
    return fromFrames(frames);
}

/** Sample value at (x, y, c). */
export function sampleAt(frame: Frame, x: number, y: number, c = 0): number {
    return frame.data[(y * frame.width + x) * frame.format.channels + c];
}

/** Nearest-neighbour resize, used to stand in for an external per-tile stage. */
export function resizeNearest(frame: Frame, width: number, height: number): Frame {
    const out = createFrame(width, height, frame.format);
    const channels = frame.format.channels;
    for (let y = 0; y < height; y++) {
        const sy = Math.min(frame.height - 1, Math.floor((y * frame.height) / height));
        for (let x = 0; x < width; x++) {
            const sx = Math.min(frame.width - 1, Math.floor((x * frame.width) / width));
            for (let c = 0; c < channels; c++) {
                out.data[(y * width + x) * channels + c] = frame.data[(sy * frame.width + sx) * channels + c];
            }
        }
    }
    return out;
}

/**
 * Wrap a source and record every index requested from it.
 */
export function recordingSource<T>(source: SequenceSource<T>): { source: SequenceSource<T>; requests: number[] } {
    const requests: number[] = [];
    return {
        requests,
        source: {
            length: () => source.length(),
            get: (index: number) => {
                requests.push(index);
                return source.get(index);
            },
        },
    };
}

export function recordingFrames(frames: FrameSequence): { frames: FrameSequence; requests: number[] } {
    const { source, requests } = recordingSource(frames);
    return { frames: { ...source, shape: () => frames.shape() }, requests };
}

/** In-memory unit list as a sequence. */
export function listSource<T>(items: readonly T[]): SequenceSource<T> {
    return { length: () => items.length, get: (index: number) => items[index] };
}
