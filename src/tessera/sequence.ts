import type { Awaitable, Frame, FrameSequence, FrameShape, SequenceSource, Unit, UnitMetadata } from '../tessera-types.js';
import { InvalidParameterError, ShapeMismatchError } from './errors.js';
import { describeShape, frameShape, sameShape } from './frame.js';

/**
 * Sequence whose items are computed on request. Nothing is cached: `get(k)`
 * recomputes from the source every time, and async iteration pulls strictly
 * in order.
 */
export class LazySequence<T> implements SequenceSource<T>, AsyncIterable<T> {
    constructor(
        private readonly count: number,
        private readonly produce: (index: number) => Awaitable<T>,
    ) {
        if (!Number.isInteger(count) || count < 0) {
            throw new InvalidParameterError(`LazySequence: length must be a non-negative integer (got ${count})`);
        }
    }

    length(): number {
        return this.count;
    }

    async get(index: number): Promise<T> {
        if (!Number.isInteger(index) || index < 0 || index >= this.count) {
            throw new RangeError(`Index ${index} out of range [0, ${this.count})`);
        }
        return this.produce(index);
    }

    async *[Symbol.asyncIterator](): AsyncIterator<T> {
        for (let i = 0; i < this.count; i++) {
            yield await this.get(i);
        }
    }

    /** Pull every item in order. */
    async collect(): Promise<T[]> {
        const out: T[] = [];
        for await (const item of this) out.push(item);
        return out;
    }

    map<R>(fn: (item: T, index: number) => Awaitable<R>): LazySequence<R> {
        return new LazySequence(this.count, async index => fn(await this.get(index), index));
    }
}

/**
 * Output of a forward partition: the units plus the plan that produced them.
 */
export class PartitionedSequence<T, P> extends LazySequence<T> {
    constructor(
        public readonly plan: P,
        count: number,
        produce: (index: number) => Awaitable<T>,
    ) {
        super(count, produce);
    }
}

export class LazyFrameSequence extends LazySequence<Frame> implements FrameSequence {
    constructor(
        private readonly outputShape: FrameShape,
        count: number,
        produce: (index: number) => Awaitable<Frame>,
    ) {
        super(count, produce);
    }

    shape(): FrameShape {
        return this.outputShape;
    }
}

/**
 * Frame sequence over an in-memory list. Every frame must share the shape of
 * the first one.
 */
export function fromFrames(frames: readonly Frame[]): FrameSequence {
    if (frames.length === 0) throw new InvalidParameterError('fromFrames: sequence is empty');
    const shape = frameShape(frames[0]);
    frames.forEach((frame, i) => {
        if (!sameShape(frame, shape)) {
            throw new ShapeMismatchError(`fromFrames: frame ${i} is ${describeShape(frame)}, expected ${describeShape(shape)}`);
        }
    });
    return {
        length: () => frames.length,
        get: (index: number) => {
            if (!Number.isInteger(index) || index < 0 || index >= frames.length) {
                throw new RangeError(`Index ${index} out of range [0, ${frames.length})`);
            }
            return frames[index];
        },
        shape: () => shape,
    };
}

/**
 * Apply an external per-unit transform. Content may change shape; metadata is
 * carried over untouched.
 */
export function mapUnits<C, R, M extends UnitMetadata>(
    units: SequenceSource<Unit<C, M>>,
    fn: (content: C, index: number) => Awaitable<R>,
): LazySequence<Unit<R, M>> {
    return new LazySequence<Unit<R, M>>(units.length(), async index => {
        const unit = await units.get(index);
        const content = await fn(unit.content, index);
        return unit.meta ? { content, meta: unit.meta } : { content };
    });
}

/**
 * Keep only the units whose index passes `keep` (e.g. drop boundary units).
 * Nothing is fetched here; `get(k)` pulls the `k`-th kept unit once.
 */
export function filterUnits<U>(units: SequenceSource<U>, keep: (index: number) => boolean): LazySequence<U> {
    const kept: number[] = [];
    for (let i = 0; i < units.length(); i++) {
        if (keep(i)) kept.push(i);
    }
    return new LazySequence(kept.length, index => units.get(kept[index]));
}
