import { InconsistentScaleError, InvalidParameterError } from '../src/tessera/errors.js';
import { detectScale, scaleAxis, ScaleDetector } from '../src/tessera/scale.js';
import type { AxisTag } from '../src/tessera-types.js';

const tag: AxisTag = { extent: 1000, unitSize: 256, overlap: 16, unitCount: 5, index: 0, boundary: 'pad:mirror' };

describe('detectScale', () => {
    it('returns the ratio of observed to tagged size', () => {
        expect(detectScale([512, 512], [256, 256])).toBe(2);
        expect(detectScale([10], [20])).toBe(0.5);
    });

    it('rejects a non-uniform resize', () => {
        expect(() => detectScale([512, 300], [256, 256])).toThrow(InconsistentScaleError);
    });

    it('tolerates one sample of rounding', () => {
        expect(detectScale([100, 51], [100, 50])).toBe(1);
        expect(() => detectScale([100, 51], [100, 50], 0)).toThrow(InconsistentScaleError);
    });

    it('rejects malformed input', () => {
        expect(() => detectScale([], [])).toThrow(InvalidParameterError);
        expect(() => detectScale([0], [10])).toThrow(InvalidParameterError);
        expect(() => detectScale([10, 10], [10])).toThrow(InvalidParameterError);
    });
});

describe('ScaleDetector', () => {
    it('fixes the factor on the first unit', () => {
        const detector = new ScaleDetector();
        expect(detector.observe([20], [10])).toBe(2);
        expect(() => detector.observe([30], [10])).toThrow(InconsistentScaleError);
    });

    it('checks against a known factor', () => {
        const detector = new ScaleDetector(1, 2);
        expect(detector.observe([21], [10])).toBe(2);
        expect(() => detector.observe([23], [10])).toThrow(InconsistentScaleError);
    });
});

describe('scaleAxis', () => {
    it('scales geometry and keeps the unit count', () => {
        expect(scaleAxis(tag, 2)).toEqual({ extent: 2000, unitSize: 512, overlap: 32, unitCount: 5 });
        expect(scaleAxis(tag, 0.5)).toEqual({ extent: 500, unitSize: 128, overlap: 8, unitCount: 5 });
    });

    it('keeps the stride positive', () => {
        const small: AxisTag = { extent: 10, unitSize: 4, overlap: 3, unitCount: 7, index: 0, boundary: 'pad:mirror' };
        expect(scaleAxis(small, 0.25)).toEqual({ extent: 3, unitSize: 1, overlap: 0, unitCount: 7 });
    });
});
