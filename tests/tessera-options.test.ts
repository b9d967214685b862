import { InvalidParameterError } from '../src/tessera/errors.js';
import { DEFAULT_OPTIONS, RECONSTRUCTION_PRESETS, resolveOptions } from '../src/tessera/types.js';

describe('options', () => {
    it('fills in defaults', () => {
        expect(resolveOptions()).toEqual({ ...DEFAULT_OPTIONS });
        expect(resolveOptions({ ramp: 'cosine' }).ramp).toBe('cosine');
        expect(resolveOptions({ maxTilesPerFrame: 16 }).maxTilesPerFrame).toBe(16);
    });

    it('rejects invalid limits', () => {
        expect(() => resolveOptions({ maxTilesPerFrame: 0 })).toThrow(InvalidParameterError);
        expect(() => resolveOptions({ maxTilesPerFrame: 1.5 })).toThrow(InvalidParameterError);
        expect(() => resolveOptions({ scaleTolerance: -1 })).toThrow(InvalidParameterError);
    });

    it('ships reconstruction presets', () => {
        expect(RECONSTRUCTION_PRESETS.exact).toEqual({ fade: false, ramp: 'linear' });
        expect(RECONSTRUCTION_PRESETS.seamless).toEqual({ fade: true, ramp: 'cosine' });
    });
});
