import { describe, it, expect } from 'vitest';
import { tile, untile } from '../../src/tessera/tile.js';
import { mapUnits } from '../../src/tessera/sequence.js';
import { patternSequence, resizeNearest } from '../helpers/test-utils.js';

describe('Regression: scaled extent past the last unit', () => {
    it('clamps the output to the units when rounding overshoots', async () => {
        // 31 = 4 * 7 + 3, an exact fit. At half size the extent rounds to 16
        // but 4 units of 5 with overlap 2 only cover 14.
        const frames = patternSequence(1, 31, 31);
        const tiles = tile(frames, { width: 10, height: 10, overlap: 3 });
        expect(tiles.plan.columns.deficit).toBe(0);

        const halved = mapUnits(tiles, content => resizeNearest(content, 5, 5));
        const out = await untile(halved);
        const frame = await out.get(0);
        expect(frame.width).toBe(14);
        expect(frame.height).toBe(14);
    });
});
