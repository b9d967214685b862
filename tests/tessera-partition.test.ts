import { InvalidParameterError, UnsupportedModeError } from '../src/tessera/errors.js';
import { boundaryTag, countUnits, parseBoundary, planAxis, planGrid, unitSpan, PAD_MIRROR } from '../src/tessera/partition.js';

describe('planAxis', () => {
    it('plans 1000 samples into 5 units of 256 with overlap 16', () => {
        const plan = planAxis(1000, 256, 16);
        expect(plan.stride).toBe(240);
        expect(plan.unitCount).toBe(5);
        expect(plan.deficit).toBe(216);
        expect(plan.coveredExtent).toBe(1216);
        expect(plan.lastUnitSize).toBe(256);
        expect(Object.isFrozen(plan)).toBe(true);
    });

    it('drops the partial unit under discard', () => {
        const plan = planAxis(100, 30, 0, { kind: 'discard' });
        expect(plan.unitCount).toBe(3);
        expect(plan.deficit).toBe(20);
        expect(plan.coveredExtent).toBe(90);
    });

    it('leaves the last unit short under none', () => {
        const plan = planAxis(100, 30, 0, { kind: 'none' });
        expect(plan.unitCount).toBe(4);
        expect(plan.lastUnitSize).toBe(10);
        expect(plan.coveredExtent).toBe(100);
        expect(unitSpan(plan, 3)).toEqual({ origin: 90, size: 10 });
        expect(unitSpan(plan, 2)).toEqual({ origin: 60, size: 30 });
    });

    it('has no deficit on an exact fit', () => {
        const plan = planAxis(496, 256, 16);
        expect(plan.unitCount).toBe(2);
        expect(plan.deficit).toBe(0);
    });

    it('emits a single padded unit when the extent fits inside the overlap', () => {
        const plan = planAxis(10, 32, 16);
        expect(plan.unitCount).toBe(1);
        expect(plan.deficit).toBe(22);
    });

    it('rejects invalid parameters', () => {
        expect(() => planAxis(10, 5, 5)).toThrow(InvalidParameterError);
        expect(() => planAxis(10, 0, 0)).toThrow(InvalidParameterError);
        expect(() => planAxis(10, 5, -1)).toThrow(InvalidParameterError);
        expect(() => planAxis(0, 5, 1)).toThrow(InvalidParameterError);
        expect(() => planAxis(10.5, 5, 1)).toThrow(InvalidParameterError);
    });

    it('refuses to discard the only unit', () => {
        expect(() => planAxis(10, 32, 16, { kind: 'discard' })).toThrow(InvalidParameterError);
    });

    it('uses the fewest units that cover the extent', () => {
        for (let extent = 1; extent <= 300; extent++) {
            const plan = planAxis(extent, 32, 8, PAD_MIRROR);
            expect(plan.unitCount * plan.stride + plan.overlap).toBeGreaterThanOrEqual(extent);
            if (plan.unitCount > 1) {
                expect((plan.unitCount - 1) * plan.stride + plan.overlap).toBeLessThan(extent);
            }
            expect(countUnits(extent, 32, 8)).toBe(plan.unitCount);
        }
    });

    it('never emits fewer padded units than discarded ones', () => {
        for (let extent = 1; extent <= 120; extent++) {
            for (const [unit, overlap] of [[8, 0], [8, 3], [16, 15]]) {
                const padded = planAxis(extent, unit, overlap);
                if (padded.unitCount === 1 && padded.deficit > 0) continue;
                const discarded = planAxis(extent, unit, overlap, { kind: 'discard' });
                expect(padded.unitCount).toBeGreaterThanOrEqual(discarded.unitCount);
                expect(discarded.unitCount).toBeGreaterThanOrEqual(1);
                expect(discarded.coveredExtent).toBeLessThanOrEqual(extent);
            }
        }
    });

    it('rejects out of range unit spans', () => {
        expect(() => unitSpan(planAxis(100, 30, 0), 4)).toThrow(RangeError);
    });
});

describe('planGrid', () => {
    it('combines independent axes', () => {
        const grid = planGrid(40, 30, [16, 16], [4, 4], PAD_MIRROR, 1024);
        expect(grid.columns.unitCount).toBe(3);
        expect(grid.columns.deficit).toBe(0);
        expect(grid.rows.unitCount).toBe(3);
        expect(grid.rows.deficit).toBe(10);
        expect(grid.tilesPerFrame).toBe(9);
    });

    it('rejects short tiles', () => {
        expect(() => planGrid(40, 30, [16, 16], [4, 4], { kind: 'none' }, 1024)).toThrow(InvalidParameterError);
    });

    it('caps the number of tiles per frame', () => {
        expect(() => planGrid(1000, 1000, [16, 16], [8, 8], PAD_MIRROR, 1024)).toThrow(/15376 tiles per frame/);
    });
});

describe('boundary policies', () => {
    it('parses padding specs', () => {
        expect(parseBoundary('discard')).toEqual({ kind: 'discard' });
        expect(parseBoundary('none')).toEqual({ kind: 'none' });
        expect(parseBoundary([128])).toEqual({ kind: 'pad', fill: { mode: 'color', color: [128] } });
        expect(parseBoundary('loop')).toEqual({ kind: 'pad', fill: { mode: 'wrap' } });
        expect(() => parseBoundary('sideways')).toThrow(UnsupportedModeError);
    });

    it('tags the boundary with the fill name', () => {
        expect(boundaryTag(PAD_MIRROR)).toBe('pad:mirror');
        expect(boundaryTag(parseBoundary('telea'))).toBe('pad:telea');
        expect(boundaryTag(parseBoundary(0))).toBe('pad:color');
        expect(boundaryTag({ kind: 'discard' })).toBe('discard');
    });
});
