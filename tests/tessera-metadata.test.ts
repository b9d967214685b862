import { describe, it, expect } from 'vitest';
import { MetadataError } from '../src/tessera/errors.js';
import {
    decodeUnitMetadata,
    encodeUnitMetadata,
    parseUnitMetadata,
    sameCall,
    tagTile,
    tagWindow,
} from '../src/tessera/metadata.js';
import { planAxis, planGrid, PAD_MIRROR } from '../src/tessera/partition.js';

const grid = planGrid(40, 30, [16, 16], [4, 4], PAD_MIRROR, 1024);

describe('unit metadata', () => {
    it('tags tiles with both axes', () => {
        const meta = tagTile(grid, 2, 1);
        expect(meta.kind).toBe('tile');
        expect(meta.axes.width).toEqual({ extent: 40, unitSize: 16, overlap: 4, unitCount: 3, index: 2, boundary: 'pad:mirror' });
        expect(meta.axes.height.index).toBe(1);
        expect(Object.isFrozen(meta)).toBe(true);
    });

    it('tags windows with the time axis', () => {
        const meta = tagWindow(planAxis(12, 5, 2, { kind: 'none' }), 3);
        expect(meta.axes.time).toEqual({ extent: 12, unitSize: 5, overlap: 2, unitCount: 4, index: 3, boundary: 'none' });
    });

    it('recognizes units of the same call', () => {
        const other = planGrid(40, 30, [16, 16], [6, 6], PAD_MIRROR, 1024);
        expect(sameCall(tagTile(grid, 0, 0), tagTile(grid, 2, 2))).toBe(true);
        expect(sameCall(tagTile(grid, 0, 0), tagTile(other, 0, 0))).toBe(false);
        expect(sameCall(tagTile(grid, 0, 0), tagWindow(planAxis(12, 5, 2), 0))).toBe(false);
    });
});

describe('metadata transport', () => {
    it('survives encode and decode', () => {
        const meta = tagTile(grid, 1, 2);
        expect(decodeUnitMetadata(encodeUnitMetadata(meta))).toEqual(meta);
        const window = tagWindow(planAxis(100, 30, 0, { kind: 'discard' }), 2);
        expect(decodeUnitMetadata(encodeUnitMetadata(window))).toEqual(window);
    });

    it('starts with the record magic', () => {
        const bytes = encodeUnitMetadata(tagTile(grid, 0, 0));
        expect(Array.from(bytes.subarray(0, 5))).toEqual([0x54, 0x53, 0x52, 0x41, 1]);
    });

    it('rejects corrupted records', () => {
        const bytes = encodeUnitMetadata(tagTile(grid, 0, 0));

        const flipped = bytes.slice();
        flipped[8] ^= 0xff;
        expect(() => decodeUnitMetadata(flipped)).toThrow(/checksum mismatch/);

        const badMagic = bytes.slice();
        badMagic[0] = 0;
        expect(() => decodeUnitMetadata(badMagic)).toThrow(/bad magic/);

        const badVersion = bytes.slice();
        badVersion[4] = 9;
        expect(() => decodeUnitMetadata(badVersion)).toThrow(/Unsupported metadata version 9/);

        expect(() => decodeUnitMetadata(bytes.subarray(0, 10))).toThrow(MetadataError);
    });

    it('validates decoded fields', () => {
        const axis = { extent: 10, unitSize: 4, overlap: 4, unitCount: 3, index: 0, boundary: 'pad:mirror' };
        expect(() => parseUnitMetadata({ version: 1, kind: 'window', axes: { time: axis } })).toThrow(/invalid overlap/);
        expect(() => parseUnitMetadata({ version: 1, kind: 'cube', axes: {} })).toThrow(/Unknown metadata kind/);
        expect(() => parseUnitMetadata({ version: 1, kind: 'tile', axes: { width: { ...axis, overlap: 1 } } })).toThrow(/'height' is missing/);
        expect(() => parseUnitMetadata({ version: 1, kind: 'window', axes: { time: { ...axis, overlap: 1, boundary: 'pad:' } } }))
            .toThrow(/invalid boundary/);
    });
});
