import { encode as msgpackEncode, decode as msgpackDecode } from '@msgpack/msgpack';
import {
    METADATA_VERSION,
    type AxisTag,
    type BoundaryTag,
    type TileMetadata,
    type UnitMetadata,
    type WindowMetadata,
} from '../tessera-types.js';
import { isNonNegativeInt, isPositiveInt } from '../tessera-utils.js';
import { MetadataError } from './errors.js';
import { CHECKSUM_SIZE, calculateChecksum, checksumEquals, toHex } from './integrity.js';
import { boundaryTag, type GridPlan, type PartitionPlan } from './partition.js';

/** "TSRA" */
export const METADATA_MAGIC = new Uint8Array([0x54, 0x53, 0x52, 0x41]);
const HEADER_SIZE = 5; // magic(4) + version(1)
const FOOTER_SIZE = CHECKSUM_SIZE;

function axisTag(plan: PartitionPlan, index: number): AxisTag {
    return Object.freeze({
        extent: plan.extent,
        unitSize: plan.unitSize,
        overlap: plan.overlap,
        unitCount: plan.unitCount,
        index,
        boundary: boundaryTag(plan.boundary),
    });
}

export function tagTile(grid: GridPlan, col: number, row: number): TileMetadata {
    const meta: TileMetadata = {
        version: METADATA_VERSION,
        kind: 'tile',
        axes: Object.freeze({ width: axisTag(grid.columns, col), height: axisTag(grid.rows, row) }),
    };
    return Object.freeze(meta);
}

export function tagWindow(plan: PartitionPlan, index: number): WindowMetadata {
    const meta: WindowMetadata = {
        version: METADATA_VERSION,
        kind: 'window',
        axes: Object.freeze({ time: axisTag(plan, index) }),
    };
    return Object.freeze(meta);
}

function sameAxis(a: AxisTag, b: AxisTag): boolean {
    return a.extent === b.extent
        && a.unitSize === b.unitSize
        && a.overlap === b.overlap
        && a.unitCount === b.unitCount
        && a.boundary === b.boundary;
}

/**
 * True when both records come from the same forward call, i.e. they agree on
 * everything but the unit index.
 */
export function sameCall(a: UnitMetadata, b: UnitMetadata): boolean {
    if (a.version !== b.version) return false;
    if (a.kind === 'tile' && b.kind === 'tile') {
        return sameAxis(a.axes.width, b.axes.width) && sameAxis(a.axes.height, b.axes.height);
    }
    if (a.kind === 'window' && b.kind === 'window') {
        return sameAxis(a.axes.time, b.axes.time);
    }
    return false;
}

export function describeAxis(tag: AxisTag): string {
    return `extent=${tag.extent} unit=${tag.unitSize} overlap=${tag.overlap} count=${tag.unitCount} boundary=${tag.boundary}`;
}

/**
 * Serialize a metadata record for transport through a stage that only keeps
 * opaque bytes.
 *
 * Layout: magic(4) | version(1) | msgpack payload | checksum(8, over everything before it)
 */
export function encodeUnitMetadata(meta: UnitMetadata): Uint8Array {
    const payload = msgpackEncode(meta);
    const buffer = new Uint8Array(HEADER_SIZE + payload.length + FOOTER_SIZE);
    const view = new DataView(buffer.buffer);

    buffer.set(METADATA_MAGIC, 0);
    view.setUint8(4, meta.version);
    buffer.set(payload, HEADER_SIZE);
    buffer.set(calculateChecksum(buffer.subarray(0, HEADER_SIZE + payload.length)), HEADER_SIZE + payload.length);
    return buffer;
}

export function decodeUnitMetadata(data: Uint8Array): UnitMetadata {
    if (data.length < HEADER_SIZE + FOOTER_SIZE) {
        throw new MetadataError(`Truncated metadata record (${data.length} bytes)`);
    }
    for (let i = 0; i < METADATA_MAGIC.length; i++) {
        if (data[i] !== METADATA_MAGIC[i]) throw new MetadataError('Not a tessera metadata record (bad magic)');
    }
    const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    const version = view.getUint8(4);
    if (version !== METADATA_VERSION) {
        throw new MetadataError(`Unsupported metadata version ${version} (expected ${METADATA_VERSION})`);
    }

    const bodyEnd = data.length - FOOTER_SIZE;
    const expected = data.subarray(bodyEnd);
    const actual = calculateChecksum(data.subarray(0, bodyEnd));
    if (!checksumEquals(expected, actual)) {
        throw new MetadataError(`Metadata checksum mismatch (stored ${toHex(expected)}, computed ${toHex(actual)})`);
    }

    let raw: unknown;
    try {
        raw = msgpackDecode(data.subarray(HEADER_SIZE, bodyEnd));
    } catch (err) {
        throw new MetadataError('Metadata payload is not valid msgpack', err);
    }
    return parseUnitMetadata(raw);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isBoundaryTag(value: unknown): value is BoundaryTag {
    return value === 'discard' || value === 'none' || (typeof value === 'string' && value.startsWith('pad:') && value.length > 4);
}

function parseAxisTag(value: unknown, axis: string): AxisTag {
    if (!isRecord(value)) throw new MetadataError(`Metadata axis '${axis}' is missing`);
    const { extent, unitSize, overlap, unitCount, index, boundary } = value;
    if (!isPositiveInt(extent)) throw new MetadataError(`Metadata axis '${axis}': invalid extent`);
    if (!isPositiveInt(unitSize)) throw new MetadataError(`Metadata axis '${axis}': invalid unitSize`);
    if (!isNonNegativeInt(overlap) || overlap >= unitSize) throw new MetadataError(`Metadata axis '${axis}': invalid overlap`);
    if (!isPositiveInt(unitCount)) throw new MetadataError(`Metadata axis '${axis}': invalid unitCount`);
    if (!isNonNegativeInt(index) || index >= unitCount) throw new MetadataError(`Metadata axis '${axis}': invalid index`);
    if (!isBoundaryTag(boundary)) throw new MetadataError(`Metadata axis '${axis}': invalid boundary`);
    return Object.freeze({ extent, unitSize, overlap, unitCount, index, boundary });
}

/**
 * Validate an untrusted, already deserialized record.
 */
export function parseUnitMetadata(raw: unknown): UnitMetadata {
    if (!isRecord(raw)) throw new MetadataError('Metadata record must be an object');
    if (raw.version !== METADATA_VERSION) throw new MetadataError(`Unsupported metadata version ${String(raw.version)}`);
    const axes = raw.axes;
    if (!isRecord(axes)) throw new MetadataError('Metadata record has no axes');

    switch (raw.kind) {
        case 'tile': {
            const meta: TileMetadata = {
                version: METADATA_VERSION,
                kind: 'tile',
                axes: Object.freeze({ width: parseAxisTag(axes.width, 'width'), height: parseAxisTag(axes.height, 'height') }),
            };
            return Object.freeze(meta);
        }
        case 'window': {
            const meta: WindowMetadata = {
                version: METADATA_VERSION,
                kind: 'window',
                axes: Object.freeze({ time: parseAxisTag(axes.time, 'time') }),
            };
            return Object.freeze(meta);
        }
        default:
            throw new MetadataError(`Unknown metadata kind ${String(raw.kind)}`);
    }
}
