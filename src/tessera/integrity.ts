import { createHash } from 'node:crypto';

export const CHECKSUM_SIZE = 8;

/**
 * Truncated SHA-256 of `data`, used to detect corrupted metadata records.
 */
export function calculateChecksum(data: Uint8Array): Uint8Array {
    const hasher = createHash('sha256');
    hasher.update(data);
    return new Uint8Array(hasher.digest()).subarray(0, CHECKSUM_SIZE);
}

export function checksumEquals(a: Uint8Array, b: Uint8Array): boolean {
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
        if (a[i] !== b[i]) return false;
    }
    return true;
}

export function toHex(bytes: Uint8Array): string {
    return Buffer.from(bytes).toString('hex');
}
