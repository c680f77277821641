// ─── Tunnedit: Checksum Validator ────────────────────────────────────────────

import crypto from 'crypto';

const HEX64 = /^[0-9a-fA-F]{64}$/;

/**
 * SHA-256 of raw content bytes as 64 lowercase hex characters.
 * Frame headers never take part in the digest.
 */
export function digest(data: Buffer): string {
    return crypto.createHash('sha256').update(data).digest('hex');
}

export function isHex64(value: string): boolean {
    return HEX64.test(value);
}

/**
 * Check content against an expected digest. The comparison always touches
 * every byte of the digest; a malformed expectation is simply a mismatch.
 */
export function verify(data: Buffer, expected: string): boolean {
    if (!isHex64(expected)) return false;
    const actual = crypto.createHash('sha256').update(data).digest();
    return crypto.timingSafeEqual(actual, Buffer.from(expected, 'hex'));
}
