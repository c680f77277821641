import { describe, expect, it } from 'vitest';
import { digest, isHex64, verify } from './checksum';

const EMPTY_SHA256 = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';
const ABC_SHA256 = 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad';

describe('checksum', () => {
    it('digests empty content to the known SHA-256 vector', () => {
        expect(digest(Buffer.alloc(0))).toBe(EMPTY_SHA256);
    });

    it('digests "abc" to the known SHA-256 vector', () => {
        expect(digest(Buffer.from('abc'))).toBe(ABC_SHA256);
    });

    it('always renders 64 lowercase hex characters', () => {
        for (const sample of ['', 'x', 'hello!\n', '\u00e9\u00e8']) {
            expect(digest(Buffer.from(sample))).toMatch(/^[0-9a-f]{64}$/);
        }
    });

    it('verifies matching content', () => {
        expect(verify(Buffer.from('abc'), ABC_SHA256)).toBe(true);
        expect(verify(Buffer.from('abc'), ABC_SHA256.toUpperCase())).toBe(true);
    });

    it('rejects different content', () => {
        expect(verify(Buffer.from('abd'), ABC_SHA256)).toBe(false);
    });

    it('treats a malformed digest as a mismatch', () => {
        expect(verify(Buffer.from('abc'), 'not-a-digest')).toBe(false);
        expect(verify(Buffer.from('abc'), ABC_SHA256.slice(1))).toBe(false);
        expect(isHex64(`${ABC_SHA256.slice(1)}g`)).toBe(false);
    });
});
