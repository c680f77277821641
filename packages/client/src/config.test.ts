import { describe, expect, it } from 'vitest';
import { parseUpdateMode } from './config';

describe('parseUpdateMode', () => {
    it('selects full updates only when asked', () => {
        expect(parseUpdateMode('full')).toBe('full');
        expect(parseUpdateMode(' FULL ')).toBe('full');
        expect(parseUpdateMode('differential')).toBe('differential');
        expect(parseUpdateMode('anything')).toBe('differential');
        expect(parseUpdateMode(undefined)).toBe('differential');
    });
});
