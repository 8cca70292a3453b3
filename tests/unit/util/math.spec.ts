import { describe, expect, it } from 'vitest';
import { clamp } from 'util/math';

describe('clamp', () => {
    it('limits values to the inclusive range', () => {
        expect(clamp(5.4, -5, 5)).toBe(5);
        expect(clamp(-7, -5, 5)).toBe(-5);
        expect(clamp(1.5, -5, 5)).toBe(1.5);
    });

    it('accepts reversed bounds and maps NaN to the lower bound', () => {
        expect(clamp(10, 5, -5)).toBe(5);
        expect(clamp(Number.NaN, -1, 1)).toBe(-1);
    });
});
