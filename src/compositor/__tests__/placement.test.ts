// @vitest-environment node
import { describe, expect, it } from 'vitest';

import { MIN_RENDER_SCALE } from '@/constants/fitting';

import { centeredPosition, normalizeScale, scaledSize } from '../placement';

describe('scaledSize', () => {
    it('rounds the scaled dimensions', () => {
        expect(scaledSize({ width: 200, height: 200 }, 0.5)).toEqual({ width: 100, height: 100 });
        expect(scaledSize({ width: 101, height: 33 }, 1.5)).toEqual({ width: 152, height: 50 });
    });

    it('never produces an empty overlay', () => {
        expect(scaledSize({ width: 10, height: 10 }, 0.01)).toEqual({ width: 1, height: 1 });
        expect(scaledSize({ width: 10, height: 10 }, 0)).toEqual({ width: 1, height: 1 });
        expect(scaledSize({ width: 10, height: 10 }, -3)).toEqual({ width: 1, height: 1 });
    });
});

describe('normalizeScale', () => {
    it('raises tiny and negative scales to the render floor', () => {
        expect(normalizeScale(0)).toBe(MIN_RENDER_SCALE);
        expect(normalizeScale(-1)).toBe(MIN_RENDER_SCALE);
        expect(normalizeScale(0.5)).toBe(0.5);
    });

    it('treats non-finite scales as native size', () => {
        expect(normalizeScale(Number.NaN)).toBe(1);
        expect(normalizeScale(Number.POSITIVE_INFINITY)).toBe(1);
    });
});

describe('centeredPosition', () => {
    it('centres the overlay on the base', () => {
        expect(
            centeredPosition({ width: 400, height: 600 }, { width: 200, height: 200 }, { x: 0, y: 0 }),
        ).toEqual({ x: 100, y: 200 });
    });

    it('floors odd differences and applies the offset afterwards', () => {
        expect(
            centeredPosition({ width: 101, height: 50 }, { width: 20, height: 21 }, { x: -5, y: 7 }),
        ).toEqual({ x: 35, y: 21 });
    });

    it('floors towards negative infinity when the overlay is larger than the base', () => {
        expect(
            centeredPosition({ width: 100, height: 100 }, { width: 151, height: 100 }, { x: 0, y: 0 }),
        ).toEqual({ x: -26, y: 0 });
    });
});
