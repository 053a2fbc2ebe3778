import { MIN_RENDER_SCALE } from '@/constants/fitting';

import type { PixelOffset, Size } from './types';

/**
 * Guard against degenerate scales: non-finite falls back to 1, anything
 * below MIN_RENDER_SCALE is raised to it.
 */
export const normalizeScale = (scale: number): number => {
    if (!Number.isFinite(scale)) {
        return 1;
    }
    return Math.max(MIN_RENDER_SCALE, scale);
};

/**
 * Size of an overlay after scaling. Never smaller than 1x1.
 */
export const scaledSize = (size: Size, scale: number): Size => {
    const safeScale = normalizeScale(scale);
    return {
        width: Math.max(1, Math.round(size.width * safeScale)),
        height: Math.max(1, Math.round(size.height * safeScale)),
    };
};

/**
 * Top-left corner that centres `overlay` on `base`, shifted by `offset`.
 */
export const centeredPosition = (base: Size, overlay: Size, offset: PixelOffset): PixelOffset => ({
    x: Math.floor((base.width - overlay.width) / 2) + Math.round(offset.x),
    y: Math.floor((base.height - overlay.height) / 2) + Math.round(offset.y),
});
