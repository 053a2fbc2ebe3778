import { toRgba } from './raster';

import type { PixelOffset, Raster, RgbaRaster } from './types';

const blendChannel = (src: number, dst: number, alpha: number): number =>
    Math.round((src * alpha + dst * (255 - alpha)) / 255);

/**
 * Paste `overlay` onto a copy of `base` with its top-left corner at
 * `position`, using the overlay alpha as the blend mask. Every channel is
 * blended, destination alpha included. Parts outside the canvas are dropped.
 */
export const pasteWithAlpha = (
    base: Raster,
    overlay: Raster,
    position: PixelOffset,
): RgbaRaster => {
    const target = toRgba(base);
    const source = toRgba(overlay);

    const left = Math.round(position.x);
    const top = Math.round(position.y);
    const startX = Math.max(0, left);
    const startY = Math.max(0, top);
    const endX = Math.min(target.width, left + source.width);
    const endY = Math.min(target.height, top + source.height);
    if (startX >= endX || startY >= endY) {
        return target;
    }

    const { data: dst } = target;
    const { data: src } = source;
    for (let y = startY; y < endY; y += 1) {
        const srcRow = (y - top) * source.width;
        const dstRow = y * target.width;
        for (let x = startX; x < endX; x += 1) {
            const s = (srcRow + (x - left)) * 4;
            const d = (dstRow + x) * 4;
            const alpha = src[s + 3];
            if (alpha === 0) {
                continue;
            }
            if (alpha === 255) {
                dst[d] = src[s];
                dst[d + 1] = src[s + 1];
                dst[d + 2] = src[s + 2];
                dst[d + 3] = 255;
                continue;
            }
            dst[d] = blendChannel(src[s], dst[d], alpha);
            dst[d + 1] = blendChannel(src[s + 1], dst[d + 1], alpha);
            dst[d + 2] = blendChannel(src[s + 2], dst[d + 2], alpha);
            dst[d + 3] = blendChannel(alpha, dst[d + 3], alpha);
        }
    }
    return target;
};
