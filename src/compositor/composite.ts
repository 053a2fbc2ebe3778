import { pasteWithAlpha } from './blend';
import { centeredPosition, scaledSize } from './placement';
import { rasterSize } from './raster';
import { resizeRaster } from './resample';

import type { OverlayRequest, PixelOffset, Raster, RgbaRaster } from './types';

const prepareOverlay = (overlay: Raster, scale: number): RgbaRaster => {
    const target = scaledSize(rasterSize(overlay), scale);
    return resizeRaster(overlay, target.width, target.height);
};

/**
 * Scale `overlay` and alpha-blend it onto a copy of `base` with its top-left
 * corner at `offset`. The result always has the dimensions of `base`.
 */
export const composite = (
    base: Raster,
    overlay: Raster,
    scale: number,
    offset: PixelOffset,
): RgbaRaster => pasteWithAlpha(base, prepareOverlay(overlay, scale), offset);

/**
 * Same as `composite`, but `offset` is relative to the position that centres
 * the scaled overlay on the base.
 */
export const compositeCentered = ({ base, overlay, scale, offset }: OverlayRequest): RgbaRaster => {
    const resized = prepareOverlay(overlay, scale);
    const position = centeredPosition(rasterSize(base), rasterSize(resized), offset);
    return pasteWithAlpha(base, resized, position);
};
