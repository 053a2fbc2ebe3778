/**
 * Pure raster compositing for the fitting room.
 *
 * - Raster helpers (RGBA normalisation, copies)
 * - Lanczos-3 resampling
 * - Alpha-masked paste with clipping
 * - Centred placement policy
 */

// Types
export type { ChannelCount, OverlayRequest, PixelOffset, Raster, RgbaRaster, Size } from './types';

// Rasters
export {
    assertRasterShape,
    cloneRaster,
    createRaster,
    isRgba,
    rasterSize,
    readPixel,
    toRgba,
} from './raster';

// Resampling
export { lanczosKernel, resizeRaster } from './resample';

// Placement
export { centeredPosition, normalizeScale, scaledSize } from './placement';

// Blending
export { pasteWithAlpha } from './blend';
export { composite, compositeCentered } from './composite';
