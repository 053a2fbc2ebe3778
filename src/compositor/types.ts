/**
 * Raster types shared by the compositor.
 *
 * Pixels are stored row-major, `channels` bytes per pixel, in the same layout
 * as the canvas `ImageData` buffer when `channels` is 4.
 */

// =============================================================================
// CORE TYPES
// =============================================================================

export type ChannelCount = 3 | 4;

export interface Size {
    width: number;
    height: number;
}

/**
 * In-memory image. `channels === 3` carries no alpha and is treated as fully
 * opaque wherever alpha is needed.
 */
export interface Raster extends Size {
    channels: ChannelCount;
    data: Uint8ClampedArray;
}

export interface RgbaRaster extends Raster {
    channels: 4;
}

/**
 * Integer pixel coordinate. May be negative or lie outside the canvas.
 */
export interface PixelOffset {
    x: number;
    y: number;
}

/**
 * Everything one render needs. Built per render from the fitting session,
 * never stored.
 */
export interface OverlayRequest {
    base: Raster;
    overlay: Raster;
    scale: number;
    offset: PixelOffset;
}
