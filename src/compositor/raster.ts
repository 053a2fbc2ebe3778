import type { Raster, RgbaRaster, Size } from './types';

export const createRaster = (
    width: number,
    height: number,
    fill: readonly number[] = [0, 0, 0, 0],
): RgbaRaster => {
    const data = new Uint8ClampedArray(width * height * 4);
    for (let offset = 0; offset < data.length; offset += 4) {
        data[offset] = fill[0] ?? 0;
        data[offset + 1] = fill[1] ?? 0;
        data[offset + 2] = fill[2] ?? 0;
        data[offset + 3] = fill[3] ?? 255;
    }
    return { width, height, channels: 4, data };
};

export const isRgba = (raster: Raster): raster is RgbaRaster => raster.channels === 4;

export const assertRasterShape = (raster: Raster): void => {
    const expected = raster.width * raster.height * raster.channels;
    if (raster.data.length !== expected) {
        throw new RangeError(
            `Raster buffer holds ${raster.data.length} bytes, expected ${expected} for ${raster.width}x${raster.height}x${raster.channels}`,
        );
    }
};

export const cloneRaster = <T extends Raster>(raster: T): T => ({
    ...raster,
    data: new Uint8ClampedArray(raster.data),
});

/**
 * RGBA copy of `raster`. Rasters without alpha come back fully opaque.
 */
export const toRgba = (raster: Raster): RgbaRaster => {
    assertRasterShape(raster);
    if (isRgba(raster)) {
        return cloneRaster(raster);
    }
    const pixelCount = raster.width * raster.height;
    const data = new Uint8ClampedArray(pixelCount * 4);
    for (let pixel = 0; pixel < pixelCount; pixel += 1) {
        const src = pixel * 3;
        const dst = pixel * 4;
        data[dst] = raster.data[src];
        data[dst + 1] = raster.data[src + 1];
        data[dst + 2] = raster.data[src + 2];
        data[dst + 3] = 255;
    }
    return { width: raster.width, height: raster.height, channels: 4, data };
};

export const readPixel = (raster: Raster, x: number, y: number): number[] => {
    const offset = (y * raster.width + x) * raster.channels;
    const pixel = Array.from(raster.data.subarray(offset, offset + raster.channels));
    if (raster.channels === 3) {
        pixel.push(255);
    }
    return pixel;
};

export const rasterSize = (raster: Size): Size => ({ width: raster.width, height: raster.height });
