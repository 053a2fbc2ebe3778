/**
 * Browser image I/O: bytes <-> RgbaRaster through a 2D canvas.
 *
 * Every entry point resolves to a result object; callers decide how to
 * surface failures (toast, log) and skip the affected slot.
 */
import {
    ACCEPTED_UPLOAD_EXTENSIONS,
    ACCEPTED_UPLOAD_TYPES,
    DOWNLOAD_MIME_TYPE,
} from '@/constants/fitting';

import type { RgbaRaster } from '@/compositor';
import type { Result } from '@/types';

export type ImageErrorReason =
    | 'unsupported-type'
    | 'not-found'
    | 'fetch'
    | 'decode'
    | 'canvas-unavailable'
    | 'encode';

export interface ImageError {
    reason: ImageErrorReason;
    message: string;
    cause?: unknown;
}

export type DecodeResult = Result<RgbaRaster, ImageError>;
export type EncodeResult = Result<Blob, ImageError>;

export type ImageFetcher = (url: string) => Promise<Response>;

const ACCEPTED_TYPES: readonly string[] = ACCEPTED_UPLOAD_TYPES;
const ACCEPTED_EXTENSIONS: readonly string[] = ACCEPTED_UPLOAD_EXTENSIONS;

const extensionOf = (name: string): string => {
    const dot = name.lastIndexOf('.');
    return dot === -1 ? '' : name.slice(dot).toLowerCase();
};

/**
 * Uploads are limited to JPEG and PNG. The MIME type wins when the browser
 * provides one; otherwise fall back to the file extension.
 */
export const isAcceptedUpload = (file: { name: string; type: string }): boolean => {
    if (file.type) {
        return ACCEPTED_TYPES.includes(file.type.toLowerCase());
    }
    return ACCEPTED_EXTENSIONS.includes(extensionOf(file.name));
};

const createCanvas = (
    width: number,
    height: number,
): { canvas: HTMLCanvasElement; context: CanvasRenderingContext2D } | null => {
    if (typeof document === 'undefined') {
        return null;
    }
    const canvas = document.createElement('canvas');
    canvas.width = width;
    canvas.height = height;
    const context = canvas.getContext('2d');
    if (!context) {
        return null;
    }
    return { canvas, context };
};

export const decodeImage = async (blob: Blob): Promise<DecodeResult> => {
    if (blob.type && !ACCEPTED_TYPES.includes(blob.type.toLowerCase())) {
        return {
            ok: false,
            error: { reason: 'unsupported-type', message: `Unsupported image type ${blob.type}` },
        };
    }
    if (typeof globalThis.createImageBitmap !== 'function') {
        return {
            ok: false,
            error: { reason: 'canvas-unavailable', message: 'Image decoding is not supported' },
        };
    }

    let bitmap: ImageBitmap;
    try {
        bitmap = await globalThis.createImageBitmap(blob);
    } catch (error) {
        return {
            ok: false,
            error: { reason: 'decode', message: 'File is not a readable image', cause: error },
        };
    }

    try {
        const surface = createCanvas(bitmap.width, bitmap.height);
        if (!surface) {
            return {
                ok: false,
                error: { reason: 'canvas-unavailable', message: '2D canvas is not available' },
            };
        }
        surface.context.drawImage(bitmap, 0, 0);
        const imageData = surface.context.getImageData(0, 0, bitmap.width, bitmap.height);
        return {
            ok: true,
            value: {
                width: imageData.width,
                height: imageData.height,
                channels: 4,
                data: new Uint8ClampedArray(imageData.data),
            },
        };
    } catch (error) {
        return {
            ok: false,
            error: { reason: 'decode', message: 'Image pixels could not be read', cause: error },
        };
    } finally {
        bitmap.close();
    }
};

export const loadImageFromUrl = async (
    url: string,
    fetcher: ImageFetcher,
): Promise<DecodeResult> => {
    let response: Response;
    try {
        response = await fetcher(url);
    } catch (error) {
        return {
            ok: false,
            error: { reason: 'fetch', message: `Could not load ${url}`, cause: error },
        };
    }
    if (response.status === 404) {
        return { ok: false, error: { reason: 'not-found', message: `Image not found at ${url}` } };
    }
    if (!response.ok) {
        return {
            ok: false,
            error: { reason: 'fetch', message: `Loading ${url} failed with HTTP ${response.status}` },
        };
    }

    let body: Blob;
    try {
        body = await response.blob();
    } catch (error) {
        return {
            ok: false,
            error: { reason: 'fetch', message: `Could not read ${url}`, cause: error },
        };
    }
    return decodeImage(body);
};

/**
 * Paint a raster onto a fresh canvas. Null when no 2D context is available.
 */
export const rasterToCanvas = (raster: RgbaRaster): HTMLCanvasElement | null => {
    const surface = createCanvas(raster.width, raster.height);
    if (!surface) {
        return null;
    }
    const imageData = surface.context.createImageData(raster.width, raster.height);
    imageData.data.set(raster.data);
    surface.context.putImageData(imageData, 0, 0);
    return surface.canvas;
};

export const rasterToDataUrl = (raster: RgbaRaster): string | null =>
    rasterToCanvas(raster)?.toDataURL(DOWNLOAD_MIME_TYPE) ?? null;

export const encodePng = (raster: RgbaRaster): Promise<EncodeResult> => {
    const canvas = rasterToCanvas(raster);
    if (!canvas) {
        return Promise.resolve({
            ok: false,
            error: { reason: 'canvas-unavailable', message: '2D canvas is not available' },
        });
    }
    return new Promise((resolve) => {
        try {
            canvas.toBlob((blob) => {
                if (blob) {
                    resolve({ ok: true, value: blob });
                } else {
                    resolve({
                        ok: false,
                        error: { reason: 'encode', message: 'PNG encoding failed' },
                    });
                }
            }, DOWNLOAD_MIME_TYPE);
        } catch (error) {
            resolve({
                ok: false,
                error: { reason: 'encode', message: 'PNG encoding failed', cause: error },
            });
        }
    });
};
