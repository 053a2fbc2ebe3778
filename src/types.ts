import type { RgbaRaster } from './compositor/types';

export interface FitAdjustments {
    /** Overlay scale factor, 1 = native size */
    scale: number;
    /** Horizontal shift in photo pixels from the centred position */
    offsetX: number;
    /** Vertical shift in photo pixels from the centred position */
    offsetY: number;
}

export interface AxisBounds {
    min: number;
    max: number;
}

export interface OffsetBounds {
    x: AxisBounds;
    y: AxisBounds;
}

export interface ClothingItem {
    name: string;
    imageFile: string;
    imageUrl: string;
}

export type PhotoSource = 'upload' | 'avatar';

export interface PhotoSlot {
    source: PhotoSource;
    /** File name for uploads, a fixed label for the saved avatar */
    name: string;
    raster: RgbaRaster;
}

export interface FittingSession {
    photo: PhotoSlot | null;
    selectedItemName: string | null;
    adjustments: FitAdjustments;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };
