import { DEFAULT_ADJUSTMENTS, MAX_SCALE, MIN_SCALE, SCALE_STEP } from '@/constants/fitting';

import type { Size } from '@/compositor';
import type { AxisBounds, FitAdjustments, OffsetBounds } from '@/types';

const clamp = (value: number, min: number, max: number): number =>
    Math.min(max, Math.max(min, value));

const axisBounds = (extent: number): AxisBounds => ({
    min: Math.floor(-extent / 2),
    max: Math.floor(extent / 2),
});

/**
 * Slider range for the position controls: half the photo in each direction.
 */
export const offsetBounds = (photo: Size): OffsetBounds => ({
    x: axisBounds(photo.width),
    y: axisBounds(photo.height),
});

/**
 * Snap a scale to the slider grid, avoiding float drift like 1.1500000000000001.
 */
export const snapScale = (scale: number): number => {
    const steps = Math.round((scale - MIN_SCALE) / SCALE_STEP);
    return Number((MIN_SCALE + steps * SCALE_STEP).toFixed(2));
};

const sanitizeScale = (value: number): number =>
    Number.isFinite(value) ? clamp(value, MIN_SCALE, MAX_SCALE) : DEFAULT_ADJUSTMENTS.scale;

const sanitizeOffset = (value: number, bounds: AxisBounds): number =>
    Number.isFinite(value) ? clamp(Math.round(value), bounds.min, bounds.max) : 0;

/**
 * Force adjustments into the ranges the sliders allow for `photo`.
 * Returns the same object when nothing changed so React state stays stable.
 */
export const clampAdjustments = (adjustments: FitAdjustments, photo: Size): FitAdjustments => {
    const bounds = offsetBounds(photo);
    const scale = sanitizeScale(adjustments.scale);
    const offsetX = sanitizeOffset(adjustments.offsetX, bounds.x);
    const offsetY = sanitizeOffset(adjustments.offsetY, bounds.y);
    if (
        scale === adjustments.scale &&
        offsetX === adjustments.offsetX &&
        offsetY === adjustments.offsetY
    ) {
        return adjustments;
    }
    return { scale, offsetX, offsetY };
};

export const formatScale = (scale: number): string => `${scale.toFixed(2)}×`;

export const formatOffset = (offset: number): string =>
    offset > 0 ? `+${offset}px` : `${offset}px`;
