import { DEFAULT_ADJUSTMENTS } from '@/constants/fitting';
import { clampAdjustments } from '@/utils/adjustments';

import type { OverlayRequest, Raster, Size } from '@/compositor';
import type { FitAdjustments, FittingSession, PhotoSlot } from '@/types';

export type FittingSessionAction =
    | { type: 'photo-loaded'; photo: PhotoSlot }
    | { type: 'photo-cleared' }
    | { type: 'item-selected'; name: string | null }
    | { type: 'adjustments-changed'; patch: Partial<FitAdjustments> }
    | { type: 'adjustments-reset' };

export const INITIAL_SESSION: FittingSession = {
    photo: null,
    selectedItemName: null,
    adjustments: DEFAULT_ADJUSTMENTS,
};

const NO_PHOTO: Size = { width: 0, height: 0 };

const photoSize = (session: FittingSession): Size => session.photo?.raster ?? NO_PHOTO;

const sameAdjustments = (a: FitAdjustments, b: FitAdjustments): boolean =>
    a.scale === b.scale && a.offsetX === b.offsetX && a.offsetY === b.offsetY;

export const fittingSessionReducer = (
    state: FittingSession,
    action: FittingSessionAction,
): FittingSession => {
    switch (action.type) {
        case 'photo-loaded':
            return {
                ...state,
                photo: action.photo,
                adjustments: clampAdjustments(state.adjustments, action.photo.raster),
            };
        case 'photo-cleared':
            if (!state.photo) {
                return state;
            }
            return { ...state, photo: null, adjustments: DEFAULT_ADJUSTMENTS };
        case 'item-selected':
            if (action.name === state.selectedItemName) {
                return state;
            }
            return { ...state, selectedItemName: action.name, adjustments: DEFAULT_ADJUSTMENTS };
        case 'adjustments-changed': {
            const merged = { ...state.adjustments, ...action.patch };
            const next = clampAdjustments(merged, photoSize(state));
            return sameAdjustments(next, state.adjustments) ? state : { ...state, adjustments: next };
        }
        case 'adjustments-reset':
            return sameAdjustments(state.adjustments, DEFAULT_ADJUSTMENTS)
                ? state
                : { ...state, adjustments: DEFAULT_ADJUSTMENTS };
        default:
            return state;
    }
};

/**
 * Composite request for the current session, or null until both a photo and
 * the selected garment's raster are available.
 */
export const buildOverlayRequest = (
    session: FittingSession,
    garment: Raster | null,
): OverlayRequest | null => {
    if (!session.photo || !garment || !session.selectedItemName) {
        return null;
    }
    return {
        base: session.photo.raster,
        overlay: garment,
        scale: session.adjustments.scale,
        offset: { x: session.adjustments.offsetX, y: session.adjustments.offsetY },
    };
};
