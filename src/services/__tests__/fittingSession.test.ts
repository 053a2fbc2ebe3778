// @vitest-environment node
import { describe, expect, it } from 'vitest';

import { createRaster } from '../../compositor';
import { DEFAULT_ADJUSTMENTS } from '../../constants/fitting';
import { buildOverlayRequest, fittingSessionReducer, INITIAL_SESSION } from '../fittingSession';

import type { FittingSession, PhotoSlot } from '../../types';

const photo = (width: number, height: number): PhotoSlot => ({
    source: 'upload',
    name: 'me.png',
    raster: createRaster(width, height, [1, 2, 3, 255]),
});

describe('fittingSessionReducer', () => {
    it('stores a loaded photo and clamps adjustments to it', () => {
        const state: FittingSession = {
            ...INITIAL_SESSION,
            adjustments: { scale: 1, offsetX: 300, offsetY: -300 },
        };

        const next = fittingSessionReducer(state, { type: 'photo-loaded', photo: photo(200, 100) });

        expect(next.photo?.name).toBe('me.png');
        expect(next.adjustments).toEqual({ scale: 1, offsetX: 100, offsetY: -50 });
    });

    it('resets adjustments when a different item is selected', () => {
        const state: FittingSession = {
            photo: photo(200, 200),
            selectedItemName: 'Hat',
            adjustments: { scale: 2, offsetX: 5, offsetY: 5 },
        };

        const same = fittingSessionReducer(state, { type: 'item-selected', name: 'Hat' });
        expect(same).toBe(state);

        const next = fittingSessionReducer(state, { type: 'item-selected', name: 'Scarf' });
        expect(next.selectedItemName).toBe('Scarf');
        expect(next.adjustments).toEqual(DEFAULT_ADJUSTMENTS);
    });

    it('merges and clamps adjustment patches against the photo', () => {
        const state = fittingSessionReducer(INITIAL_SESSION, {
            type: 'photo-loaded',
            photo: photo(100, 60),
        });

        const next = fittingSessionReducer(state, {
            type: 'adjustments-changed',
            patch: { offsetX: 80, scale: 2.5 },
        });

        expect(next.adjustments).toEqual({ scale: 2.5, offsetX: 50, offsetY: 0 });
    });

    it('pins offsets to zero while there is no photo', () => {
        const next = fittingSessionReducer(INITIAL_SESSION, {
            type: 'adjustments-changed',
            patch: { offsetX: 40, scale: 3 },
        });

        expect(next.adjustments).toEqual({ scale: 3, offsetX: 0, offsetY: 0 });
    });

    it('keeps the state object when nothing changes', () => {
        expect(
            fittingSessionReducer(INITIAL_SESSION, { type: 'adjustments-changed', patch: {} }),
        ).toBe(INITIAL_SESSION);
        expect(fittingSessionReducer(INITIAL_SESSION, { type: 'adjustments-reset' })).toBe(
            INITIAL_SESSION,
        );
        expect(fittingSessionReducer(INITIAL_SESSION, { type: 'photo-cleared' })).toBe(
            INITIAL_SESSION,
        );
    });

    it('clears the photo and its adjustments', () => {
        const state: FittingSession = {
            photo: photo(50, 50),
            selectedItemName: 'Hat',
            adjustments: { scale: 2, offsetX: 3, offsetY: 4 },
        };

        const next = fittingSessionReducer(state, { type: 'photo-cleared' });

        expect(next.photo).toBeNull();
        expect(next.selectedItemName).toBe('Hat');
        expect(next.adjustments).toEqual(DEFAULT_ADJUSTMENTS);
    });
});

describe('buildOverlayRequest', () => {
    const garment = createRaster(10, 10, [9, 9, 9, 255]);

    it('needs a photo, a selected item and its raster', () => {
        expect(buildOverlayRequest(INITIAL_SESSION, garment)).toBeNull();
        expect(
            buildOverlayRequest({ ...INITIAL_SESSION, photo: photo(20, 20) }, garment),
        ).toBeNull();
        expect(
            buildOverlayRequest(
                { ...INITIAL_SESSION, photo: photo(20, 20), selectedItemName: 'Hat' },
                null,
            ),
        ).toBeNull();
    });

    it('maps the session adjustments onto the request', () => {
        const base = photo(20, 20);
        const request = buildOverlayRequest(
            {
                photo: base,
                selectedItemName: 'Hat',
                adjustments: { scale: 0.5, offsetX: -3, offsetY: 4 },
            },
            garment,
        );

        expect(request).toEqual({
            base: base.raster,
            overlay: garment,
            scale: 0.5,
            offset: { x: -3, y: 4 },
        });
    });
});
