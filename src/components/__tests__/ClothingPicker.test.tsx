import { act } from 'react';
import { createRoot } from 'react-dom/client';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createRaster } from '../../compositor';
import ClothingPicker from '../ClothingPicker';

import type { CatalogStatus } from '../../hooks/useClothingCatalog';
import type { GarmentImageState } from '../../hooks/useGarmentImage';
import type { ClothingItem } from '../../types';

const originalGetContext = HTMLCanvasElement.prototype.getContext;

const ITEMS: ClothingItem[] = [
    { name: 'Red Shirt', imageFile: 'red_shirt.png', imageUrl: 'images/clothing/red_shirt.png' },
    { name: 'Blue Hat', imageFile: 'blue_hat.png', imageUrl: 'images/clothing/blue_hat.png' },
];

const IDLE: GarmentImageState = { status: 'idle', raster: null };

const renderPicker = (
    status: CatalogStatus,
    items: ClothingItem[],
    selectedName: string | null,
    garment: GarmentImageState = IDLE,
) => {
    const container = document.createElement('div');
    document.body.appendChild(container);
    const root = createRoot(container);
    const onSelect = vi.fn<(name: string) => void>();

    act(() => {
        root.render(
            <ClothingPicker
                status={status}
                items={items}
                selectedName={selectedName}
                garment={garment}
                onSelect={onSelect}
            />,
        );
    });

    return { container, root, onSelect };
};

beforeEach(() => {
    HTMLCanvasElement.prototype.getContext = function () {
        return null;
    } as unknown as typeof HTMLCanvasElement.prototype.getContext;
});

afterEach(() => {
    HTMLCanvasElement.prototype.getContext = originalGetContext;
    document.body.innerHTML = '';
});

describe('ClothingPicker', () => {
    it('warns when the catalog has no items', () => {
        const { container, root } = renderPicker('unavailable', [], null);

        expect(container.querySelector('[data-testid="catalog-empty-warning"]')?.textContent).toBe(
            'No clothing items found. Please add items to clothing_data.csv',
        );
        expect(container.querySelector('select')).toBeNull();

        act(() => {
            root.unmount();
        });
    });

    it('lists every catalog item and reports a new choice', () => {
        const { container, root, onSelect } = renderPicker('ready', ITEMS, 'Red Shirt');

        const select = container.querySelector<HTMLSelectElement>('#clothing-select');
        const options = Array.from(select?.options ?? []).map((option) => option.value);
        expect(options).toEqual(['Red Shirt', 'Blue Hat']);
        expect(select?.value).toBe('Red Shirt');

        act(() => {
            if (select) {
                select.value = 'Blue Hat';
                select.dispatchEvent(new Event('change', { bubbles: true }));
            }
        });
        expect(onSelect).toHaveBeenCalledWith('Blue Hat');

        act(() => {
            root.unmount();
        });
    });

    it('captions the garment preview with the selected name', () => {
        const { container, root } = renderPicker('ready', ITEMS, 'Blue Hat', {
            status: 'ready',
            raster: createRaster(6, 3),
        });

        const preview = container.querySelector('[data-testid="garment-preview"]');
        expect(preview?.querySelector('figcaption')?.textContent).toBe('Selected: Blue Hat');
        expect(preview?.querySelector('canvas')?.getAttribute('data-width')).toBe('6');

        act(() => {
            root.unmount();
        });
    });

    it('flags a garment whose image failed to load', () => {
        const { container, root } = renderPicker('ready', ITEMS, 'Red Shirt', {
            status: 'failed',
            raster: null,
        });

        expect(container.querySelector('[data-testid="garment-error"]')).not.toBeNull();
        expect(container.querySelector('[data-testid="garment-preview"]')).toBeNull();

        act(() => {
            root.unmount();
        });
    });
});
