import React from 'react';

import type { CatalogStatus } from '@/hooks/useClothingCatalog';
import type { GarmentImageState } from '@/hooks/useGarmentImage';
import type { ClothingItem } from '@/types';

import RasterPreview from './RasterPreview';

interface ClothingPickerProps {
    status: CatalogStatus;
    items: ClothingItem[];
    selectedName: string | null;
    garment: GarmentImageState;
    onSelect: (name: string) => void;
}

const ClothingPicker: React.FC<ClothingPickerProps> = ({
    status,
    items,
    selectedName,
    garment,
    onSelect,
}) => {
    const renderBody = () => {
        if (status === 'loading') {
            return <p className="text-sm text-gray-500">Loading clothing catalog…</p>;
        }
        if (items.length === 0) {
            return (
                <p
                    className="rounded-md border border-amber-500/40 bg-amber-950/40 p-3 text-sm text-amber-200"
                    data-testid="catalog-empty-warning"
                >
                    No clothing items found. Please add items to clothing_data.csv
                </p>
            );
        }
        return (
            <>
                <div className="flex flex-col gap-1">
                    <label htmlFor="clothing-select" className="text-sm text-gray-300">
                        Select a piece of clothing:
                    </label>
                    <select
                        id="clothing-select"
                        value={selectedName ?? ''}
                        onChange={(event) => onSelect(event.target.value)}
                        className="rounded-md border border-gray-700 bg-gray-900 px-3 py-2 text-sm text-gray-100"
                    >
                        {items.map((item) => (
                            <option key={item.name} value={item.name}>
                                {item.name}
                            </option>
                        ))}
                    </select>
                </div>
                {garment.status === 'loading' && (
                    <p className="text-xs text-gray-500">Loading garment…</p>
                )}
                {garment.status === 'failed' && (
                    <p className="text-xs text-rose-300" data-testid="garment-error">
                        This item&apos;s image could not be loaded.
                    </p>
                )}
                {garment.raster && selectedName && (
                    <RasterPreview
                        raster={garment.raster}
                        caption={`Selected: ${selectedName}`}
                        testId="garment-preview"
                    />
                )}
            </>
        );
    };

    return (
        <section className="flex flex-col gap-4 rounded-lg border border-gray-800 bg-gray-950 p-4 shadow-lg">
            <h2 className="text-lg font-semibold text-gray-100">Choose Your Style</h2>
            {renderBody()}
        </section>
    );
};

export default ClothingPicker;
