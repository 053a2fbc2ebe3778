import React, { useEffect, useMemo } from 'react';

import AdjustmentControls from '@/components/AdjustmentControls';
import ClothingPicker from '@/components/ClothingPicker';
import LogConsole from '@/components/LogConsole';
import PhotoPanel from '@/components/PhotoPanel';
import ResultPanel from '@/components/ResultPanel';
import UsageGuide from '@/components/UsageGuide';
import { useFittingSession } from '@/context/FittingSessionContext';
import { useClothingCatalog } from '@/hooks/useClothingCatalog';
import { useCompositeRender } from '@/hooks/useCompositeRender';
import { useGarmentImage } from '@/hooks/useGarmentImage';
import { usePhotoSource } from '@/hooks/usePhotoSource';
import { useResultDownload } from '@/hooks/useResultDownload';
import { buildOverlayRequest } from '@/services/fittingSession';

type Fetcher = (url: string) => Promise<Response>;

export interface FittingRoomPageProps {
    /** Overrides `fetch` for the catalog, garment images and the saved avatar */
    fetcher?: Fetcher;
    storage?: Storage;
    /** Overrides the browser download for the encoded result */
    saveFile?: (blob: Blob, fileName: string) => void;
    renderDelayMs?: number;
}

const FittingRoomPage: React.FC<FittingRoomPageProps> = ({
    fetcher,
    storage,
    saveFile,
    renderDelayMs,
}) => {
    const { session, selectItem, updateAdjustments, resetAdjustments } = useFittingSession();
    const catalog = useClothingCatalog({ fetcher });
    const { photo, isDecoding, uploadPhoto, saveAvatar } = usePhotoSource({ storage, fetcher });

    const selectedItem = useMemo(
        () => catalog.items.find((item) => item.name === session.selectedItemName) ?? null,
        [catalog.items, session.selectedItemName],
    );
    const garment = useGarmentImage(selectedItem, fetcher);

    // Like a plain <select>, the first catalog entry is selected by default.
    useEffect(() => {
        if (catalog.status === 'ready' && !selectedItem && catalog.items.length > 0) {
            selectItem(catalog.items[0].name);
        }
    }, [catalog.items, catalog.status, selectItem, selectedItem]);

    const { photo: sessionPhoto, selectedItemName, adjustments } = session;
    const request = useMemo(
        () =>
            buildOverlayRequest(
                { photo: sessionPhoto, selectedItemName, adjustments },
                garment.raster,
            ),
        [adjustments, garment.raster, selectedItemName, sessionPhoto],
    );
    const { result, isRendering } = useCompositeRender(request, renderDelayMs);
    const { download, isEncoding } = useResultDownload(saveFile);

    // A garment that could not be loaded skips the result slot entirely.
    const showResult = Boolean(photo && selectedItem && garment.status !== 'failed');

    return (
        <div className="flex flex-col gap-6 lg:flex-row">
            <aside className="flex w-full flex-col gap-4 lg:w-80 lg:flex-none">
                <AdjustmentControls
                    adjustments={adjustments}
                    photoSize={photo?.raster ?? null}
                    disabled={!request}
                    onChange={updateAdjustments}
                    onReset={resetAdjustments}
                />
                <UsageGuide />
                <LogConsole />
            </aside>
            <main className="flex min-w-0 flex-1 flex-col gap-6">
                <header>
                    <h1 className="text-2xl font-semibold text-gray-100">Virtual Fitting Room</h1>
                    <p className="mt-1 text-sm text-gray-400">
                        Upload a photo of yourself and select a clothing item to see how it looks.
                    </p>
                </header>
                <div className="grid gap-6 md:grid-cols-2">
                    <PhotoPanel
                        photo={photo}
                        isDecoding={isDecoding}
                        onUpload={(file) => {
                            void uploadPhoto(file);
                        }}
                        onSaveAvatar={saveAvatar}
                    />
                    <ClothingPicker
                        status={catalog.status}
                        items={catalog.items}
                        selectedName={selectedItem?.name ?? null}
                        garment={garment}
                        onSelect={selectItem}
                    />
                </div>
                {showResult && (
                    <ResultPanel
                        result={result}
                        isRendering={isRendering}
                        isEncoding={isEncoding}
                        onDownload={(raster) => {
                            void download(raster);
                        }}
                    />
                )}
            </main>
        </div>
    );
};

export default FittingRoomPage;
