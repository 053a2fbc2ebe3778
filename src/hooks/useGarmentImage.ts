import { useEffect, useState } from 'react';

import { showSimpleErrorToast } from '@/components/common/StyledToast';
import { useScopedLogger } from '@/context/LogContext';
import { loadImageFromUrl, type ImageFetcher } from '@/services/imageCodec';

import type { RgbaRaster } from '@/compositor';
import type { ClothingItem } from '@/types';

export type GarmentStatus = 'idle' | 'loading' | 'ready' | 'failed';

export interface GarmentImageState {
    status: GarmentStatus;
    raster: RgbaRaster | null;
}

const defaultFetcher: ImageFetcher = (url) => globalThis.fetch(url);

const IDLE: GarmentImageState = { status: 'idle', raster: null };

/**
 * Decodes the selected garment. A garment that cannot be loaded leaves the
 * raster null so no composite is attempted for it.
 */
export const useGarmentImage = (
    item: ClothingItem | null,
    fetcher: ImageFetcher = defaultFetcher,
): GarmentImageState => {
    const logger = useScopedLogger('catalog');
    const [state, setState] = useState<GarmentImageState>(IDLE);
    const imageUrl = item?.imageUrl ?? null;
    const itemName = item?.name ?? null;

    useEffect(() => {
        if (!imageUrl) {
            setState(IDLE);
            return;
        }
        let cancelled = false;
        setState({ status: 'loading', raster: null });

        void (async () => {
            const result = await loadImageFromUrl(imageUrl, fetcher);
            if (cancelled) {
                return;
            }
            if (!result.ok) {
                logger.error(result.error.message, { item: itemName, reason: result.error.reason });
                showSimpleErrorToast(`Could not load "${itemName ?? imageUrl}"`, result.error.message);
                setState({ status: 'failed', raster: null });
                return;
            }
            logger.info(`Loaded garment "${itemName ?? imageUrl}"`, {
                width: result.value.width,
                height: result.value.height,
            });
            setState({ status: 'ready', raster: result.value });
        })();

        return () => {
            cancelled = true;
        };
        // eslint-disable-next-line react-hooks/exhaustive-deps
    }, [imageUrl, itemName]);

    return state;
};
