import { useEffect, useState } from 'react';

import { showListWarningToast, showSimpleWarningToast } from '@/components/common/StyledToast';
import { CATALOG_URL, CLOTHING_IMAGE_BASE_URL } from '@/constants/config';
import { useScopedLogger } from '@/context/LogContext';
import { loadCatalog, type CatalogError, type CatalogFetcher } from '@/services/clothingCatalog';
import type { ClothingItem } from '@/types';

export type CatalogStatus = 'loading' | 'ready' | 'unavailable';

export interface ClothingCatalogState {
    status: CatalogStatus;
    items: ClothingItem[];
    error: CatalogError | null;
}

export interface UseClothingCatalogOptions {
    fetcher?: CatalogFetcher;
    url?: string;
    imageBaseUrl?: string;
}

const defaultFetcher: CatalogFetcher = (url) => globalThis.fetch(url);

const EMPTY_CATALOG_MESSAGE = 'Please add items to clothing_data.csv';

/**
 * Loads the clothing catalog once per mount. A missing or empty catalog is a
 * warning, not an error: the picker simply offers nothing.
 */
export const useClothingCatalog = ({
    fetcher = defaultFetcher,
    url = CATALOG_URL,
    imageBaseUrl = CLOTHING_IMAGE_BASE_URL,
}: UseClothingCatalogOptions = {}): ClothingCatalogState => {
    const logger = useScopedLogger('catalog');
    const [state, setState] = useState<ClothingCatalogState>({
        status: 'loading',
        items: [],
        error: null,
    });

    useEffect(() => {
        let cancelled = false;

        const run = async () => {
            const result = await loadCatalog(fetcher, url, imageBaseUrl);
            if (cancelled) {
                return;
            }
            if (!result.ok) {
                logger.warning(result.error.message, { reason: result.error.reason });
                showSimpleWarningToast('No clothing items found', EMPTY_CATALOG_MESSAGE);
                setState({ status: 'unavailable', items: [], error: result.error });
                return;
            }

            const { items, skipped } = result.value;
            if (skipped.length > 0) {
                logger.warning(`Skipped ${skipped.length} malformed catalog row(s)`, {
                    lines: skipped.map((issue) => issue.line),
                });
                showListWarningToast('clothing_data.csv', skipped, 'skipped row');
            }
            if (items.length === 0) {
                logger.warning('Catalog contains no usable items');
                showSimpleWarningToast('No clothing items found', EMPTY_CATALOG_MESSAGE);
            } else {
                logger.info(`Loaded ${items.length} clothing item(s)`);
            }
            setState({ status: 'ready', items, error: null });
        };

        void run();

        return () => {
            cancelled = true;
        };
        // Loaded once per source; the fetcher identity is not part of that.
        // eslint-disable-next-line react-hooks/exhaustive-deps
    }, [url, imageBaseUrl]);

    return state;
};
