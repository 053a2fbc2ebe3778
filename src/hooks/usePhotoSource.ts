import { useCallback, useEffect, useMemo, useRef, useState } from 'react';

import { showSimpleErrorToast, showSuccessToast } from '@/components/common/StyledToast';
import { useFittingSession } from '@/context/FittingSessionContext';
import { useScopedLogger } from '@/context/LogContext';
import { loadAvatar, persistAvatar } from '@/services/avatarStorage';
import {
    decodeImage,
    isAcceptedUpload,
    loadImageFromUrl,
    rasterToDataUrl,
    type ImageFetcher,
} from '@/services/imageCodec';
import type { PhotoSlot } from '@/types';

export const AVATAR_PHOTO_NAME = 'Saved avatar';

export interface UsePhotoSourceOptions {
    storage?: Storage;
    fetcher?: ImageFetcher;
}

const defaultFetcher: ImageFetcher = (url) => globalThis.fetch(url);

const resolveStorage = (): Storage | undefined =>
    typeof window !== 'undefined' ? window.localStorage : undefined;

/**
 * Owns the "Your Photo" slot: restores the saved avatar on first mount,
 * decodes uploads, and saves the current photo as the avatar.
 */
export const usePhotoSource = ({
    storage,
    fetcher = defaultFetcher,
}: UsePhotoSourceOptions = {}) => {
    const { session, loadPhoto } = useFittingSession();
    const photoLogger = useScopedLogger('photo');
    const avatarLogger = useScopedLogger('avatar');
    const resolvedStorage = useMemo(() => storage ?? resolveStorage(), [storage]);
    const [isDecoding, setIsDecoding] = useState(false);
    const uploadedRef = useRef(false);

    useEffect(() => {
        const saved = loadAvatar(resolvedStorage);
        if (!saved) {
            return;
        }
        let cancelled = false;

        void (async () => {
            const result = await loadImageFromUrl(saved.dataUrl, fetcher);
            // An upload made while the avatar was decoding takes precedence.
            if (cancelled || uploadedRef.current) {
                return;
            }
            if (!result.ok) {
                avatarLogger.error(`Saved avatar could not be decoded: ${result.error.message}`);
                showSimpleErrorToast('Saved avatar unavailable', result.error.message);
                return;
            }
            avatarLogger.info('Loaded saved avatar', { savedAt: saved.savedAt });
            loadPhoto({ source: 'avatar', name: AVATAR_PHOTO_NAME, raster: result.value });
        })();

        return () => {
            cancelled = true;
        };
        // eslint-disable-next-line react-hooks/exhaustive-deps
    }, [resolvedStorage]);

    const uploadPhoto = useCallback(
        async (file: File): Promise<PhotoSlot | null> => {
            if (!isAcceptedUpload(file)) {
                photoLogger.error(`Rejected upload "${file.name}"`, { type: file.type });
                showSimpleErrorToast('Unsupported file', 'Please choose a JPG or PNG photo.');
                return null;
            }
            uploadedRef.current = true;
            setIsDecoding(true);
            try {
                const result = await decodeImage(file);
                if (!result.ok) {
                    photoLogger.error(`Could not read "${file.name}": ${result.error.message}`, {
                        reason: result.error.reason,
                    });
                    showSimpleErrorToast(`Could not read "${file.name}"`, result.error.message);
                    return null;
                }
                const photo: PhotoSlot = { source: 'upload', name: file.name, raster: result.value };
                photoLogger.info(`Loaded "${file.name}"`, {
                    width: result.value.width,
                    height: result.value.height,
                });
                loadPhoto(photo);
                return photo;
            } finally {
                setIsDecoding(false);
            }
        },
        [loadPhoto, photoLogger],
    );

    const saveAvatar = useCallback((): boolean => {
        const { photo } = session;
        if (!photo) {
            return false;
        }
        const dataUrl = rasterToDataUrl(photo.raster);
        if (!dataUrl || !persistAvatar(resolvedStorage, dataUrl)) {
            avatarLogger.error('Avatar could not be saved');
            showSimpleErrorToast('Avatar not saved', 'Browser storage is unavailable or full.');
            return false;
        }
        avatarLogger.info(`Saved "${photo.name}" as avatar`);
        showSuccessToast('Avatar saved!', 'It will be loaded automatically next time.');
        return true;
    }, [avatarLogger, resolvedStorage, session]);

    return {
        photo: session.photo,
        isDecoding,
        uploadPhoto,
        saveAvatar,
    };
};
