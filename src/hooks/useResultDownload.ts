import { useCallback, useState } from 'react';

import { showSimpleErrorToast } from '@/components/common/StyledToast';
import { DOWNLOAD_FILE_NAME } from '@/constants/fitting';
import { useScopedLogger } from '@/context/LogContext';
import { saveBlob } from '@/services/download';
import { encodePng } from '@/services/imageCodec';

import type { RgbaRaster } from '@/compositor';

export const useResultDownload = (save: (blob: Blob, fileName: string) => void = saveBlob) => {
    const logger = useScopedLogger('download');
    const [isEncoding, setIsEncoding] = useState(false);

    const download = useCallback(
        async (result: RgbaRaster): Promise<boolean> => {
            setIsEncoding(true);
            try {
                const encoded = await encodePng(result);
                if (!encoded.ok) {
                    logger.error(encoded.error.message, { reason: encoded.error.reason });
                    showSimpleErrorToast('Download failed', encoded.error.message);
                    return false;
                }
                save(encoded.value, DOWNLOAD_FILE_NAME);
                logger.info(`Downloaded ${DOWNLOAD_FILE_NAME}`, { bytes: encoded.value.size });
                return true;
            } finally {
                setIsEncoding(false);
            }
        },
        [logger, save],
    );

    return { download, isEncoding };
};
