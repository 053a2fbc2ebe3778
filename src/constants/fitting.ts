import type { FitAdjustments } from '@/types';

export const MIN_SCALE = 0.1;
export const MAX_SCALE = 5;
export const SCALE_STEP = 0.05;

// Floor for programmatic callers of the compositor; the slider never goes this low.
export const MIN_RENDER_SCALE = 0.01;

export const DEFAULT_ADJUSTMENTS: FitAdjustments = {
    scale: 1,
    offsetX: 0,
    offsetY: 0,
};

export const RENDER_DEBOUNCE_MS = 120;

export const DOWNLOAD_FILE_NAME = 'virtual_look.png';
export const DOWNLOAD_MIME_TYPE = 'image/png';

export const ACCEPTED_UPLOAD_TYPES = ['image/jpeg', 'image/png'] as const;
export const ACCEPTED_UPLOAD_EXTENSIONS = ['.jpg', '.jpeg', '.png'] as const;

export const CATALOG_NAME_COLUMN = 'name';
export const CATALOG_FILE_COLUMN = 'image_file';
