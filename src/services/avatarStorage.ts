const STORAGE_KEY = 'fitting-room:avatar';
const CURRENT_VERSION = 1;

const DATA_URL_PREFIX = 'data:image/png;base64,';

export interface StoredAvatar {
    dataUrl: string;
    savedAt: string;
}

interface StoredAvatarV1 extends StoredAvatar {
    version: 1;
}

const isStoredAvatarV1 = (value: unknown): value is StoredAvatarV1 => {
    if (!value || typeof value !== 'object') {
        return false;
    }
    const candidate = value as Partial<StoredAvatarV1>;
    return (
        candidate.version === CURRENT_VERSION &&
        typeof candidate.dataUrl === 'string' &&
        candidate.dataUrl.startsWith(DATA_URL_PREFIX) &&
        typeof candidate.savedAt === 'string'
    );
};

export const loadAvatar = (storage: Storage | undefined): StoredAvatar | null => {
    if (!storage) {
        return null;
    }

    let raw: string | null;
    try {
        raw = storage.getItem(STORAGE_KEY);
    } catch (error) {
        console.warn('Failed to read saved avatar', error);
        return null;
    }
    if (!raw) {
        return null;
    }

    try {
        const parsed: unknown = JSON.parse(raw);
        if (!isStoredAvatarV1(parsed)) {
            return null;
        }
        return { dataUrl: parsed.dataUrl, savedAt: parsed.savedAt };
    } catch (error) {
        console.warn('Failed to parse saved avatar from storage', error);
        return null;
    }
};

/**
 * Returns false when the avatar could not be written (no storage, quota).
 */
export const persistAvatar = (
    storage: Storage | undefined,
    dataUrl: string,
    now: Date = new Date(),
): boolean => {
    if (!storage || !dataUrl.startsWith(DATA_URL_PREFIX)) {
        return false;
    }

    const payload: StoredAvatarV1 = {
        version: CURRENT_VERSION,
        dataUrl,
        savedAt: now.toISOString(),
    };

    try {
        storage.setItem(STORAGE_KEY, JSON.stringify(payload));
        return true;
    } catch (error) {
        console.warn('Failed to persist avatar', error);
        return false;
    }
};

export const clearAvatar = (storage: Storage | undefined): void => {
    if (!storage) {
        return;
    }
    try {
        storage.removeItem(STORAGE_KEY);
    } catch (error) {
        console.warn('Failed to clear saved avatar', error);
    }
};
