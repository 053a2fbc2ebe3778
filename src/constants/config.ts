const readEnv = (value: string | undefined, fallback: string): string => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : fallback;
};

const stripTrailingSlash = (value: string): string => value.replace(/\/+$/, '');

export const CATALOG_URL = readEnv(import.meta.env.VITE_CATALOG_URL, 'clothing_data.csv');

export const CLOTHING_IMAGE_BASE_URL = stripTrailingSlash(
    readEnv(import.meta.env.VITE_CLOTHING_IMAGE_BASE, 'images/clothing'),
);
