// @vitest-environment node
import { describe, expect, it, vi } from 'vitest';

import { clearAvatar, loadAvatar, persistAvatar } from '../avatarStorage';

const STORAGE_KEY = 'fitting-room:avatar';
const DATA_URL = 'data:image/png;base64,iVBORw0KGgo=';

class MemoryStorage implements Storage {
    private store = new Map<string, string>();

    get length(): number {
        return this.store.size;
    }

    clear(): void {
        this.store.clear();
    }

    getItem(key: string): string | null {
        return this.store.get(key) ?? null;
    }

    key(index: number): string | null {
        return Array.from(this.store.keys())[index] ?? null;
    }

    removeItem(key: string): void {
        this.store.delete(key);
    }

    setItem(key: string, value: string): void {
        this.store.set(key, value);
    }
}

describe('avatarStorage', () => {
    it('returns null when nothing is saved', () => {
        expect(loadAvatar(new MemoryStorage())).toBeNull();
        expect(loadAvatar(undefined)).toBeNull();
    });

    it('persists and reloads the avatar', () => {
        const storage = new MemoryStorage();
        const savedAt = new Date('2026-03-01T10:00:00.000Z');

        expect(persistAvatar(storage, DATA_URL, savedAt)).toBe(true);
        expect(loadAvatar(storage)).toEqual({
            dataUrl: DATA_URL,
            savedAt: '2026-03-01T10:00:00.000Z',
        });
        expect(JSON.parse(storage.getItem(STORAGE_KEY) ?? '{}')).toMatchObject({ version: 1 });
    });

    it('refuses anything but a PNG data url', () => {
        const storage = new MemoryStorage();
        expect(persistAvatar(storage, 'https://example.test/me.png')).toBe(false);
        expect(storage.length).toBe(0);
    });

    it('ignores corrupt or foreign payloads', () => {
        const storage = new MemoryStorage();
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

        storage.setItem(STORAGE_KEY, '{not json');
        expect(loadAvatar(storage)).toBeNull();
        expect(warn).toHaveBeenCalledTimes(1);

        storage.setItem(STORAGE_KEY, JSON.stringify({ version: 2, dataUrl: DATA_URL }));
        expect(loadAvatar(storage)).toBeNull();

        storage.setItem(
            STORAGE_KEY,
            JSON.stringify({ version: 1, dataUrl: 'data:text/plain,hi', savedAt: 'x' }),
        );
        expect(loadAvatar(storage)).toBeNull();

        warn.mockRestore();
    });

    it('reports a failed write when storage is full', () => {
        const storage = new MemoryStorage();
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        vi.spyOn(storage, 'setItem').mockImplementation(() => {
            throw new DOMException('Quota exceeded', 'QuotaExceededError');
        });

        expect(persistAvatar(storage, DATA_URL)).toBe(false);
        expect(warn).toHaveBeenCalledWith('Failed to persist avatar', expect.any(DOMException));

        warn.mockRestore();
    });

    it('clears the saved avatar', () => {
        const storage = new MemoryStorage();
        persistAvatar(storage, DATA_URL);

        clearAvatar(storage);

        expect(loadAvatar(storage)).toBeNull();
    });
});
