import { afterEach, describe, expect, it, vi } from 'vitest';

import { saveBlob } from '../download';

afterEach(() => {
    vi.restoreAllMocks();
    vi.useRealTimers();
});

describe('saveBlob', () => {
    it('clicks a temporary link and revokes its url afterwards', () => {
        vi.useFakeTimers();
        const createObjectURL = vi.spyOn(URL, 'createObjectURL').mockReturnValue('blob:test/look');
        const revokeObjectURL = vi.spyOn(URL, 'revokeObjectURL').mockImplementation(() => {});
        const clicked: Array<{ href: string; download: string; attached: boolean }> = [];
        vi.spyOn(HTMLAnchorElement.prototype, 'click').mockImplementation(function (
            this: HTMLAnchorElement,
        ) {
            clicked.push({
                href: this.getAttribute('href') ?? '',
                download: this.download,
                attached: document.body.contains(this),
            });
        });
        const blob = new Blob(['png'], { type: 'image/png' });

        saveBlob(blob, 'virtual_look.png');

        expect(createObjectURL).toHaveBeenCalledWith(blob);
        expect(clicked).toEqual([
            { href: 'blob:test/look', download: 'virtual_look.png', attached: true },
        ]);
        expect(document.querySelector('a')).toBeNull();
        expect(revokeObjectURL).not.toHaveBeenCalled();

        vi.runAllTimers();
        expect(revokeObjectURL).toHaveBeenCalledWith('blob:test/look');
    });
});
