/**
 * Hand a blob to the browser as a file download.
 */
export const saveBlob = (blob: Blob, fileName: string): void => {
    const url = URL.createObjectURL(blob);
    const anchor = document.createElement('a');
    anchor.href = url;
    anchor.download = fileName;
    anchor.rel = 'noopener';
    anchor.style.display = 'none';
    document.body.appendChild(anchor);
    try {
        anchor.click();
    } finally {
        document.body.removeChild(anchor);
        // Revoke on the next tick so the navigation has picked the URL up.
        globalThis.setTimeout(() => URL.revokeObjectURL(url), 0);
    }
};
