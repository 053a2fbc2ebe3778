import React, { useRef } from 'react';

import { ACCEPTED_UPLOAD_EXTENSIONS, ACCEPTED_UPLOAD_TYPES } from '@/constants/fitting';
import type { PhotoSlot } from '@/types';

import RasterPreview from './RasterPreview';

interface PhotoPanelProps {
    photo: PhotoSlot | null;
    isDecoding: boolean;
    onUpload: (file: File) => void;
    onSaveAvatar: () => void;
}

const ACCEPT_ATTRIBUTE = [...ACCEPTED_UPLOAD_TYPES, ...ACCEPTED_UPLOAD_EXTENSIONS].join(',');

const PhotoPanel: React.FC<PhotoPanelProps> = ({ photo, isDecoding, onUpload, onSaveAvatar }) => {
    const fileInputRef = useRef<HTMLInputElement | null>(null);

    const handleFileChange = (event: React.ChangeEvent<HTMLInputElement>): void => {
        const file = event.target.files?.[0] ?? null;
        event.target.value = '';
        if (file) {
            onUpload(file);
        }
    };

    return (
        <section className="flex flex-col gap-4 rounded-lg border border-gray-800 bg-gray-950 p-4 shadow-lg">
            <h2 className="text-lg font-semibold text-gray-100">Your Photo</h2>
            <div className="flex flex-wrap items-center gap-3">
                <button
                    type="button"
                    onClick={() => fileInputRef.current?.click()}
                    disabled={isDecoding}
                    className="rounded-md border border-sky-500/60 bg-sky-500/10 px-3 py-2 text-sm text-sky-100 hover:border-sky-400 disabled:cursor-not-allowed disabled:opacity-50"
                    data-testid="photo-upload-button"
                >
                    {isDecoding ? 'Reading photo…' : 'Choose a new photo'}
                </button>
                <span className="text-xs text-gray-500">
                    {photo?.source === 'avatar'
                        ? 'Using your saved avatar'
                        : 'JPG or PNG, or use your saved avatar'}
                </span>
                <input
                    ref={fileInputRef}
                    type="file"
                    accept={ACCEPT_ATTRIBUTE}
                    className="hidden"
                    onChange={handleFileChange}
                    data-testid="photo-file-input"
                />
            </div>
            {photo ? (
                <>
                    <RasterPreview raster={photo.raster} caption="This is you!" testId="photo-preview" />
                    <button
                        type="button"
                        onClick={onSaveAvatar}
                        className="self-start rounded-md border border-emerald-500/70 bg-emerald-500/10 px-3 py-2 text-sm text-emerald-200 hover:border-emerald-400"
                        data-testid="save-avatar-button"
                    >
                        Save as My Avatar
                    </button>
                </>
            ) : (
                <div className="rounded-md border border-dashed border-gray-700 bg-gray-900/50 p-6 text-center text-sm text-gray-500">
                    Upload a clear, front-facing photo to get started.
                </div>
            )}
        </section>
    );
};

export default PhotoPanel;
