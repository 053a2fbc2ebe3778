import React from 'react';

import type { RgbaRaster } from '@/compositor';

import RasterPreview from './RasterPreview';

interface ResultPanelProps {
    result: RgbaRaster | null;
    isRendering: boolean;
    isEncoding: boolean;
    onDownload: (result: RgbaRaster) => void;
}

const ResultPanel: React.FC<ResultPanelProps> = ({
    result,
    isRendering,
    isEncoding,
    onDownload,
}) => (
    <section
        className="flex flex-col gap-4 rounded-lg border border-gray-800 bg-gray-950 p-4 shadow-lg"
        data-testid="result-panel"
    >
        <div className="flex items-center justify-between">
            <h2 className="text-lg font-semibold text-gray-100">Your New Look!</h2>
            {isRendering && <span className="text-xs text-gray-500">Rendering…</span>}
        </div>
        {result ? (
            <>
                <RasterPreview
                    raster={result}
                    caption="Here's your virtual try-on!"
                    testId="result-preview"
                />
                <button
                    type="button"
                    onClick={() => onDownload(result)}
                    disabled={isEncoding}
                    className="self-start rounded-md border border-sky-500/60 bg-sky-500/10 px-3 py-2 text-sm text-sky-100 hover:border-sky-400 disabled:cursor-not-allowed disabled:opacity-50"
                    data-testid="download-button"
                >
                    Download Your New Look
                </button>
            </>
        ) : (
            <div className="rounded-md border border-dashed border-gray-700 bg-gray-900/50 p-6 text-center text-sm text-gray-500">
                Preparing your look…
            </div>
        )}
    </section>
);

export default ResultPanel;
