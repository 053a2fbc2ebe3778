import React, { useEffect, useRef } from 'react';

import type { RgbaRaster } from '@/compositor';

interface RasterPreviewProps {
    raster: RgbaRaster;
    caption: string;
    testId?: string;
}

/**
 * Paints a raster into a canvas at its native resolution; CSS scales it to the column.
 */
const RasterPreview: React.FC<RasterPreviewProps> = ({ raster, caption, testId }) => {
    const canvasRef = useRef<HTMLCanvasElement | null>(null);

    useEffect(() => {
        const canvas = canvasRef.current;
        if (!canvas) {
            return;
        }
        canvas.width = raster.width;
        canvas.height = raster.height;
        const context = canvas.getContext('2d');
        if (!context) {
            return;
        }
        const imageData = context.createImageData(raster.width, raster.height);
        imageData.data.set(raster.data);
        context.putImageData(imageData, 0, 0);
    }, [raster]);

    return (
        <figure className="flex flex-col gap-2" data-testid={testId}>
            <canvas
                ref={canvasRef}
                className="h-auto w-full rounded-md border border-gray-800 bg-gray-900"
                aria-label={caption}
                data-width={raster.width}
                data-height={raster.height}
            />
            <figcaption className="text-center text-xs text-gray-400">{caption}</figcaption>
        </figure>
    );
};

export default RasterPreview;
