import { useEffect, useState } from 'react';

import { compositeCentered, type OverlayRequest, type RgbaRaster } from '@/compositor';
import { RENDER_DEBOUNCE_MS } from '@/constants/fitting';
import { useScopedLogger } from '@/context/LogContext';

export interface CompositeRenderState {
    result: RgbaRaster | null;
    isRendering: boolean;
}

/**
 * Runs the compositor for `request` once it has been stable for `delayMs`.
 * `request` must be memoised by the caller; a new object schedules a render.
 */
export const useCompositeRender = (
    request: OverlayRequest | null,
    delayMs: number = RENDER_DEBOUNCE_MS,
): CompositeRenderState => {
    const logger = useScopedLogger('render');
    const [state, setState] = useState<CompositeRenderState>({ result: null, isRendering: false });

    useEffect(() => {
        if (!request) {
            setState({ result: null, isRendering: false });
            return;
        }
        setState((prev) => ({ result: prev.result, isRendering: true }));

        const handle = globalThis.setTimeout(() => {
            try {
                setState({ result: compositeCentered(request), isRendering: false });
            } catch (error) {
                logger.error('Composite failed', {
                    error: error instanceof Error ? error.message : String(error),
                });
                setState({ result: null, isRendering: false });
            }
        }, delayMs);

        return () => {
            globalThis.clearTimeout(handle);
        };
    }, [request, delayMs, logger]);

    return state;
};
