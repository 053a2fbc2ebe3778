import React, { act, useEffect } from 'react';
import { createRoot } from 'react-dom/client';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createRaster, readPixel, type OverlayRequest } from '../../compositor';
import LogConsole from '../../components/LogConsole';
import { LogProvider } from '../../context/LogContext';
import { useCompositeRender, type CompositeRenderState } from '../useCompositeRender';

const RED = [255, 0, 0, 255];
const BLUE = [0, 0, 255, 255];

const makeRequest = (offsetX = 0): OverlayRequest => ({
    base: createRaster(4, 4, RED),
    overlay: createRaster(2, 2, BLUE),
    scale: 1,
    offset: { x: offsetX, y: 0 },
});

const Harness: React.FC<{
    request: OverlayRequest | null;
    onState: (state: CompositeRenderState) => void;
}> = ({ request, onState }) => {
    const state = useCompositeRender(request, 120);
    useEffect(() => {
        onState(state);
    }, [state, onState]);
    return null;
};

describe('useCompositeRender', () => {
    let container: HTMLDivElement;
    let root: ReturnType<typeof createRoot>;
    let latest: CompositeRenderState | null;
    const onState = (state: CompositeRenderState) => {
        latest = state;
    };

    const render = (request: OverlayRequest | null) => {
        act(() => {
            root.render(
                <LogProvider>
                    <Harness request={request} onState={onState} />
                    <LogConsole />
                </LogProvider>,
            );
        });
    };

    beforeEach(() => {
        vi.useFakeTimers();
        latest = null;
        container = document.createElement('div');
        document.body.appendChild(container);
        root = createRoot(container);
    });

    afterEach(() => {
        act(() => {
            root.unmount();
        });
        document.body.removeChild(container);
        vi.useRealTimers();
    });

    it('renders the centred composite once the request settles', () => {
        render(makeRequest());
        expect(latest).toEqual({ result: null, isRendering: true });

        act(() => {
            vi.advanceTimersByTime(119);
        });
        expect(latest?.result).toBeNull();

        act(() => {
            vi.advanceTimersByTime(1);
        });
        const result = latest?.result;
        expect(latest?.isRendering).toBe(false);
        expect(result?.width).toBe(4);
        expect(result?.height).toBe(4);
        if (result) {
            expect(readPixel(result, 0, 0)).toEqual(RED);
            expect(readPixel(result, 1, 1)).toEqual(BLUE);
            expect(readPixel(result, 2, 2)).toEqual(BLUE);
            expect(readPixel(result, 3, 3)).toEqual(RED);
        }
    });

    it('only renders the last of several quick requests', () => {
        render(makeRequest());
        act(() => {
            vi.advanceTimersByTime(60);
        });
        render(makeRequest(1));
        act(() => {
            vi.advanceTimersByTime(60);
        });
        expect(latest?.result).toBeNull();

        act(() => {
            vi.advanceTimersByTime(60);
        });
        const result = latest?.result;
        if (!result) {
            throw new Error('expected a composite');
        }
        expect(readPixel(result, 1, 1)).toEqual(RED);
        expect(readPixel(result, 2, 1)).toEqual(BLUE);
        expect(readPixel(result, 3, 2)).toEqual(BLUE);
    });

    it('drops the result when the request goes away', () => {
        render(makeRequest());
        act(() => {
            vi.advanceTimersByTime(120);
        });
        expect(latest?.result).not.toBeNull();

        render(null);
        expect(latest).toEqual({ result: null, isRendering: false });
    });

    it('logs a failed composite instead of throwing', () => {
        const broken: OverlayRequest = {
            ...makeRequest(),
            overlay: { width: 2, height: 2, channels: 4, data: new Uint8ClampedArray(3) },
        };

        render(broken);
        act(() => {
            vi.advanceTimersByTime(120);
        });

        expect(latest).toEqual({ result: null, isRendering: false });
        const entry = container.querySelector('li[data-severity="error"]');
        expect(entry?.textContent).toContain('Composite failed');
        expect(entry?.textContent).toContain('render');
    });
});
