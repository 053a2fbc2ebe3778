import React from 'react';

import { MAX_SCALE, MIN_SCALE, SCALE_STEP } from '@/constants/fitting';
import { formatOffset, formatScale, offsetBounds, snapScale } from '@/utils/adjustments';

import type { Size } from '@/compositor';
import type { FitAdjustments } from '@/types';

interface AdjustmentControlsProps {
    adjustments: FitAdjustments;
    /** Photo dimensions; the position sliders span half of each */
    photoSize: Size | null;
    disabled?: boolean;
    onChange: (patch: Partial<FitAdjustments>) => void;
    onReset: () => void;
}

interface SliderRowProps {
    id: string;
    label: string;
    min: number;
    max: number;
    step: number;
    value: number;
    disabled: boolean;
    format: (value: number) => string;
    onChange: (value: number) => void;
}

const SliderRow: React.FC<SliderRowProps> = ({
    id,
    label,
    min,
    max,
    step,
    value,
    disabled,
    format,
    onChange,
}) => (
    <div className="flex flex-col gap-1">
        <label htmlFor={id} className="flex items-center justify-between text-sm">
            <span>{label}</span>
            <span className="font-mono text-xs text-gray-400">{format(value)}</span>
        </label>
        <input
            id={id}
            type="range"
            min={min}
            max={max}
            step={step}
            value={value}
            disabled={disabled}
            onChange={(event) => onChange(Number(event.target.value))}
            className="cursor-pointer accent-sky-500 disabled:cursor-not-allowed disabled:opacity-40"
        />
    </div>
);

const AdjustmentControls: React.FC<AdjustmentControlsProps> = ({
    adjustments,
    photoSize,
    disabled = false,
    onChange,
    onReset,
}) => {
    const bounds = photoSize ? offsetBounds(photoSize) : null;
    const positionDisabled = disabled || !bounds;

    return (
        <section className="rounded-lg border border-gray-800 bg-gray-950 p-4 shadow-lg">
            <div className="flex items-center justify-between">
                <h2 className="text-lg font-semibold text-gray-100">Adjust Clothing</h2>
                <button
                    type="button"
                    onClick={onReset}
                    disabled={disabled}
                    className="text-xs text-emerald-300 hover:text-emerald-200 disabled:text-gray-600"
                    title="Reset size and position"
                >
                    Reset
                </button>
            </div>
            <div className="mt-4 flex flex-col gap-3 text-sm text-gray-300">
                <SliderRow
                    id="adjust-scale"
                    label="Size"
                    min={MIN_SCALE}
                    max={MAX_SCALE}
                    step={SCALE_STEP}
                    value={adjustments.scale}
                    disabled={disabled}
                    format={formatScale}
                    onChange={(scale) => onChange({ scale: snapScale(scale) })}
                />
                <SliderRow
                    id="adjust-offset-x"
                    label="Horizontal Position"
                    min={bounds?.x.min ?? 0}
                    max={bounds?.x.max ?? 0}
                    step={1}
                    value={adjustments.offsetX}
                    disabled={positionDisabled}
                    format={formatOffset}
                    onChange={(offsetX) => onChange({ offsetX })}
                />
                <SliderRow
                    id="adjust-offset-y"
                    label="Vertical Position"
                    min={bounds?.y.min ?? 0}
                    max={bounds?.y.max ?? 0}
                    step={1}
                    value={adjustments.offsetY}
                    disabled={positionDisabled}
                    format={formatOffset}
                    onChange={(offsetY) => onChange({ offsetY })}
                />
            </div>
        </section>
    );
};

export default AdjustmentControls;
