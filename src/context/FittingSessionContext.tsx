import React, { createContext, useCallback, useContext, useMemo, useReducer } from 'react';

import { fittingSessionReducer, INITIAL_SESSION } from '@/services/fittingSession';
import type { FitAdjustments, FittingSession, PhotoSlot } from '@/types';

interface FittingSessionContextType {
    session: FittingSession;
    loadPhoto: (photo: PhotoSlot) => void;
    clearPhoto: () => void;
    selectItem: (name: string | null) => void;
    updateAdjustments: (patch: Partial<FitAdjustments>) => void;
    resetAdjustments: () => void;
}

const FittingSessionContext = createContext<FittingSessionContextType | null>(null);

export const useFittingSession = () => {
    const context = useContext(FittingSessionContext);
    if (!context) {
        throw new Error('useFittingSession must be used within a FittingSessionProvider');
    }
    return context;
};

export const FittingSessionProvider: React.FC<{
    children: React.ReactNode;
    initialSession?: FittingSession;
}> = ({ children, initialSession = INITIAL_SESSION }) => {
    const [session, dispatch] = useReducer(fittingSessionReducer, initialSession);

    const loadPhoto = useCallback(
        (photo: PhotoSlot) => dispatch({ type: 'photo-loaded', photo }),
        [],
    );
    const clearPhoto = useCallback(() => dispatch({ type: 'photo-cleared' }), []);
    const selectItem = useCallback(
        (name: string | null) => dispatch({ type: 'item-selected', name }),
        [],
    );
    const updateAdjustments = useCallback(
        (patch: Partial<FitAdjustments>) => dispatch({ type: 'adjustments-changed', patch }),
        [],
    );
    const resetAdjustments = useCallback(() => dispatch({ type: 'adjustments-reset' }), []);

    const value = useMemo(
        () => ({
            session,
            loadPhoto,
            clearPhoto,
            selectItem,
            updateAdjustments,
            resetAdjustments,
        }),
        [session, loadPhoto, clearPhoto, selectItem, updateAdjustments, resetAdjustments],
    );

    return (
        <FittingSessionContext.Provider value={value}>{children}</FittingSessionContext.Provider>
    );
};
