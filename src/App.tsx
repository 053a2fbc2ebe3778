import React from 'react';
import { Toaster } from 'sonner';

import { FittingSessionProvider } from './context/FittingSessionContext';
import { LogProvider } from './context/LogContext';
import FittingRoomPage, { type FittingRoomPageProps } from './pages/FittingRoomPage';

const App: React.FC<FittingRoomPageProps> = (props) => (
    <LogProvider>
        <FittingSessionProvider>
            <div className="min-h-screen bg-gray-900 p-4 text-gray-200 sm:p-6">
                <FittingRoomPage {...props} />
            </div>
            <Toaster position="bottom-right" />
        </FittingSessionProvider>
    </LogProvider>
);

export default App;
