import React, {
    createContext,
    useCallback,
    useContext,
    useMemo,
    useState,
    type PropsWithChildren,
} from 'react';

export type LogSeverity = 'info' | 'warning' | 'error';

export type LogScope = 'photo' | 'catalog' | 'render' | 'avatar' | 'download';

export interface LogEntry {
    id: string;
    scope: LogScope;
    severity: LogSeverity;
    message: string;
    timestamp: number;
    metadata?: Record<string, unknown>;
}

interface AppendLogParams {
    scope: LogScope;
    severity: LogSeverity;
    message: string;
    metadata?: Record<string, unknown>;
    timestamp?: number;
}

interface LogContextValue {
    entries: LogEntry[];
    append: (entry: AppendLogParams) => void;
    clear: () => void;
}

export const MAX_LOG_ENTRIES = 200;

const LogContext = createContext<LogContextValue | undefined>(undefined);

const createLogId = (() => {
    let counter = 0;
    return () => {
        counter += 1;
        return `log-${Date.now()}-${counter}`;
    };
})();

export const LogProvider: React.FC<PropsWithChildren> = ({ children }) => {
    const [entries, setEntries] = useState<LogEntry[]>([]);

    const append = useCallback((entry: AppendLogParams) => {
        setEntries((prev) =>
            [
                {
                    id: createLogId(),
                    scope: entry.scope,
                    severity: entry.severity,
                    message: entry.message,
                    metadata: entry.metadata,
                    timestamp: entry.timestamp ?? Date.now(),
                },
                ...prev,
            ].slice(0, MAX_LOG_ENTRIES),
        );
    }, []);

    const clear = useCallback(() => setEntries([]), []);

    const value = useMemo<LogContextValue>(
        () => ({ entries, append, clear }),
        [append, clear, entries],
    );

    return <LogContext.Provider value={value}>{children}</LogContext.Provider>;
};

const useLogContext = (): LogContextValue => {
    const context = useContext(LogContext);
    if (!context) {
        throw new Error('useLogStore must be used within a LogProvider');
    }
    return context;
};

export const useLogStore = () => {
    const { entries, clear } = useLogContext();
    return { entries, clear };
};

export interface ScopedLogger {
    info: (message: string, metadata?: Record<string, unknown>) => void;
    warning: (message: string, metadata?: Record<string, unknown>) => void;
    error: (message: string, metadata?: Record<string, unknown>) => void;
}

/**
 * Logger bound to one scope. The returned object is stable for the lifetime
 * of the provider, so it is safe in effect dependency lists.
 */
export const useScopedLogger = (scope: LogScope): ScopedLogger => {
    const { append } = useLogContext();

    return useMemo<ScopedLogger>(
        () => ({
            info: (message, metadata) => append({ scope, severity: 'info', message, metadata }),
            warning: (message, metadata) =>
                append({ scope, severity: 'warning', message, metadata }),
            error: (message, metadata) => append({ scope, severity: 'error', message, metadata }),
        }),
        [append, scope],
    );
};
