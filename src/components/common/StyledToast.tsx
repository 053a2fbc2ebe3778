import { toast } from 'sonner';

import type { ReactNode } from 'react';

// ============================================================================
// Shared Toast Components
// ============================================================================

type ToastVariant = 'error' | 'warning' | 'success';

const VARIANT_STYLES: Record<
    ToastVariant,
    {
        border: string;
        bg: string;
        title: string;
        text: string;
        listBorder: string;
    }
> = {
    error: {
        border: 'border-rose-500/50',
        bg: 'bg-rose-950',
        title: 'text-rose-100',
        text: 'text-rose-200/80',
        listBorder: 'border-rose-500/40',
    },
    warning: {
        border: 'border-amber-500/50',
        bg: 'bg-amber-950',
        title: 'text-amber-100',
        text: 'text-amber-200/80',
        listBorder: 'border-amber-500/40',
    },
    success: {
        border: 'border-emerald-500/50',
        bg: 'bg-emerald-950',
        title: 'text-emerald-100',
        text: 'text-emerald-200/80',
        listBorder: 'border-emerald-500/40',
    },
};

// Success messages clear themselves; problems stay until dismissed.
const VARIANT_DURATION: Record<ToastVariant, number> = {
    error: Infinity,
    warning: Infinity,
    success: 4_000,
};

function DismissButton({ onClick }: { onClick: () => void }) {
    return (
        <button
            onClick={onClick}
            className="flex-none rounded p-1 text-gray-400 hover:bg-gray-800 hover:text-white"
            aria-label="Dismiss"
        >
            <svg
                xmlns="http://www.w3.org/2000/svg"
                viewBox="0 0 20 20"
                fill="currentColor"
                className="size-4"
            >
                <path d="M6.28 5.22a.75.75 0 00-1.06 1.06L8.94 10l-3.72 3.72a.75.75 0 101.06 1.06L10 11.06l3.72 3.72a.75.75 0 101.06-1.06L11.06 10l3.72-3.72a.75.75 0 00-1.06-1.06L10 8.94 6.28 5.22z" />
            </svg>
        </button>
    );
}

interface StyledToastShellProps {
    variant: ToastVariant;
    children: ReactNode;
    onDismiss: () => void;
}

function StyledToastShell({ variant, children, onDismiss }: StyledToastShellProps) {
    const styles = VARIANT_STYLES[variant];
    return (
        <div className={`w-[356px] rounded-lg border ${styles.border} ${styles.bg} p-4 shadow-lg`}>
            <div className="flex items-start gap-3">
                <div className="min-w-0 flex-1">{children}</div>
                <DismissButton onClick={onDismiss} />
            </div>
        </div>
    );
}

const showStyledToast = (variant: ToastVariant, content: ReactNode, id?: string): void => {
    toast.custom(
        (toastId) => (
            <StyledToastShell variant={variant} onDismiss={() => toast.dismiss(toastId)}>
                {content}
            </StyledToastShell>
        ),
        {
            id,
            duration: VARIANT_DURATION[variant],
            unstyled: true,
        },
    );
};

// ============================================================================
// Simple Toast
// ============================================================================

interface SimpleToastContentProps {
    variant: ToastVariant;
    title: string;
    message: string;
}

function SimpleToastContent({ variant, title, message }: SimpleToastContentProps) {
    const styles = VARIANT_STYLES[variant];
    return (
        <div className="text-sm select-text">
            <div className={`font-medium ${styles.title}`}>{title}</div>
            <p className={`mt-1 text-xs ${styles.text}`}>{message}</p>
        </div>
    );
}

/**
 * Error toast for a failed load or render. The affected slot is skipped.
 */
export function showSimpleErrorToast(title: string, message: string): void {
    showStyledToast('error', <SimpleToastContent variant="error" title={title} message={message} />);
}

export function showSimpleWarningToast(title: string, message: string): void {
    showStyledToast(
        'warning',
        <SimpleToastContent variant="warning" title={title} message={message} />,
    );
}

export function showSuccessToast(title: string, message: string): void {
    showStyledToast(
        'success',
        <SimpleToastContent variant="success" title={title} message={message} />,
    );
}

// ============================================================================
// List Toast (catalog rows that were skipped)
// ============================================================================

export interface LineIssue {
    line: number;
    message: string;
}

interface ListToastContentProps {
    variant: ToastVariant;
    title: string;
    items: LineIssue[];
    itemLabel: string;
}

function ListToastContent({ variant, title, items, itemLabel }: ListToastContentProps) {
    const styles = VARIANT_STYLES[variant];
    const plural = items.length !== 1 ? 's' : '';

    return (
        <div className="text-sm select-text">
            <div className={`font-medium ${styles.title}`}>
                {items.length} {itemLabel}
                {plural}: {title}
            </div>
            <ul className="mt-2 max-h-48 space-y-1 overflow-y-auto text-xs">
                {items.map((item) => (
                    <li key={item.line} className={`border-l-2 ${styles.listBorder} pl-2`}>
                        <span className="text-gray-400">line {item.line}</span>{' '}
                        <span className={styles.text}>{item.message}</span>
                    </li>
                ))}
            </ul>
        </div>
    );
}

export function showListWarningToast(title: string, items: LineIssue[], itemLabel = 'issue'): void {
    showStyledToast(
        'warning',
        <ListToastContent variant="warning" title={title} items={items} itemLabel={itemLabel} />,
        `list-warning-${title.replace(/\s+/g, '-').toLowerCase()}`,
    );
}
