import React, { useId, useState } from 'react';

interface CollapsibleSectionProps {
    title: string;
    /** Whether the section starts expanded (default: false) */
    defaultExpanded?: boolean;
    children: React.ReactNode;
    className?: string;
}

/**
 * Sidebar section that folds away secondary content such as usage notes.
 */
const CollapsibleSection: React.FC<CollapsibleSectionProps> = ({
    title,
    defaultExpanded = false,
    children,
    className = '',
}) => {
    const [isExpanded, setIsExpanded] = useState(defaultExpanded);
    const contentId = useId();

    return (
        <section className={`rounded-lg border border-gray-800 bg-gray-950 shadow-lg ${className}`}>
            <button
                type="button"
                onClick={() => setIsExpanded((prev) => !prev)}
                aria-expanded={isExpanded}
                aria-controls={contentId}
                className="flex w-full items-center justify-between gap-3 p-3 text-left transition hover:bg-gray-900/50"
            >
                <span className="text-sm font-medium text-gray-200">{title}</span>
                <svg
                    className={`size-4 text-gray-400 transition-transform ${isExpanded ? 'rotate-180' : ''}`}
                    fill="none"
                    viewBox="0 0 24 24"
                    stroke="currentColor"
                >
                    <path
                        strokeLinecap="round"
                        strokeLinejoin="round"
                        strokeWidth={2}
                        d="M19 9l-7 7-7-7"
                    />
                </svg>
            </button>

            {isExpanded && (
                <div id={contentId} className="border-t border-gray-800 p-4 text-sm text-gray-300">
                    {children}
                </div>
            )}
        </section>
    );
};

export default CollapsibleSection;
