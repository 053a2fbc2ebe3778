import React from 'react';

import CollapsibleSection from './common/CollapsibleSection';

const UsageGuide: React.FC = () => (
    <div className="flex flex-col gap-3">
        <CollapsibleSection title="How to Use" defaultExpanded>
            <ol className="list-decimal space-y-2 pl-4">
                <li>
                    <strong>Upload Your Photo:</strong> choose a clear, front-facing photo of
                    yourself.
                </li>
                <li>
                    <strong>Choose Clothing:</strong> select an item from the dropdown to see it on
                    your photo.
                </li>
                <li>
                    <strong>View &amp; Download:</strong> check the result under &ldquo;Your New
                    Look!&rdquo; and download it if you like.
                </li>
            </ol>
        </CollapsibleSection>
        <CollapsibleSection title="About">
            <p>
                A simple virtual fitting room. Everything happens in your browser; photos are never
                uploaded anywhere.
            </p>
        </CollapsibleSection>
    </div>
);

export default UsageGuide;
