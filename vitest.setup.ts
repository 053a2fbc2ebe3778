// Global React act() configuration for Vitest.
// React DOM checks this flag to decide whether to enforce act() usage.
(globalThis as { IS_REACT_ACT_ENVIRONMENT?: boolean }).IS_REACT_ACT_ENVIRONMENT = true;

// jsdom ships no object URLs; previews and downloads only need stable strings.
if (typeof URL.createObjectURL !== 'function') {
    let counter = 0;
    URL.createObjectURL = () => {
        counter += 1;
        return `blob:test/${counter}`;
    };
    URL.revokeObjectURL = () => {};
}
