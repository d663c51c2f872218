// Build-mode flag for dead code elimination.
// Defined by vite/vitest config; library builds rewrite it to a NODE_ENV check.
declare const __DEV__: boolean;
