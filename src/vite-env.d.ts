/// <reference types="vite/client" />

// Build-mode flag: true under Vitest and `vite` dev, replaced by a
// NODE_ENV check in the library build.
declare const __DEV__: boolean;
