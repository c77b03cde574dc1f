// Handle layout defaults (24 + 29 = 53, the widest safe-integer packing)
export const DEFAULT_INDEX_BITS = 24;
export const DEFAULT_ID_BITS = 29;
export const MAX_FIELD_BITS = 32; // both fields live in Uint32Array columns
export const MAX_HANDLE_BITS = 53; // Number.MAX_SAFE_INTEGER is 2^53 - 1

// Growth policy defaults
export const DEFAULT_MIN_FREE_KEYS = 32;
export const DEFAULT_ALLOCATION_SIZE = 512;

// Shrink the item store once this many whole chunks sit unused
export const SHRINK_SLACK_CHUNKS = 2;

// Generations
export const NULL_ID = 0;
export const INITIAL_ID = 1;

// Returned by ItemStore.index_of when nothing matches
export const NOT_FOUND = -1;
