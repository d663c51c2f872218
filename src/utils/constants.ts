export const UNASSIGNED = -1;

// Free-list link column sentinels
export const END_OF_FREE_LIST = -1;
export const OCCUPIED_LINK = -2;
export const RETIRED_LINK = -3;

// Key layout: generation * INDEX_RANGE + index, kept inside Number.MAX_SAFE_INTEGER
export const INDEX_BITS = 32;
export const GENERATION_BITS = 21; // 53 - INDEX_BITS
export const INDEX_RANGE = 2 ** INDEX_BITS;
export const MAX_INDEX = INDEX_RANGE - 2; // largest index a JS array can hold
export const MAX_GENERATION = 2 ** GENERATION_BITS - 1;
export const MAX_CAPACITY = MAX_INDEX + 1;

// Slot generation
export const INITIAL_GENERATION = 0;

// GrowableTypedArray defaults
export const DEFAULT_INITIAL_CAPACITY = 16;
export const GROWTH_FACTOR = 2;
