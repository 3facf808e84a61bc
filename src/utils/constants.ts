// Sentinel for "no entry" in chain heads and arena links
export const NIL = -1;

// Probing slot states (Uint8Array column)
export const EMPTY_SLOT = 0;
export const OCCUPIED_SLOT = 1;

// Probing growth defaults
export const DEFAULT_LOAD_FACTOR = 0.7;
export const GROWTH_FACTOR = 2;

// GrowableTypedArray defaults (chained entry arena)
export const DEFAULT_INITIAL_CAPACITY = 16;
