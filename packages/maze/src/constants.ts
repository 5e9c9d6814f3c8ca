/**
 * Cavern Constants
 *
 * Named constants for cavern dimensions, weights and rewards.
 */

// =============================================================================
// DIMENSIONS
// =============================================================================

/** Minimum number of rows */
export const MIN_ROWS = 8;

/** Maximum number of rows */
export const MAX_ROWS = 25;

/** Minimum number of columns */
export const MIN_COLS = 12;

/** Maximum number of columns */
export const MAX_COLS = 40;

// =============================================================================
// EDGES
// =============================================================================

/** Largest edge length; lengths are drawn uniformly from [1, MAX_EDGE_WEIGHT] */
export const MAX_EDGE_WEIGHT = 15;

// =============================================================================
// DIGGING
// =============================================================================

/** Fraction of the grid the digger tries to open */
export const DIG_DENSITY = 0.5;

/** A wall touching this many open tiles is never dug, which keeps corridors narrow */
export const MAX_OPEN_NEIGHBORS = 3;

/** Chance of joining a fresh tile to each extra open neighbour besides its parent */
export const LOOP_PROBABILITY = 0.25;

// =============================================================================
// GOLD
// =============================================================================

/** Chance that a non-entrance tile holds gold */
export const GOLD_PROBABILITY = 0.33;

/** Smallest gold pile */
export const MIN_GOLD = 1;

/** Largest gold pile */
export const MAX_GOLD = 1000;

// =============================================================================
// SERIALIZATION
// =============================================================================

/** Version written in the `CAVERN <version>` header */
export const CAVERN_FORMAT_VERSION = 1;

/** Largest row or column count a cavern file may declare */
export const MAX_FILE_DIMENSION = 1000;
