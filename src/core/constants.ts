/**
 * Core Constants
 */

// ============================================
// Entity IDs
// ============================================

/** Bits of an entity ID used for the slot index */
export const INDEX_BITS = 20;

/** Bits of an entity ID used for the generation counter */
export const GENERATION_BITS = 11;

export const MAX_ENTITIES = 1 << INDEX_BITS;
export const INDEX_MASK = MAX_ENTITIES - 1;
export const MAX_GENERATION = (1 << GENERATION_BITS) - 1;

// ============================================
// System Phases
// ============================================

/**
 * Phases run in this order every tick. The three physics passes are
 * strictly ordered: resolution must see integrated positions and a
 * refreshed grid.
 */
export const SYSTEM_PHASES = [
    'preUpdate',
    'integrate',
    'reindex',
    'resolve',
    'postUpdate',
    'render'
] as const;

export type SystemPhase = typeof SYSTEM_PHASES[number];

/** Phases that make up one fixed-timestep tick (render runs separately) */
export const TICK_PHASES: readonly SystemPhase[] = SYSTEM_PHASES.filter(p => p !== 'render');
