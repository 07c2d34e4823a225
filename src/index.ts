/**
 * rrect-physics2d - 2D physics for axis-aligned rounded-rectangle colliders
 *
 * Features:
 * - Named forces with mixing and exponential damping
 * - Incremental spatial hash grid broad phase
 * - Rounded-rectangle narrow phase with mass-weighted push-out
 * - Deterministic tick order (ascending entity ID)
 */

// ============================================
// Math
// ============================================
export * from './math';

// ============================================
// Core
// ============================================
export {
    EntityIdAllocator,
    SystemScheduler,
    SYSTEM_PHASES,
    TICK_PHASES,
    MAX_ENTITIES,
    INDEX_MASK,
    setDebugAssertions,
    debugAssertionsEnabled,
    debugAssert
} from './core';

export type {
    EntityId,
    SystemPhase,
    SystemFn,
    SystemOptions
} from './core';

// ============================================
// Physics
// ============================================
export * from './plugins/rrect-physics';

// Namespace export for grouped access
export * as rrectPhysics from './plugins/rrect-physics';
