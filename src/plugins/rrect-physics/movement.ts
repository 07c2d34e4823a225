/**
 * Position, Forces and Movement
 *
 * A Movement owns a set of named forces. Velocity is never set directly:
 * it is recomputed every tick from the forces, so callers steer an entity
 * with applyForce() and let inactive forces bleed off through damping.
 */

import { Vec2, vec2Zero, vec2Clone, vec2Mul, vec2Scale } from '../../math/vec';

// ============================================
// Constants
// ============================================

/** Maximum speed in distance-units per second */
export const MAX_VELOCITY = 256;

export const DEFAULT_FORCE_ID = 'default_force';

// ============================================
// Types
// ============================================

/**
 * Simulation-space location. Multiply by the tile size for rendering.
 */
export interface Position {
    x: number;
    y: number;
}

export function createPosition(x: number = 0, y: number = 0): Position {
    return { x, y };
}

export interface Force {
    /** Identity of the force; mixing and removal join on it */
    id: string;
    force: Vec2;
    /**
     * Active forces are driven externally (e.g. player input) and keep their
     * magnitude. Inactive forces are residual impulses and get damped.
     */
    active: boolean;
}

/** Sparse update for a force. Unset fields keep their previous value. */
export interface PartialForce {
    id: string;
    force?: Vec2;
    active?: boolean;
}

export interface Movement {
    /** Displacement per tick. Recomputed from `forces`; do not modify. */
    velocity: Vec2;
    /** Forces keyed by id. Use applyForce() to add or change one. */
    forces: Map<string, Force>;
    /** Factor inactive forces are multiplied by (times dt) each tick */
    damping: Vec2;
}

export function createMovement(damping: Vec2 = vec2Zero()): Movement {
    return {
        velocity: vec2Zero(),
        forces: new Map(),
        damping: vec2Clone(damping)
    };
}

export function createDefaultForce(): Force {
    return { id: DEFAULT_FORCE_ID, force: vec2Zero(), active: false };
}

// ============================================
// Force Mixing
// ============================================

/**
 * Forces are equal iff their ids match.
 */
export function forceEquals(a: Force, b: Force): boolean {
    return a.id === b.id;
}

export function mixForce(force: Force, partial: PartialForce): Force {
    return {
        id: force.id,
        force: vec2Clone(partial.force ?? force.force),
        active: partial.active ?? force.active
    };
}

export function forceFromPartial(partial: PartialForce): Force {
    return {
        id: partial.id,
        force: partial.force ? vec2Clone(partial.force) : vec2Zero(),
        active: partial.active ?? false
    };
}

/**
 * Add a force, or mix the update into the existing force with the same id.
 */
export function applyForce(movement: Movement, partial: PartialForce): void {
    const existing = movement.forces.get(partial.id);
    const next = existing ? mixForce(existing, partial) : forceFromPartial(partial);
    movement.forces.set(partial.id, next);
}

export function removeForce(movement: Movement, id: string): boolean {
    return movement.forces.delete(id);
}

/**
 * Multiply every inactive force by `damping * dt`.
 * Applied once per tick, so repeated ticks decay geometrically.
 */
export function applyDamping(movement: Movement, dt: number): void {
    const factor = vec2Scale(movement.damping, dt);
    for (const force of movement.forces.values()) {
        if (!force.active) {
            force.force = vec2Mul(force.force, factor);
        }
    }
}
