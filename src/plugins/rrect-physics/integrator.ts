/**
 * Force Integration
 *
 * Velocity is not carried between ticks. Each tick it is rebuilt from the
 * current force set, so momentum only survives through the (damped)
 * magnitude of inactive forces.
 */

import { vec2Zero, vec2Add, vec2Scale, vec2ClampLength } from '../../math/vec';
import { MAX_VELOCITY, Movement, Position, applyDamping } from './movement';
import type { PhysicsWorld } from './world';

/**
 * Advance one entity by `dt` seconds.
 */
export function integrateMovement(movement: Movement, position: Position, dt: number): void {
    movement.velocity = vec2Zero();
    applyDamping(movement, dt);

    let velocity = vec2Zero();
    for (const force of movement.forces.values()) {
        velocity = vec2Add(velocity, vec2Scale(force.force, dt));
    }

    movement.velocity = vec2ClampLength(velocity, MAX_VELOCITY * dt);

    position.x += movement.velocity.x;
    position.y += movement.velocity.y;
}

/**
 * Integrate every entity with Movement and Position.
 */
export function integrate(world: PhysicsWorld, dt: number): void {
    for (const [, movement, position] of world.queryMovable()) {
        integrateMovement(movement, position, dt);
    }
}
