/**
 * Rounded-Rectangle Collision Detection and Resolution
 *
 * Narrow phase for candidate pairs from the spatial grid:
 * 1. AABB reject on the full rectangles
 * 2. Inner-rectangle case: the straight edges overlap, push out along the
 *    shallower axis
 * 3. Corner case: the rounded corners are tested as circles with the
 *    combined radius
 *
 * Resolution is a single positional push-out, no velocities involved.
 */

import {
    Vec2, vec2, vec2Clone, vec2Add, vec2Sub, vec2Scale, vec2Mul, vec2Div,
    vec2Abs, vec2LengthSq, vec2Signum, signum
} from '../../math/vec';
import type { EntityId } from '../../core/entity-id';
import type { Collider, ColliderType } from './collider';
import type { Position } from './movement';
import type { SpatialHashGrid } from './spatial-hash';
import type { PhysicsWorld } from './world';

// ============================================
// Types
// ============================================

/**
 * Emitted once per overlapping pair per tick. `entityA` is the entity whose
 * neighbor search found the pair.
 */
export interface CollisionEvent {
    entityA: EntityId;
    entityB: EntityId;
}

interface DetectionData {
    position: Vec2;
    collider: Collider;
}

// Corner normal used when both corner centres coincide
const DEGENERATE_CORNER_NORMAL: Vec2 = { x: Math.SQRT1_2, y: Math.SQRT1_2 };

// Debug logging for collision position correction
let collisionDebugEnabled = false;

export function enableCollisionDebug(enabled: boolean): void {
    collisionDebugEnabled = enabled;
}

// ============================================
// Narrow Phase
// ============================================

/**
 * Minimum translation vector separating B from A, pointing from A towards B.
 * Subtracting it from A (or adding it to B) separates the pair.
 * Returns null if the colliders do not overlap.
 */
export function computeMTV(
    posA: Position,
    colliderA: Collider,
    posB: Position,
    colliderB: Collider
): Vec2 | null {
    const offset = vec2Sub(posB, posA);
    const offsetAbs = vec2Abs(offset);
    const avgSize = vec2Scale(vec2Add(colliderA.size, colliderB.size), 0.5);

    // AABB reject; touching edges do not count
    if (offsetAbs.x >= avgSize.x || offsetAbs.y >= avgSize.y) {
        return null;
    }

    const radii = colliderA.radius + colliderB.radius;
    const dist = vec2(offsetAbs.x - avgSize.x + radii, offsetAbs.y - avgSize.y + radii);

    // Inner rectangles overlap
    if (dist.x < 0 || dist.y < 0) {
        const overlap = vec2Sub(avgSize, offsetAbs);

        if (overlap.x < overlap.y) {
            return vec2(overlap.x * signum(offset.x), 0);
        }
        return vec2(0, overlap.y * signum(offset.y));
    }

    // Corners
    const distSq = vec2LengthSq(dist);
    if (distSq > radii * radii) {
        return null;
    }

    const distLength = Math.sqrt(distSq);
    const normal = distLength > 0 ? vec2Div(dist, distLength) : DEGENERATE_CORNER_NORMAL;
    return vec2Mul(vec2Scale(normal, radii - distLength), vec2Signum(offset));
}

// ============================================
// Resolution
// ============================================

function pairKey(a: EntityId, b: EntityId): string {
    return a < b ? `${a}:${b}` : `${b}:${a}`;
}

function typeLetter(type: ColliderType): string {
    return type.kind === 'dynamic' ? 'D' : type.kind === 'static' ? 'S' : 'T';
}

/**
 * Detect and resolve every overlapping pair among entities with Position
 * and Collider, using `grid` for candidates. Appends one event per pair to
 * `out` and returns it.
 *
 * Entities and their neighbors are visited in ascending ID order. Within a
 * pass, pushes are applied to a per-entity override that later pairs read,
 * so an entity caught in several overlaps is resolved sequentially.
 */
export function resolveCollisions(
    world: PhysicsWorld,
    grid: SpatialHashGrid,
    out: CollisionEvent[] = []
): CollisionEvent[] {
    const detectionData = new Map<EntityId, DetectionData>();
    for (const [eid, position, collider] of world.queryColliders()) {
        detectionData.set(eid, { position: vec2Clone(position), collider });
    }

    // Pending positions of dynamic entities pushed during this pass
    const dynamicPositions = new Map<EntityId, Vec2>();
    const checked = new Set<string>();

    for (const [entityA, dataA] of detectionData) {
        // Static colliders only ever get found by others
        if (dataA.collider.type.kind === 'static') continue;

        const neighbors = grid.neighbors(entityA);
        if (!neighbors) continue;

        const sortedNeighbors = [...neighbors].sort((a, b) => a - b);

        for (const entityB of sortedNeighbors) {
            if (entityA === entityB) continue;

            const dataB = detectionData.get(entityB);
            if (!dataB) continue;

            const key = pairKey(entityA, entityB);
            if (checked.has(key)) continue;
            checked.add(key);

            const posA = dynamicPositions.get(entityA) ?? dataA.position;
            const posB = dynamicPositions.get(entityB) ?? dataB.position;
            const typeA = dataA.collider.type;
            const typeB = dataB.collider.type;

            const mtv = computeMTV(posA, dataA.collider, posB, dataB.collider);
            if (!mtv) continue;

            out.push({ entityA, entityB });

            if (typeA.kind === 'dynamic' && typeB.kind === 'static') {
                dynamicPositions.set(entityA, vec2Sub(posA, mtv));
            } else if (typeA.kind === 'dynamic' && typeB.kind === 'dynamic') {
                // Heavier entities move proportionally less
                const totalMass = typeA.mass + typeB.mass;
                const shareA = typeA.mass / totalMass;
                const shareB = typeB.mass / totalMass;

                dynamicPositions.set(entityA, vec2Sub(posA, vec2Scale(mtv, shareB)));
                dynamicPositions.set(entityB, vec2Add(posB, vec2Scale(mtv, shareA)));
            } else {
                continue;
            }

            if (collisionDebugEnabled) {
                console.log(
                    `[Collision] ${entityA}(${typeLetter(typeA)}) <-> ${entityB}(${typeLetter(typeB)}) | ` +
                    `mtv=(${mtv.x.toFixed(3)},${mtv.y.toFixed(3)})`
                );
            }
        }
    }

    for (const [eid, next] of dynamicPositions) {
        const position = world.getPosition(eid);
        if (position) {
            position.x = next.x;
            position.y = next.y;
        }
    }

    return out;
}
