/**
 * Rounded-Rectangle Colliders
 *
 * A collider is an axis-aligned rectangle whose corners are replaced by arcs
 * of `radius`. radius 0 gives a plain box; radius = size / 2 gives a circle.
 */

import { Vec2, vec2, vec2Clone, vec2Splat } from '../../math/vec';
import { debugAssert } from '../../core/debug';
import type { Position } from './movement';

// ============================================
// Constants
// ============================================

export const DEFAULT_RADIUS = 0.2;

// ============================================
// Collider Type
// ============================================

export type ColliderType =
    /** No collision response, only events (default) */
    | { kind: 'sensor' }
    /** Never moves when it collides */
    | { kind: 'static' }
    /** Pushed away on collision according to mass */
    | { kind: 'dynamic'; mass: number };

export function sensorType(): ColliderType {
    return { kind: 'sensor' };
}

export function staticType(): ColliderType {
    return { kind: 'static' };
}

/**
 * @param mass Must be finite and greater than zero
 */
export function dynamicType(mass: number): ColliderType {
    debugAssert(Number.isFinite(mass) && mass > 0, `dynamic mass must be finite and positive (got ${mass})`);
    return { kind: 'dynamic', mass };
}

// ============================================
// Collider
// ============================================

export interface Collider {
    /** Full width and height of the bounding rectangle */
    size: Vec2;
    /** Corner radius */
    radius: number;
    type: ColliderType;
}

export function createCollider(size: Vec2, radius: number, type: ColliderType): Collider {
    const diameter = radius * 2;
    debugAssert(size.x >= diameter, `collider radius ${radius} does not fit width ${size.x}`);
    debugAssert(size.y >= diameter, `collider radius ${radius} does not fit height ${size.y}`);

    return { size: vec2Clone(size), radius, type };
}

export function createRectCollider(size: Vec2, type: ColliderType): Collider {
    return createCollider(size, 0, type);
}

export function createCircleCollider(radius: number, type: ColliderType): Collider {
    return createCollider(vec2Splat(radius * 2), radius, type);
}

/** Unit square with the default corner radius, acting as a sensor. */
export function createDefaultCollider(): Collider {
    return createCollider(vec2(1, 1), DEFAULT_RADIUS, sensorType());
}

// ============================================
// Bounds
// ============================================

export interface AABB2D {
    minX: number;
    minY: number;
    maxX: number;
    maxY: number;
}

/**
 * Bounding box of a collider at a position. Corner rounding is ignored.
 */
export function computeAABB2D(position: Position, collider: Collider): AABB2D {
    const halfW = collider.size.x * 0.5;
    const halfH = collider.size.y * 0.5;
    return {
        minX: position.x - halfW,
        minY: position.y - halfH,
        maxX: position.x + halfW,
        maxY: position.y + halfH
    };
}
