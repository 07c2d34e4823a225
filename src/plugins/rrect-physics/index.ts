/**
 * Rounded-Rectangle Physics Module
 *
 * Force integration, spatial-hash broad phase and rounded-rectangle
 * narrow phase for axis-aligned colliders.
 */

// Forces and Movement
export { MAX_VELOCITY, DEFAULT_FORCE_ID, createPosition, createMovement, createDefaultForce, forceEquals, mixForce, forceFromPartial, applyForce, removeForce, applyDamping } from './movement';
export type { Position, Force, PartialForce, Movement } from './movement';

// Colliders
export { DEFAULT_RADIUS, sensorType, staticType, dynamicType, createCollider, createRectCollider, createCircleCollider, createDefaultCollider, computeAABB2D } from './collider';
export type { Collider, ColliderType, AABB2D } from './collider';

// World
export { PhysicsWorld } from './world';
export type { EntityComponents } from './world';

// Integration
export { integrate, integrateMovement } from './integrator';

// Spatial Partitioning
export { SpatialHashGrid, DEFAULT_CELL_SIZE, cellKey, parseCellKey, toCell, syncSpatialGrid, enableGridDebug } from './spatial-hash';
export type { CellCoord, SpatialGridStats } from './spatial-hash';

// Collision Detection and Response
export { computeMTV, resolveCollisions, enableCollisionDebug } from './collision';
export type { CollisionEvent } from './collision';

// Render Sync
export { RenderSync, DEFAULT_TILE_SIZE, DEFAULT_RENDER_LERP } from './render-sync';
export type { RenderPose } from './render-sync';

// System
export { RRectPhysics } from './system';
export type { PhysicsMode, RRectPhysicsConfig, CollisionHandler } from './system';
