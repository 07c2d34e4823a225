/**
 * Physics World
 *
 * In-memory component storage for the physics pipeline. Each entity may carry
 * a Position, a Movement and a Collider; the passes select entities by which
 * components they have. Queries return entities in ascending ID order.
 */

import { EntityIdAllocator, EntityId } from '../../core/entity-id';
import type { Position, Movement } from './movement';
import type { Collider } from './collider';

export interface EntityComponents {
    position?: Position;
    movement?: Movement;
    collider?: Collider;
}

export class PhysicsWorld {
    private allocator = new EntityIdAllocator();
    private alive: Set<EntityId> = new Set();
    private positions: Map<EntityId, Position> = new Map();
    private movements: Map<EntityId, Movement> = new Map();
    private colliders: Map<EntityId, Collider> = new Map();

    /**
     * Create an entity with the given components.
     */
    spawn(components: EntityComponents = {}): EntityId {
        const eid = this.allocator.allocate();
        this.alive.add(eid);
        this.insert(eid, components);
        return eid;
    }

    /**
     * Destroy an entity and drop all its components.
     * Returns false if the entity was not alive.
     */
    despawn(eid: EntityId): boolean {
        if (!this.alive.delete(eid)) return false;

        this.positions.delete(eid);
        this.movements.delete(eid);
        this.colliders.delete(eid);
        this.allocator.free(eid);
        return true;
    }

    isAlive(eid: EntityId): boolean {
        return this.alive.has(eid);
    }

    /**
     * Attach (or replace) components on a live entity.
     */
    insert(eid: EntityId, components: EntityComponents): void {
        if (!this.alive.has(eid)) {
            throw new Error(`Entity ${eid} is not alive`);
        }

        if (components.position) this.positions.set(eid, components.position);
        if (components.movement) this.movements.set(eid, components.movement);
        if (components.collider) this.colliders.set(eid, components.collider);
    }

    getPosition(eid: EntityId): Position | undefined {
        return this.positions.get(eid);
    }

    getMovement(eid: EntityId): Movement | undefined {
        return this.movements.get(eid);
    }

    getCollider(eid: EntityId): Collider | undefined {
        return this.colliders.get(eid);
    }

    removeCollider(eid: EntityId): boolean {
        return this.colliders.delete(eid);
    }

    get entityCount(): number {
        return this.alive.size;
    }

    /**
     * All live entities, ascending.
     */
    entities(): EntityId[] {
        return [...this.alive].sort((a, b) => a - b);
    }

    /**
     * Entities with both Movement and Position.
     */
    queryMovable(): Array<[EntityId, Movement, Position]> {
        const result: Array<[EntityId, Movement, Position]> = [];
        for (const [eid, movement] of this.movements) {
            const position = this.positions.get(eid);
            if (position) result.push([eid, movement, position]);
        }
        return result.sort((a, b) => a[0] - b[0]);
    }

    /**
     * Entities with both Position and Collider.
     */
    queryColliders(): Array<[EntityId, Position, Collider]> {
        const result: Array<[EntityId, Position, Collider]> = [];
        for (const [eid, collider] of this.colliders) {
            const position = this.positions.get(eid);
            if (position) result.push([eid, position, collider]);
        }
        return result.sort((a, b) => a[0] - b[0]);
    }

    /**
     * Entities with a Position.
     */
    queryPositions(): Array<[EntityId, Position]> {
        return [...this.positions].sort((a, b) => a[0] - b[0]);
    }
}
