/**
 * Entity ID Allocator
 *
 * Ids pack a slot index and a generation: [11 bits generation][20 bits index].
 * Freeing a slot bumps its generation, so an id held past despawn never
 * matches the entity that reuses the slot.
 */

import {
    MAX_ENTITIES,
    INDEX_MASK,
    INDEX_BITS,
    MAX_GENERATION
} from './constants';

export type EntityId = number;

export class EntityIdAllocator {
    private generations = new Uint16Array(MAX_ENTITIES);

    /** Released slots, ascending */
    private released: number[] = [];

    /** Slots below this have been handed out at least once */
    private highWater: number = 0;

    /**
     * Reserve a slot and return its id. Released slots are reused
     * lowest first, which keeps ids compact and spawn order reproducible.
     */
    allocate(): EntityId {
        const slot = this.released.shift() ?? this.claimFreshSlot();
        return (this.generations[slot] << INDEX_BITS) | slot;
    }

    /**
     * Release an id. Stale or unknown ids are ignored.
     */
    free(eid: EntityId): void {
        if (!this.isValid(eid)) return;

        const slot = eid & INDEX_MASK;
        this.generations[slot] = (this.generations[slot] + 1) & MAX_GENERATION;
        this.released.splice(this.sortedPosition(slot), 0, slot);
    }

    isValid(eid: EntityId): boolean {
        const slot = eid & INDEX_MASK;
        return slot < this.highWater && this.generations[slot] === eid >>> INDEX_BITS;
    }

    private claimFreshSlot(): number {
        if (this.highWater >= MAX_ENTITIES) {
            throw new Error(`Entity limit exceeded (MAX_ENTITIES=${MAX_ENTITIES})`);
        }
        return this.highWater++;
    }

    private sortedPosition(slot: number): number {
        let lo = 0;
        let hi = this.released.length;
        while (lo < hi) {
            const mid = (lo + hi) >>> 1;
            if (this.released[mid] < slot) lo = mid + 1;
            else hi = mid;
        }
        return lo;
    }
}
