/**
 * Spatial Hash Grid for O(1) Broad Phase Collision Detection
 *
 * Divides the world into fixed-size cells. Every tracked entity is recorded
 * in each cell its bounding box overlaps, so bodies larger than a cell are
 * still found by their neighbors.
 *
 * Two indexes are kept, cell -> entities and entity -> cells. They are exact
 * inverses of each other and only change through insertOrUpdate/remove/clear.
 * The index is maintained incrementally: a body that stays inside the same
 * cells costs one set comparison per tick and no bucket writes.
 */

import type { EntityId } from '../../core/entity-id';
import { debugAssert } from '../../core/debug';
import { computeAABB2D, Collider } from './collider';
import type { Position } from './movement';
import type { PhysicsWorld } from './world';

// ============================================
// Constants
// ============================================

export const DEFAULT_CELL_SIZE = 20;

const MIN_CELL = -(2 ** 31);
const MAX_CELL = 2 ** 31 - 1;

// ============================================
// Cell Keys
// ============================================

export interface CellCoord {
    x: number;
    y: number;
}

/**
 * Key for an integer cell coordinate. Unbounded, so negative and very
 * distant cells never alias.
 */
export function cellKey(x: number, y: number): string {
    return `${x},${y}`;
}

export function parseCellKey(key: string): CellCoord {
    const comma = key.indexOf(',');
    return { x: Number(key.slice(0, comma)), y: Number(key.slice(comma + 1)) };
}

/**
 * Floor a world coordinate to its cell, saturated to the 32-bit integer
 * range. NaN maps to cell 0.
 */
export function toCell(value: number, cellSize: number): number {
    const cell = Math.floor(value / cellSize);
    if (Number.isNaN(cell)) return 0;
    return Math.min(MAX_CELL, Math.max(MIN_CELL, cell));
}

let gridDebugEnabled = false;

export function enableGridDebug(enabled: boolean): void {
    gridDebugEnabled = enabled;
}

// ============================================
// Spatial Hash Grid
// ============================================

export interface SpatialGridStats {
    entityCount: number;
    cellCount: number;
    maxPerCell: number;
    avgPerCell: number;
    /** Bucket insertions + deletions since construction */
    mutations: number;
}

export class SpatialHashGrid {
    readonly cellSize: number;
    private gridToEntities: Map<string, Set<EntityId>> = new Map();
    private entityToCells: Map<EntityId, Set<string>> = new Map();
    private mutations: number = 0;

    /**
     * Create a spatial hash grid.
     * @param cellSize Size of each cell
     */
    constructor(cellSize: number = DEFAULT_CELL_SIZE) {
        debugAssert(
            Number.isFinite(cellSize) && cellSize > 0,
            `cell size must be finite and positive (got ${cellSize})`
        );
        this.cellSize = cellSize;
    }

    /**
     * Cells covered by a collider's bounding box at a position,
     * inclusive on both ends of each axis.
     */
    findCells(position: Position, collider: Collider): Set<string> {
        const aabb = computeAABB2D(position, collider);
        const minX = toCell(aabb.minX, this.cellSize);
        const minY = toCell(aabb.minY, this.cellSize);
        const maxX = toCell(aabb.maxX, this.cellSize);
        const maxY = toCell(aabb.maxY, this.cellSize);

        const cells = new Set<string>();
        for (let x = minX; x <= maxX; x++) {
            for (let y = minY; y <= maxY; y++) {
                cells.add(cellKey(x, y));
            }
        }
        return cells;
    }

    /**
     * Track an entity, or move it to the cells it now covers.
     * No bucket is touched when the covered cells are unchanged.
     */
    insertOrUpdate(entity: EntityId, position: Position, collider: Collider): void {
        const cells = this.findCells(position, collider);
        const existing = this.entityToCells.get(entity);

        if (existing && sameCells(existing, cells)) return;

        if (existing) {
            this.unlink(entity, existing);
        }

        this.entityToCells.set(entity, cells);
        for (const key of cells) {
            let bucket = this.gridToEntities.get(key);
            if (!bucket) {
                bucket = new Set();
                this.gridToEntities.set(key, bucket);
            }
            bucket.add(entity);
            this.mutations++;
        }
    }

    /**
     * Stop tracking an entity. Returns false if it was not tracked.
     */
    remove(entity: EntityId): boolean {
        const cells = this.entityToCells.get(entity);
        if (!cells) return false;

        this.unlink(entity, cells);
        this.entityToCells.delete(entity);
        return true;
    }

    /**
     * Every entity sharing at least one cell with `entity`, itself included.
     * Returns null if the entity is not tracked; a tracked entity always
     * gets a non-empty set.
     */
    neighbors(entity: EntityId): Set<EntityId> | null {
        const cells = this.entityToCells.get(entity);
        if (!cells) return null;

        const result = new Set<EntityId>();
        for (const key of cells) {
            const bucket = this.gridToEntities.get(key);
            if (!bucket) continue;
            for (const other of bucket) {
                result.add(other);
            }
        }
        return result;
    }

    has(entity: EntityId): boolean {
        return this.entityToCells.has(entity);
    }

    /**
     * Cells recorded for an entity (empty if untracked).
     */
    cellsOf(entity: EntityId): CellCoord[] {
        const cells = this.entityToCells.get(entity);
        return cells ? [...cells].map(parseCellKey) : [];
    }

    /**
     * Entities recorded in a cell.
     */
    entitiesIn(x: number, y: number): EntityId[] {
        const bucket = this.gridToEntities.get(cellKey(x, y));
        return bucket ? [...bucket] : [];
    }

    /**
     * Tracked entities.
     */
    entities(): EntityId[] {
        return [...this.entityToCells.keys()];
    }

    clear(): void {
        this.gridToEntities.clear();
        this.entityToCells.clear();
    }

    /**
     * Get statistics for debugging.
     */
    getStats(): SpatialGridStats {
        let maxPerCell = 0;
        let total = 0;

        for (const bucket of this.gridToEntities.values()) {
            maxPerCell = Math.max(maxPerCell, bucket.size);
            total += bucket.size;
        }

        const cellCount = this.gridToEntities.size;
        return {
            entityCount: this.entityToCells.size,
            cellCount,
            maxPerCell,
            avgPerCell: cellCount > 0 ? total / cellCount : 0,
            mutations: this.mutations
        };
    }

    private unlink(entity: EntityId, cells: Set<string>): void {
        for (const key of cells) {
            const bucket = this.gridToEntities.get(key);
            if (!bucket) continue;

            bucket.delete(entity);
            this.mutations++;
            if (bucket.size === 0) {
                this.gridToEntities.delete(key);
            }
        }
    }
}

function sameCells(a: Set<string>, b: Set<string>): boolean {
    if (a.size !== b.size) return false;
    for (const key of a) {
        if (!b.has(key)) return false;
    }
    return true;
}

// ============================================
// World Sync
// ============================================

/**
 * Refresh the grid from every entity with Position and Collider, then drop
 * tracked entities that are no longer in that set. Returns the dropped IDs.
 */
export function syncSpatialGrid(grid: SpatialHashGrid, world: PhysicsWorld): EntityId[] {
    const live = new Set<EntityId>();
    for (const [eid, position, collider] of world.queryColliders()) {
        live.add(eid);
        grid.insertOrUpdate(eid, position, collider);
    }

    const removed: EntityId[] = [];
    for (const eid of grid.entities()) {
        if (!live.has(eid)) removed.push(eid);
    }

    for (const eid of removed) {
        grid.remove(eid);
    }

    if (gridDebugEnabled && removed.length > 0) {
        console.log(`[SpatialGrid] removed ${removed.length} stale entities: ${removed.join(', ')}`);
    }

    return removed;
}
