/**
 * Render Pose Sync
 *
 * Derives render poses from simulation positions. A pose is the position
 * scaled by the tile size; it snaps on first appearance and then eases
 * toward the physics position each frame instead of jumping between ticks.
 */

import { vec2, vec2Lerp } from '../../math/vec';
import type { EntityId } from '../../core/entity-id';
import type { PhysicsWorld } from './world';

export const DEFAULT_TILE_SIZE = 8;
export const DEFAULT_RENDER_LERP = 0.2;

export interface RenderPose {
    x: number;
    y: number;
    /** Depth; kept as-is by the sync */
    z: number;
}

export class RenderSync {
    private poses: Map<EntityId, RenderPose> = new Map();

    /** World units to render units */
    tileSize: number;

    constructor(tileSize: number = DEFAULT_TILE_SIZE) {
        this.tileSize = tileSize;
    }

    /**
     * Move every pose toward its entity's position.
     * @param alpha Interpolation factor for poses that already exist
     */
    update(world: PhysicsWorld, alpha: number = DEFAULT_RENDER_LERP): void {
        const seen = new Set<EntityId>();

        for (const [eid, position] of world.queryPositions()) {
            seen.add(eid);
            const target = vec2(position.x * this.tileSize, position.y * this.tileSize);
            const pose = this.poses.get(eid);

            if (!pose) {
                this.poses.set(eid, { x: target.x, y: target.y, z: 0 });
                continue;
            }

            const next = vec2Lerp(pose, target, alpha);
            pose.x = next.x;
            pose.y = next.y;
        }

        for (const eid of [...this.poses.keys()]) {
            if (!seen.has(eid)) this.poses.delete(eid);
        }
    }

    getPose(eid: EntityId): RenderPose | undefined {
        return this.poses.get(eid);
    }

    /**
     * Set the depth of an entity's pose. Returns false if it has none yet.
     */
    setDepth(eid: EntityId, z: number): boolean {
        const pose = this.poses.get(eid);
        if (!pose) return false;
        pose.z = z;
        return true;
    }
}
