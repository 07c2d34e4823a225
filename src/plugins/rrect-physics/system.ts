/**
 * RRectPhysics System
 *
 * Simulation context for the rounded-rectangle physics pipeline. It owns the
 * spatial grid, the phase scheduler and the collision listeners, and runs one
 * fixed-timestep tick per step():
 *
 *   preUpdate -> integrate -> reindex -> resolve -> postUpdate
 *
 * Render-pose interpolation runs separately through syncRender(), typically
 * once per rendered frame.
 */

import { SystemScheduler, SystemFn, SystemOptions } from '../../core/system';
import { TICK_PHASES } from '../../core/constants';
import { PhysicsWorld } from './world';
import { integrate } from './integrator';
import { SpatialHashGrid, DEFAULT_CELL_SIZE, syncSpatialGrid } from './spatial-hash';
import { CollisionEvent, resolveCollisions } from './collision';
import { RenderSync, DEFAULT_TILE_SIZE, DEFAULT_RENDER_LERP } from './render-sync';

/**
 * - full: physics and render sync (singleplayer)
 * - server: physics only
 * - client: render sync only; positions come from elsewhere
 */
export type PhysicsMode = 'full' | 'server' | 'client';

export interface RRectPhysicsConfig {
    /** Spatial grid cell size (default: 20) */
    cellSize?: number;
    mode?: PhysicsMode;
    /** Render units per world unit (default: 8) */
    tileSize?: number;
}

export type CollisionHandler = (event: CollisionEvent) => void;

/**
 * @example
 * const world = new PhysicsWorld();
 * const physics = new RRectPhysics(world, { cellSize: 4 });
 * physics.onCollision(({ entityA, entityB }) => console.log(entityA, entityB));
 * physics.step(1 / 60);
 */
export class RRectPhysics {
    readonly world: PhysicsWorld;
    readonly mode: PhysicsMode;
    readonly grid: SpatialHashGrid;
    readonly scheduler: SystemScheduler = new SystemScheduler();
    /** null in server mode */
    readonly renderSync: RenderSync | null;

    private collisionHandlers: CollisionHandler[] = [];

    /** Events of the tick in progress */
    private events: CollisionEvent[] = [];
    private dt: number = 0;
    private renderAlpha: number = DEFAULT_RENDER_LERP;
    private warnedClientStep = false;

    constructor(world: PhysicsWorld, config: RRectPhysicsConfig = {}) {
        const cellSize = config.cellSize ?? DEFAULT_CELL_SIZE;
        if (!Number.isFinite(cellSize) || cellSize <= 0) {
            throw new Error(`[RRectPhysics] cellSize must be a positive number (got ${cellSize})`);
        }

        this.world = world;
        this.mode = config.mode ?? 'full';
        this.grid = new SpatialHashGrid(cellSize);

        if (this.mode !== 'client') {
            this.scheduler.add(() => integrate(this.world, this.dt), { phase: 'integrate', order: 0 });
            this.scheduler.add(() => {
                syncSpatialGrid(this.grid, this.world);
            }, { phase: 'reindex', order: 0 });
            this.scheduler.add(() => {
                resolveCollisions(this.world, this.grid, this.events);
            }, { phase: 'resolve', order: 0 });
        }

        if (this.mode !== 'server') {
            const renderSync = new RenderSync(config.tileSize ?? DEFAULT_TILE_SIZE);
            this.scheduler.add(() => renderSync.update(this.world, this.renderAlpha), { phase: 'render', order: 0 });
            this.renderSync = renderSync;
        } else {
            this.renderSync = null;
        }
    }

    /**
     * Advance the simulation by one fixed timestep.
     * Collision listeners are called after the tick, in event order.
     *
     * @param dt Timestep in seconds
     * @returns Collision events of this tick
     */
    step(dt: number): CollisionEvent[] {
        if (!Number.isFinite(dt) || dt < 0) {
            throw new Error(`[RRectPhysics] dt must be a non-negative number (got ${dt})`);
        }

        if (this.mode === 'client') {
            if (!this.warnedClientStep) {
                this.warnedClientStep = true;
                console.warn('[RRectPhysics] step() ignored in client mode - physics runs on the server');
            }
            return [];
        }

        this.dt = dt;
        this.events = [];
        this.scheduler.runPhases(TICK_PHASES);

        const events = this.events;
        const handlers = [...this.collisionHandlers];
        for (const event of events) {
            for (const handler of handlers) {
                handler(event);
            }
        }

        return events;
    }

    /**
     * Ease render poses toward current positions. No-op in server mode.
     */
    syncRender(alpha: number = DEFAULT_RENDER_LERP): void {
        if (!this.renderSync) return;
        this.renderAlpha = alpha;
        this.scheduler.runPhase('render');
    }

    /**
     * Register a collision listener.
     * @returns Function to remove the listener
     */
    onCollision(handler: CollisionHandler): () => void {
        this.collisionHandlers.push(handler);
        return () => {
            const index = this.collisionHandlers.indexOf(handler);
            if (index !== -1) this.collisionHandlers.splice(index, 1);
        };
    }

    /**
     * Register a host system (input, game logic...) in a tick phase.
     */
    addSystem(fn: SystemFn, options: SystemOptions = {}): () => void {
        return this.scheduler.add(fn, options);
    }
}
