/**
 * System Scheduler
 *
 * Runs registered callbacks phase by phase. The physics context puts its
 * integrate/reindex/resolve passes here; host code hooks in before or
 * after them.
 */

import { SystemPhase, SYSTEM_PHASES } from './constants';

export interface SystemOptions {
    /** Execution phase (default: 'postUpdate') */
    phase?: SystemPhase;

    /** Execution order within phase, lower first (default: 0) */
    order?: number;
}

export type SystemFn = () => void;

interface ScheduledSystem {
    fn: SystemFn;
    order: number;
}

export class SystemScheduler {
    private phases = new Map<SystemPhase, ScheduledSystem[]>(
        SYSTEM_PHASES.map(phase => [phase, []])
    );

    /**
     * Register a system. Systems with equal order run in registration order.
     * @returns Function that unregisters the system
     */
    add(fn: SystemFn, options: SystemOptions = {}): () => void {
        const phase = options.phase ?? 'postUpdate';
        const queue = this.phases.get(phase);
        if (!queue) {
            throw new Error(`Unknown system phase: ${phase}`);
        }

        queue.push({ fn, order: options.order ?? 0 });
        queue.sort((a, b) => a.order - b.order);

        return () => this.remove(fn);
    }

    remove(fn: SystemFn): boolean {
        for (const queue of this.phases.values()) {
            const index = queue.findIndex(s => s.fn === fn);
            if (index !== -1) {
                queue.splice(index, 1);
                return true;
            }
        }
        return false;
    }

    runPhase(phase: SystemPhase): void {
        const queue = this.phases.get(phase);
        if (!queue) return;

        // Snapshot, so a system may unregister itself while running
        for (const { fn } of [...queue]) {
            try {
                const result: unknown = fn();
                if (result instanceof Promise) {
                    throw new Error(
                        `System returned a Promise. A tick runs to completion; ` +
                        `async systems are not allowed.`
                    );
                }
            } catch (error) {
                console.error(`Error in system during '${phase}' phase:`, error);
                throw error;
            }
        }
    }

    runPhases(phases: readonly SystemPhase[]): void {
        for (const phase of phases) {
            this.runPhase(phase);
        }
    }
}
