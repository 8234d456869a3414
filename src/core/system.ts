/**
 * System Scheduler
 *
 * Runs per-tick systems in fixed phases. Within a phase, systems run by
 * ascending order; equal orders keep registration order.
 */

import { SystemPhase, SYSTEM_PHASES } from './constants';

export interface SystemOptions {
    /** Execution phase (default: 'update') */
    phase?: SystemPhase;

    /** Execution order within phase (lower = earlier) */
    order?: number;

    /** Name used in error logs */
    name?: string;
}

export type SystemFn = (dt: number) => void;

interface SystemEntry {
    fn: SystemFn;
    name: string;
    order: number;
    seq: number;
}

export class SystemScheduler {
    /** Systems organized by phase */
    private systems: Map<SystemPhase, SystemEntry[]> = new Map();

    /** Skip the render phase (server / bot participants) */
    private headless: boolean = false;

    /** Registration counter, breaks ties between equal orders */
    private nextSeq: number = 0;

    constructor() {
        for (const phase of SYSTEM_PHASES) {
            this.systems.set(phase, []);
        }
    }

    setHeadless(headless: boolean): void {
        this.headless = headless;
    }

    /**
     * Add a system to the scheduler.
     *
     * @returns Function to remove the system
     */
    add(fn: SystemFn, options: SystemOptions = {}): () => void {
        const phase = options.phase ?? 'update';
        const systems = this.systems.get(phase);

        if (!systems) {
            throw new Error(`Unknown system phase: ${phase}`);
        }

        const seq = this.nextSeq++;
        systems.push({
            fn,
            name: options.name || fn.name || 'anonymous',
            order: options.order ?? 0,
            seq
        });
        systems.sort((a, b) => a.order - b.order || a.seq - b.seq);

        return () => this.remove(fn);
    }

    /**
     * Remove a system from the scheduler.
     */
    remove(fn: SystemFn): boolean {
        for (const systems of this.systems.values()) {
            const index = systems.findIndex(s => s.fn === fn);
            if (index !== -1) {
                systems.splice(index, 1);
                return true;
            }
        }
        return false;
    }

    /**
     * Run all systems in a specific phase.
     */
    runPhase(phase: SystemPhase, dt: number): void {
        const systems = this.systems.get(phase);
        if (!systems) return;

        // Copy: a system may add or remove systems while running
        for (const system of [...systems]) {
            try {
                const result: unknown = system.fn(dt);

                if (result && typeof result === 'object' && 'then' in result) {
                    throw new Error(
                        `System '${system.name}' returned a Promise. Systems run inside one ` +
                        `synchronous tick; schedule deferred work on the TaskScheduler instead.`
                    );
                }
            } catch (error) {
                console.error(`[SystemScheduler] Error in system '${system.name}' during '${phase}' phase:`, error);
                throw error;
            }
        }
    }

    /**
     * Run all phases in order (render only when not headless).
     */
    runAll(dt: number): void {
        for (const phase of SYSTEM_PHASES) {
            if (phase === 'render' && this.headless) continue;
            this.runPhase(phase, dt);
        }
    }

    /**
     * Get count of systems in each phase (for debugging).
     */
    getSystemCounts(): Record<SystemPhase, number> {
        const counts: Record<SystemPhase, number> = {
            input: 0, prePhysics: 0, update: 0, physics: 0, postPhysics: 0, late: 0, render: 0
        };
        for (const [phase, systems] of this.systems) {
            counts[phase] = systems.length;
        }
        return counts;
    }

    /**
     * Clear all systems (for testing).
     */
    clear(): void {
        for (const systems of this.systems.values()) {
            systems.length = 0;
        }
        this.nextSeq = 0;
    }
}
