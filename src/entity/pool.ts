/**
 * Entity Pool
 *
 * Deactivated solo entities, kept per kind for reuse by the next spawn.
 */

import type { ReplicatedEnemy } from './replicated-enemy';

export class EntityPool {
    private free: Map<string, ReplicatedEnemy[]> = new Map();

    /**
     * Take a pooled entity of `kind`, or null if there is none.
     */
    acquire(kind: string): ReplicatedEnemy | null {
        const list = this.free.get(kind);
        const entity = list?.pop();
        return entity ?? null;
    }

    /**
     * Return an inactive entity to the pool.
     */
    release(entity: ReplicatedEnemy): void {
        if (entity.active) {
            throw new Error(`Entity ${entity.id} must be deactivated before it is pooled`);
        }
        let list = this.free.get(entity.kind);
        if (!list) {
            list = [];
            this.free.set(entity.kind, list);
        }
        if (!list.includes(entity)) list.push(entity);
    }

    size(kind?: string): number {
        if (kind !== undefined) return this.free.get(kind)?.length ?? 0;
        let total = 0;
        for (const list of this.free.values()) total += list.length;
        return total;
    }

    /** Remove and return everything pooled */
    drain(): ReplicatedEnemy[] {
        const all = [...this.free.values()].flat();
        this.free.clear();
        return all;
    }
}
