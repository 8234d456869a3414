/**
 * Entity ID Allocator
 *
 * Hands out network-wide entity IDs on the authority side. A freed slot is
 * reused with a bumped generation so a message still in flight for the old
 * entity never resolves to the new one.
 * Entity ID format: [12 bits generation][20 bits index]
 */

import {
    MAX_ENTITIES,
    INDEX_MASK,
    INDEX_BITS,
    MAX_GENERATION
} from './constants';

export type EntityId = number;

export class EntityIdAllocator {
    /** Generation counter for each entity slot */
    private generations: Uint16Array;

    /** Free list of available indices (sorted ascending) */
    private freeList: number[] = [];

    /** Next index to allocate if free list is empty */
    private nextIndex: number = 0;

    constructor(private readonly maxEntities: number = MAX_ENTITIES) {
        this.generations = new Uint16Array(maxEntities);
    }

    /**
     * Allocate a new entity ID with its generation encoded.
     */
    allocate(): EntityId {
        let index: number;

        const recycled = this.freeList.shift();
        if (recycled !== undefined) {
            index = recycled;
        } else {
            if (this.nextIndex >= this.maxEntities) {
                throw new Error(
                    `Entity limit exceeded (max ${this.maxEntities}). ` +
                    `Tear down dead entities before spawning more.`
                );
            }
            index = this.nextIndex++;
        }

        const generation = this.generations[index];
        return ((generation << INDEX_BITS) | index) >>> 0;
    }

    /**
     * Return an ID to the pool. Increments the slot generation.
     */
    free(eid: EntityId): void {
        if (!this.isValid(eid)) return;
        const index = eid & INDEX_MASK;

        this.generations[index] = (this.generations[index] + 1) & MAX_GENERATION;

        const insertIdx = this.findInsertIndex(index);
        this.freeList.splice(insertIdx, 0, index);
    }

    /**
     * Check if an entity ID is still live (allocated and generation matches).
     */
    isValid(eid: EntityId): boolean {
        const index = eid & INDEX_MASK;
        const generation = eid >>> INDEX_BITS;
        return index < this.nextIndex &&
            this.generations[index] === generation &&
            !this.freeList.includes(index);
    }

    getIndex(eid: EntityId): number {
        return eid & INDEX_MASK;
    }

    getGeneration(eid: EntityId): number {
        return eid >>> INDEX_BITS;
    }

    getActiveCount(): number {
        return this.nextIndex - this.freeList.length;
    }

    reset(): void {
        this.nextIndex = 0;
        this.freeList = [];
        this.generations.fill(0);
    }

    /**
     * Binary search to find insert position for sorted free list.
     */
    private findInsertIndex(index: number): number {
        let lo = 0;
        let hi = this.freeList.length;

        while (lo < hi) {
            const mid = (lo + hi) >>> 1;
            if (this.freeList[mid] < index) {
                lo = mid + 1;
            } else {
                hi = mid;
            }
        }

        return lo;
    }
}
