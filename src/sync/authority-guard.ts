/**
 * Authority Guard (replica only)
 *
 * Stamps the last reconciled position back onto the live transform, once
 * before local physics and once after every other per-tick writer. Whatever
 * local subsystem moved the body in between is overwritten; the guard never
 * tries to find out which one it was.
 *
 * The guard stays disarmed until the first reconciliation, so the spawn
 * transform is left alone until there is an authoritative position to hold.
 */

import { Vec3, vec3Clone, vec3Equals } from '../math';
import type { ReplicatedBody } from './capabilities';

export interface GuardStats {
    /** enforce() calls that wrote the transform */
    enforcements: number;
    /** Of those, how many found the body moved by someone else */
    corrections: number;
}

export class AuthorityGuard {
    private lastGood: Vec3 | null = null;
    private _stats: GuardStats = { enforcements: 0, corrections: 0 };

    constructor(private readonly body: ReplicatedBody) {}

    get armed(): boolean {
        return this.lastGood !== null;
    }

    get stats(): Readonly<GuardStats> {
        return this._stats;
    }

    /**
     * Record the position to hold (called after each reconciliation).
     */
    arm(lastGoodPosition: Vec3): void {
        this.lastGood = vec3Clone(lastGoodPosition);
    }

    disarm(): void {
        this.lastGood = null;
    }

    /**
     * Overwrite the live position with the last good one.
     *
     * @returns true if the body had been moved since the last write
     */
    enforce(): boolean {
        if (!this.lastGood) return false;

        const moved = !vec3Equals(this.body.getPosition(), this.lastGood);
        this.body.setTransform(vec3Clone(this.lastGood));

        this._stats.enforcements++;
        if (moved) this._stats.corrections++;
        return moved;
    }

    resetStats(): void {
        this._stats = { enforcements: 0, corrections: 0 };
    }
}
