/**
 * Reconciliation Engine (replica only)
 *
 * Moves the replica's presented transform toward the latest snapshot:
 * - planar divergence above snapDistance snaps straight to the snapshot
 * - otherwise x/z ease toward it at positionLerpRate, scaled by dt
 * - height is always copied from the snapshot, never interpolated
 * - rotation slerps toward the snapshot at rotationLerpRate
 * The very first snapshot snaps both position and rotation.
 */

import {
    Vec3,
    Quat,
    Transform,
    clamp01,
    lerp,
    vec3Clone,
    vec3PlanarDistance,
    quatClone,
    quatIsFinite,
    quatSlerp
} from '../math';
import type { Snapshot } from './snapshot';

export interface ReconcileConfig {
    /** Horizontal interpolation rate (1/s) */
    positionLerpRate: number;
    /** Rotation interpolation rate (1/s) */
    rotationLerpRate: number;
    /** Planar distance above which the replica snaps instead of easing */
    snapDistance: number;
}

export interface ReconcileResult extends Transform {
    /** True when the position was set to the snapshot outright */
    snapped: boolean;
}

/**
 * One reconciliation step from `current` toward `snapshot`.
 */
export function reconcile(
    current: Transform,
    snapshot: Snapshot,
    dt: number,
    config: ReconcileConfig,
    first: boolean = false
): ReconcileResult {
    if (first) {
        return {
            position: vec3Clone(snapshot.position),
            rotation: quatClone(snapshot.rotation),
            snapped: true
        };
    }

    let position: Vec3;
    let snapped = false;

    // A non-finite distance means the presented position is unusable
    const distance = vec3PlanarDistance(current.position, snapshot.position);
    if (!Number.isFinite(distance) || distance > config.snapDistance) {
        position = vec3Clone(snapshot.position);
        snapped = true;
    } else {
        const t = clamp01(dt * config.positionLerpRate);
        position = {
            x: lerp(current.position.x, snapshot.position.x, t),
            y: snapshot.position.y,
            z: lerp(current.position.z, snapshot.position.z, t)
        };
    }

    const rotation = quatIsFinite(current.rotation)
        ? quatSlerp(current.rotation, snapshot.rotation, clamp01(dt * config.rotationLerpRate))
        : quatClone(snapshot.rotation);

    return { position, rotation, snapped };
}

// ============================================
// Presentation state
// ============================================

export interface PresentationState {
    currentPosition: Vec3;
    currentRotation: Quat;
    /** Last reconciled position; what the Authority Guard stamps back */
    lastGoodPosition: Vec3;
    targetSnapshot: Snapshot | null;
}

export class ReconciliationEngine {
    private _state: PresentationState;
    private awaitingFirst: boolean = true;
    private _steps: number = 0;

    constructor(initial: Transform, private readonly config: ReconcileConfig) {
        this._state = ReconciliationEngine.initialState(initial);
    }

    get state(): Readonly<PresentationState> {
        return this._state;
    }

    /** Reconciliation steps taken since the last reset */
    get steps(): number {
        return this._steps;
    }

    get hasTarget(): boolean {
        return this._state.targetSnapshot !== null;
    }

    /**
     * Replace the target with the most recently received snapshot.
     */
    receive(snapshot: Snapshot): void {
        this._state.targetSnapshot = snapshot;
    }

    /**
     * Advance the presented transform by dt toward the target.
     *
     * @returns the new transform, or null when no snapshot has arrived yet
     */
    step(dt: number): ReconcileResult | null {
        const target = this._state.targetSnapshot;
        if (!target) return null;

        const result = reconcile(
            { position: this._state.currentPosition, rotation: this._state.currentRotation },
            target,
            dt,
            this.config,
            this.awaitingFirst
        );
        this.awaitingFirst = false;
        this._steps++;

        this._state.currentPosition = result.position;
        this._state.currentRotation = result.rotation;
        this._state.lastGoodPosition = vec3Clone(result.position);

        return result;
    }

    /**
     * Forget the target and re-arm the first-snapshot snap (pooled reuse).
     */
    reset(initial: Transform): void {
        this._state = ReconciliationEngine.initialState(initial);
        this.awaitingFirst = true;
        this._steps = 0;
    }

    private static initialState(initial: Transform): PresentationState {
        return {
            currentPosition: vec3Clone(initial.position),
            currentRotation: quatClone(initial.rotation),
            lastGoodPosition: vec3Clone(initial.position),
            targetSnapshot: null
        };
    }
}
