/**
 * Capability contracts between replicated entities and the local subsystems
 * that live on them.
 */

import type { Vec3, Quat } from '../math';
import type { GroundTruthState } from './state';

/**
 * The entity's live transform. The core writes it only through setTransform.
 */
export interface ReplicatedBody {
    getPosition(): Vec3;
    getRotation(): Quat;
    setTransform(position: Vec3, rotation?: Quat): void;
}

/**
 * A local subsystem that can move the entity on its own (physics integrator,
 * path follower, root motion). Replicas freeze every registered one.
 */
export interface LocalSimulation {
    readonly name: string;
    /** False once frozen, unless the subsystem re-activated itself */
    readonly active: boolean;
    freezeSimulation(): void;
}

/**
 * Explicit world context handed to an entity at construction, in place of
 * ambient "current player" lookups.
 */
export interface EntityContext {
    /** Seconds of world time elapsed */
    readonly time: number;
    /** Nearest target the behavior could pursue, or null */
    closestTarget(from: Vec3): Vec3 | null;
}

/**
 * Decision logic for a hostile entity. Only the authority calls simulate.
 */
export interface BehaviorController {
    simulate?(dt: number, state: GroundTruthState, context: EntityContext): void;
    /** Called once per death; must work even after the controller was deactivated */
    notifyDeath(): void;
}
