/**
 * Entity state owned by the authority: the health attribute the entity's
 * own systems listen to, and the ground-truth record snapshots are taken from.
 */

import { Vec3, Quat, Transform, vec3Clone, quatClone } from '../math';
import { Snapshot, createSnapshot } from './snapshot';

// ============================================
// Health attribute
// ============================================

export interface DamageEvent {
    amount: number;
    /** Health before this damage was taken */
    previousValue: number;
    position: Vec3;
    direction: Vec3;
    attacker: string | null;
}

export type DamageListener = (event: DamageEvent) => void;
export type HealthChangeListener = (value: number, previous: number) => void;

/**
 * Local health value with listeners. Hit reactions and health bars hang off
 * the damage and change events.
 */
export class HealthAttribute {
    private _value: number;
    private damageListeners: Set<DamageListener> = new Set();
    private changeListeners: Set<HealthChangeListener> = new Set();

    constructor(readonly maxValue: number) {
        if (!(maxValue > 0)) {
            throw new Error(`Health maxValue must be positive, got ${maxValue}`);
        }
        this._value = maxValue;
    }

    get value(): number {
        return this._value;
    }

    /**
     * Lower health by amount (floored at 0) and emit a damage event.
     */
    damage(amount: number, position: Vec3, direction: Vec3, attacker: string | null = null): void {
        const previousValue = this._value;
        this.set(this._value - amount);
        const event: DamageEvent = {
            amount,
            previousValue,
            position: vec3Clone(position),
            direction: vec3Clone(direction),
            attacker
        };
        for (const listener of [...this.damageListeners]) {
            listener(event);
        }
    }

    /** Set a value without a damage event (authoritative copy or revert) */
    mirror(value: number): void {
        this.set(value);
    }

    reset(): void {
        this.set(this.maxValue);
    }

    onDamage(listener: DamageListener): () => void {
        this.damageListeners.add(listener);
        return () => this.damageListeners.delete(listener);
    }

    onChange(listener: HealthChangeListener): () => void {
        this.changeListeners.add(listener);
        return () => this.changeListeners.delete(listener);
    }

    private set(value: number): void {
        const clamped = Math.min(this.maxValue, Math.max(0, value));
        const previous = this._value;
        if (clamped === previous) return;
        this._value = clamped;
        for (const listener of [...this.changeListeners]) {
            listener(clamped, previous);
        }
    }
}

// ============================================
// Ground truth
// ============================================

/**
 * Authority-owned state. The Behavior Controller writes position and
 * rotation in place each tick; health changes and the death flag go through
 * the MutationApplier only.
 */
export class GroundTruthState {
    position: Vec3;
    rotation: Quat;
    private _isDead: boolean = false;

    constructor(initial: Transform, readonly healthAttribute: HealthAttribute) {
        this.position = vec3Clone(initial.position);
        this.rotation = quatClone(initial.rotation);
    }

    get health(): number {
        return this.healthAttribute.value;
    }

    get maxHealth(): number {
        return this.healthAttribute.maxValue;
    }

    get isDead(): boolean {
        return this._isDead;
    }

    /**
     * Immutable copy for the snapshot channel.
     */
    snapshot(): Snapshot {
        return createSnapshot(this.position, this.rotation, this.health, this._isDead);
    }

    /**
     * Set the death flag (internal - MutationApplier only).
     */
    _markDead(): void {
        this._isDead = true;
    }

    /**
     * Full health, alive, at `transform` (internal - entity (re)activation).
     */
    _reset(transform: Transform): void {
        this.position = vec3Clone(transform.position);
        this.rotation = quatClone(transform.rotation);
        this._isDead = false;
        this.healthAttribute.reset();
    }
}
