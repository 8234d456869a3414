/**
 * Mutation Applier (authority only)
 *
 * The single path that lowers ground-truth health and the only one allowed to
 * set the death flag. While it touches the shared health attribute it holds
 * a self-mutating flag, so the damage event that change emits is not fed back
 * into the interception path and applied a second time.
 */

import type { Vec3 } from '../math';
import type { DamageEvent, GroundTruthState } from './state';

export type MutationOutcome =
    /** Health lowered, entity still alive */
    | 'applied'
    /** Health reached 0 and the death flag was set by this call */
    | 'killed'
    /** Entity already dead; nothing changed */
    | 'dead'
    /** Amount was negative or not a finite number; nothing changed */
    | 'rejected';

export interface MutationResult {
    outcome: MutationOutcome;
    health: number;
}

export class MutationApplier {
    private applying: boolean = false;
    private detachInterceptor: (() => void) | null = null;

    constructor(
        private readonly state: GroundTruthState,
        private readonly onDeath: () => void
    ) {}

    /** True only while apply() is writing the health attribute */
    get isApplying(): boolean {
        return this.applying;
    }

    apply(amount: number, position: Vec3, direction: Vec3, attacker: string | null): MutationResult {
        return this.mutate(amount, () => this.state.healthAttribute.damage(amount, position, direction, attacker));
    }

    /**
     * Route damage that local systems deal straight to the health attribute
     * through apply(), so death is still derived in one place.
     */
    interceptLocalDamage(): void {
        if (this.detachInterceptor) return;
        this.detachInterceptor = this.state.healthAttribute.onDamage(event => this.onLocalDamage(event));
    }

    detach(): void {
        this.detachInterceptor?.();
        this.detachInterceptor = null;
    }

    private onLocalDamage(event: DamageEvent): void {
        if (this.applying) return;
        if (this.state.isDead) return;

        // This event is the only dispatch for the raw write: settle the value
        // silently instead of damaging again
        const settled = this.mutate(event.amount, () => {
            this.state.healthAttribute.mirror(Math.max(0, event.previousValue - event.amount));
        });
        if (settled.outcome === 'rejected') {
            this.state.healthAttribute.mirror(event.previousValue);
        }
    }

    private mutate(amount: number, write: () => void): MutationResult {
        if (this.state.isDead) {
            return { outcome: 'dead', health: this.state.health };
        }
        if (!Number.isFinite(amount) || amount < 0) {
            return { outcome: 'rejected', health: this.state.health };
        }

        this.applying = true;
        try {
            write();
        } finally {
            this.applying = false;
        }

        if (this.state.health <= 0 && !this.state.isDead) {
            this.state._markDead();
            this.onDeath();
            return { outcome: 'killed', health: this.state.health };
        }

        return { outcome: 'applied', health: this.state.health };
    }
}
