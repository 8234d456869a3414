/**
 * Replicated Enemy
 *
 * One hostile entity under authority/replica replication. The role is
 * resolved first thing in the constructor and never changes, including
 * across pooled reuse. Everything else is wired per role:
 *
 * Authority: ground truth + MutationApplier; writes the snapshot channel;
 *            applies commands; schedules teardown after death.
 * Replica:   ReconciliationEngine + AuthorityGuard + DeathEdgeDispatcher;
 *            reads the snapshot channel; forwards commands; freezes every
 *            local simulation and keeps re-freezing on a finite schedule.
 *
 * The world drives the per-tick hooks (`_guardPre`, `_simulate`,
 * `_reconcile`, `_guardPost`, `_publish`) from its system phases.
 */

import type { EntityId } from '../core/entity-id';
import type { TaskHandle, TaskScheduler, RetrySchedule } from '../core/tasks';
import { scheduleRetries } from '../core/tasks';
import { Vec3, Transform, vec3Clone, quatClone } from '../math';
import type { NetMessage, SendTarget } from '../net/transport';
import { AuthorityGuard, GuardStats } from '../sync/authority-guard';
import type {
    BehaviorController,
    EntityContext,
    LocalSimulation,
    ReplicatedBody
} from '../sync/capabilities';
import { CommandForwarder, ForwardOutcome, decodeCommand } from '../sync/command';
import { SyncConfig, DEFAULT_SYNC_CONFIG } from '../sync/config';
import { DeathEdgeDispatcher } from '../sync/death-edge';
import { MotionEstimator, MotionSample } from '../sync/motion';
import { MutationApplier } from '../sync/mutation';
import { ReconciliationEngine, PresentationState } from '../sync/reconcile';
import { Role, ResolvedRole, SessionInfo, resolveRole } from '../sync/role';
import { Snapshot, readSnapshot, writeSnapshot } from '../sync/snapshot';
import { SnapshotChannel, StreamObserver } from '../sync/snapshot-channel';
import type { SnapshotStream } from '../sync/snapshot-stream';
import { GroundTruthState, HealthAttribute } from '../sync/state';

// ============================================
// Host and factory contracts
// ============================================

/**
 * What an entity needs from the world it lives in.
 */
export interface EntityHost {
    readonly tasks: TaskScheduler;
    readonly context: EntityContext;
    /** Session role information, null when offline */
    session(): SessionInfo | null;
    send(message: NetMessage, target: SendTarget): void;
    /** Take the entity out of the world (teardown) */
    release(entity: ReplicatedEnemy): void;
}

export interface EntitySpawnInfo {
    id: EntityId;
    kind: string;
    transform: Transform;
    /** Already resolved; factories use it to skip work replicas must not do */
    role: Role;
}

/**
 * Collaborators supplied per entity kind.
 */
export interface EntityParts {
    body: ReplicatedBody;
    behavior: BehaviorController;
    simulations?: LocalSimulation[];
    config?: Partial<SyncConfig>;
}

export type EntityFactory = (info: EntitySpawnInfo) => EntityParts;

const EMPTY_PAYLOAD = new Uint8Array(0);

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

// ============================================
// Entity
// ============================================

export class ReplicatedEnemy implements StreamObserver {
    readonly observerId: string;
    readonly config: SyncConfig;
    readonly channel: SnapshotChannel;
    readonly health: HealthAttribute;
    readonly body: ReplicatedBody;
    readonly behavior: BehaviorController;

    private readonly resolved: ResolvedRole;
    private readonly simulations: LocalSimulation[];
    private readonly forwarder: CommandForwarder;
    private readonly motionEstimator: MotionEstimator;

    // Authority only
    private readonly groundTruth: GroundTruthState | null = null;
    private readonly applier: MutationApplier | null = null;

    // Replica only
    private readonly reconciliation: ReconciliationEngine | null = null;
    private readonly guard: AuthorityGuard | null = null;
    private readonly deathEdge: DeathEdgeDispatcher | null = null;

    private _active: boolean = false;
    private replicaDead: boolean = false;
    private deathNotified: boolean = false;
    private firstSyncLogged: boolean = false;
    private _frozenCount: number = 0;

    private teardownTask: TaskHandle | null = null;
    private refreezeTask: TaskHandle | null = null;
    private sweeps: RetrySchedule | null = null;

    constructor(
        private readonly host: EntityHost,
        readonly id: EntityId,
        readonly kind: string,
        transform: Transform,
        factory: EntityFactory
    ) {
        // Before any collaborator exists
        this.resolved = resolveRole(host.session());

        const parts = factory({ id, kind, transform, role: this.resolved.role });
        this.config = { ...DEFAULT_SYNC_CONFIG, ...parts.config };
        this.body = parts.body;
        this.behavior = parts.behavior;
        this.simulations = [...(parts.simulations ?? [])];
        this.observerId = `sync:${id}`;
        this.health = new HealthAttribute(this.config.maxHealth);
        this.channel = new SnapshotChannel(id, this.config.debug);
        this.motionEstimator = new MotionEstimator(this.config);

        if (this.resolved.role === 'authority') {
            this.groundTruth = new GroundTruthState(transform, this.health);
            this.applier = new MutationApplier(this.groundTruth, () => this.onAuthorityDeath());
            this.applier.interceptLocalDamage();
        } else {
            for (const simulation of this.simulations) {
                simulation.freezeSimulation();
            }
            this.reconciliation = new ReconciliationEngine(transform, this.config);
            this.guard = new AuthorityGuard(this.body);
            this.deathEdge = new DeathEdgeDispatcher(() => this.notifyDeathOnce());
        }

        this.channel.claimExclusive(this);

        this.forwarder = new CommandForwarder({
            role: this.resolved.role,
            localId: host.session()?.localParticipantId ?? '',
            applyLocally: (amount, position, direction, attacker) => {
                if (!this.applier) {
                    throw new Error(`Entity ${this.id}: replica has no mutation applier`);
                }
                return this.applier.apply(amount, position, direction, attacker);
            },
            sendToAuthority: payload => this.host.send({ kind: 'command', entityId: this.id, payload }, 'authority'),
            knownDead: () => this.isDead
        });
    }

    // ============================================
    // Queries
    // ============================================

    get role(): Role {
        return this.resolved.role;
    }

    get isAuthority(): boolean {
        return this.resolved.role === 'authority';
    }

    /** Authority with no replication traffic */
    get solo(): boolean {
        return this.resolved.solo;
    }

    get active(): boolean {
        return this._active;
    }

    get isDead(): boolean {
        return this.groundTruth ? this.groundTruth.isDead : this.replicaDead;
    }

    /** Authority's ground truth; null on replicas */
    get state(): GroundTruthState | null {
        return this.groundTruth;
    }

    /** Replica's presentation state; null on the authority */
    get presentation(): Readonly<PresentationState> | null {
        return this.reconciliation ? this.reconciliation.state : null;
    }

    get guardStats(): Readonly<GuardStats> | null {
        return this.guard ? this.guard.stats : null;
    }

    get motion(): MotionSample {
        return this.motionEstimator.sample;
    }

    /** Simulations this entity froze after they had become active */
    get frozenCount(): number {
        return this._frozenCount;
    }

    get sweepsDone(): boolean {
        return this.sweeps === null || this.sweeps.done;
    }

    // ============================================
    // Lifecycle
    // ============================================

    /**
     * Reset to full health, alive, at `transform`. Used on spawn and on
     * every pooled reuse; the role is left alone.
     */
    activate(transform: Transform): void {
        this.cancelTasks();

        this.body.setTransform(vec3Clone(transform.position), quatClone(transform.rotation));
        if (this.groundTruth) {
            this.groundTruth._reset(transform);
        } else {
            this.health.reset();
        }

        this.reconciliation?.reset(transform);
        this.guard?.disarm();
        this.guard?.resetStats();
        this.deathEdge?.reset();
        this.motionEstimator.reset();

        this.replicaDead = false;
        this.deathNotified = false;
        this.firstSyncLogged = false;
        this._active = true;
    }

    /**
     * Second exclusivity pass, then the same re-check on the next tick and
     * on every sweep. Replicas also re-freeze their local simulations there.
     */
    start(): void {
        this.channel.claimExclusive(this);

        this.refreezeTask = this.host.tasks.afterTicks(1, () => {
            this.refreezeTask = null;
            this.recheck();
        });
        this.sweeps = scheduleRetries(
            this.host.tasks,
            this.config.sweepScheduleSeconds,
            () => this.recheck(),
            results => {
                if (this.config.debug) {
                    console.log(`[AuthoritySync] Entity ${this.id}: sweeps done, frozen per attempt [${results.join(', ')}]`);
                }
            }
        );
    }

    deactivate(): void {
        this._active = false;
        this.cancelTasks();
        this.guard?.disarm();
    }

    /** Deactivate and stop listening to the health attribute */
    dispose(): void {
        this.deactivate();
        this.applier?.detach();
    }

    /**
     * Register a subsystem that can move the entity on its own. Replicas
     * freeze it on the next scheduled sweep.
     */
    registerSimulation(simulation: LocalSimulation): void {
        if (!this.simulations.includes(simulation)) {
            this.simulations.push(simulation);
        }
    }

    /**
     * Freeze every registered simulation that is currently active.
     *
     * @returns Number of simulations frozen by this call
     */
    freezeSimulations(): number {
        let frozen = 0;
        for (const simulation of this.simulations) {
            if (!simulation.active) continue;
            simulation.freezeSimulation();
            frozen++;
        }
        this._frozenCount += frozen;
        if (frozen > 0 && this.config.debug) {
            console.log(`[AuthoritySync] Entity ${this.id}: froze ${frozen} local simulation(s)`);
        }
        return frozen;
    }

    /**
     * Strip late observers from the channel and, on replicas, re-freeze.
     *
     * @returns Number of simulations frozen
     */
    private recheck(): number {
        this.channel.claimExclusive(this);
        return this.isAuthority ? 0 : this.freezeSimulations();
    }

    // ============================================
    // Mutations and teardown
    // ============================================

    /**
     * Ask for damage. Applied here on the authority, forwarded otherwise.
     */
    requestDamage(amount: number, position: Vec3, direction: Vec3, attacker: string | null = null): ForwardOutcome {
        if (!this._active) return 'ignored';
        return this.forwarder.requestMutation(amount, position, direction, attacker);
    }

    /**
     * Remove the entity everywhere. Authority only.
     *
     * @returns false if this participant may not (or need not) tear down
     */
    requestTeardown(): boolean {
        if (!this.isAuthority) {
            console.warn(`[AuthoritySync] Entity ${this.id}: replicas never initiate teardown`);
            return false;
        }
        if (!this._active) return false;

        if (!this.solo) {
            this.host.send({ kind: 'teardown', entityId: this.id, payload: EMPTY_PAYLOAD }, 'others');
        }
        this.host.release(this);
        return true;
    }

    // ============================================
    // Inbound messages
    // ============================================

    onSnapshot(bytes: Uint8Array): void {
        if (this.isAuthority) {
            console.warn(`[AuthoritySync] Entity ${this.id}: authority ignored an inbound snapshot`);
            return;
        }
        if (!this._active) return;

        try {
            this.channel.read(bytes);
        } catch (error) {
            console.warn(`[AuthoritySync] Entity ${this.id}: dropped snapshot: ${errorMessage(error)}`);
            return;
        }

        if (!this.firstSyncLogged) {
            this.firstSyncLogged = true;
            console.log(`[AuthoritySync] Entity ${this.id}: first sync received`);
        }
    }

    onCommand(from: string, payload: Uint8Array): void {
        if (!this.isAuthority) {
            console.warn(`[AuthoritySync] Entity ${this.id}: command from '${from}' reached a replica, ignored`);
            return;
        }
        if (!this._active) return;

        try {
            const request = decodeCommand(payload);
            this.forwarder.requestMutation(request.amount, request.position, request.direction, request.senderId);
        } catch (error) {
            console.warn(`[AuthoritySync] Entity ${this.id}: dropped command from '${from}': ${errorMessage(error)}`);
        }
    }

    onTeardown(from: string): void {
        if (this.isAuthority) {
            console.warn(`[AuthoritySync] Entity ${this.id}: authority ignored a teardown from '${from}'`);
            return;
        }
        const authorityId = this.host.session()?.authorityParticipantId ?? null;
        if (from !== authorityId) {
            console.warn(`[AuthoritySync] Entity ${this.id}: teardown from non-authority '${from}' ignored`);
            return;
        }
        this.host.release(this);
    }

    // ============================================
    // Snapshot channel
    // ============================================

    serializeView(stream: SnapshotStream): void {
        if (stream.isWriting) {
            if (!this.groundTruth) {
                throw new Error(`Entity ${this.id}: a replica never writes its snapshot channel`);
            }
            writeSnapshot(stream, this.groundTruth.snapshot());
            return;
        }
        this.applySnapshot(readSnapshot(stream));
    }

    private applySnapshot(snapshot: Snapshot): void {
        if (!this.reconciliation || !this.deathEdge) return;

        const previousIsDead = this.replicaDead;
        this.reconciliation.receive(snapshot);
        this.health.mirror(snapshot.health);
        this.replicaDead = snapshot.isDead;
        this.deathEdge.onSnapshotApplied(previousIsDead, snapshot.isDead);
    }

    // ============================================
    // Per-tick hooks (driven by the world)
    // ============================================

    /** prePhysics, before any local integration */
    _guardPre(): void {
        if (this._active && this.guard) this.guard.enforce();
    }

    /** update: authority simulation */
    _simulate(dt: number): void {
        if (!this._active || !this.groundTruth) return;
        const state = this.groundTruth;

        if (!state.isDead) {
            this.behavior.simulate?.(dt, state, this.host.context);
        }
        this.body.setTransform(vec3Clone(state.position), quatClone(state.rotation));
        this.motionEstimator.update(state.position, dt);

        if (state.position.y < this.config.killPlaneY) {
            console.warn(`[AuthoritySync] Entity ${this.id}: fell below y=${this.config.killPlaneY}, tearing down`);
            this.requestTeardown();
        }
    }

    /** postPhysics: replica reconciliation */
    _reconcile(dt: number): void {
        if (!this._active || !this.reconciliation || !this.guard) return;

        const result = this.reconciliation.step(dt);
        if (!result) return;

        this.body.setTransform(result.position, result.rotation);
        this.guard.arm(this.reconciliation.state.lastGoodPosition);
        this.motionEstimator.update(result.position, dt);
    }

    /** late, after every other local writer */
    _guardPost(): void {
        if (this._active && this.guard) this.guard.enforce();
    }

    /** late, on network ticks: authority sends its snapshot */
    _publish(): void {
        if (!this._active || !this.isAuthority || this.solo) return;
        this.host.send({ kind: 'snapshot', entityId: this.id, payload: this.channel.write() }, 'others');
    }

    // ============================================
    // Death
    // ============================================

    private onAuthorityDeath(): void {
        this.notifyDeathOnce();
        if (this.teardownTask) this.host.tasks.cancel(this.teardownTask);
        this.teardownTask = this.host.tasks.afterSeconds(this.config.deathTeardownSeconds, () => {
            this.teardownTask = null;
            this.requestTeardown();
        });
    }

    private notifyDeathOnce(): void {
        if (this.deathNotified) return;
        this.deathNotified = true;
        this.behavior.notifyDeath();
    }

    private cancelTasks(): void {
        if (this.teardownTask) {
            this.host.tasks.cancel(this.teardownTask);
            this.teardownTask = null;
        }
        if (this.refreezeTask) {
            this.host.tasks.cancel(this.refreezeTask);
            this.refreezeTask = null;
        }
        this.sweeps?.cancel();
        this.sweeps = null;
    }
}
