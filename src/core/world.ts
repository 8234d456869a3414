/**
 * Replication World
 *
 * Main entry point for one participant. Manages:
 * - Entity kinds and spawning (with spawn announcements when networked)
 * - The per-tick system phases and deferred tasks
 * - Routing inbound transport messages to entities
 * - Snapshot publishing at the network tick rate
 * - Pooling of solo entities
 */

import { EntityIdAllocator, EntityId } from './entity-id';
import { SystemScheduler, SystemFn, SystemOptions } from './system';
import { TaskScheduler } from './tasks';
import { GUARD_POST_ORDER, GUARD_PRE_ORDER, PUBLISH_ORDER } from './constants';
import { Vec3, Transform, transformClone } from '../math';
import { ReplicatedEnemy, EntityFactory, EntityHost } from '../entity/replicated-enemy';
import { EntityPool } from '../entity/pool';
import type { EntityContext } from '../sync/capabilities';
import { SessionInfo, resolveRole } from '../sync/role';
import type { Delivery, NetMessage, SendTarget, Transport } from '../net/transport';
import { decodeSpawn, encodeSpawn } from '../net/protocol';
import type { SpawnAnnouncement } from '../net/protocol';

/**
 * World configuration.
 */
export interface WorldConfig {
    /** Seconds between snapshot publishes (0 = every tick) */
    snapshotIntervalSeconds: number;
    /** Skip the render phase (server / bot participants) */
    headless: boolean;
    /** Log routing decisions */
    debug: boolean;
}

export const DEFAULT_WORLD_CONFIG: WorldConfig = {
    snapshotIntervalSeconds: 0.1,
    headless: false,
    debug: false
};

/** Finds the nearest target an entity could pursue */
export type TargetProvider = (from: Vec3) => Vec3 | null;

export interface WorldOptions {
    /** Omit for an offline (solo) world */
    transport?: Transport | null;
    config?: Partial<WorldConfig>;
    targets?: TargetProvider;
}

/** Tolerance for accumulated float time */
const TIME_EPSILON = 1e-9;

export class ReplicationWorld {
    readonly config: WorldConfig;

    /** System scheduler */
    readonly scheduler: SystemScheduler = new SystemScheduler();

    /** Deferred tasks (re-freeze sweeps, death teardown) */
    readonly tasks: TaskScheduler = new TaskScheduler();

    /** Entity ID allocator (authority side) */
    readonly idAllocator: EntityIdAllocator = new EntityIdAllocator();

    /** Deactivated solo entities */
    readonly pool: EntityPool = new EntityPool();

    /** World context handed to every entity */
    readonly context: EntityContext;

    private readonly transport: Transport | null;
    private kinds: Map<string, EntityFactory> = new Map();
    private entities: Map<EntityId, ReplicatedEnemy> = new Map();
    private publishAccumulator: number = 0;
    private unsubscribe: (() => void) | null = null;
    private readonly host: EntityHost;

    constructor(options: WorldOptions = {}) {
        this.config = { ...DEFAULT_WORLD_CONFIG, ...options.config };
        this.transport = options.transport ?? null;
        this.scheduler.setHeadless(this.config.headless);

        const targets = options.targets ?? null;
        const tasks = this.tasks;
        this.context = {
            get time() {
                return tasks.time;
            },
            closestTarget: from => (targets ? targets(from) : null)
        };

        this.host = {
            tasks: this.tasks,
            context: this.context,
            session: () => this.session(),
            send: (message, target) => this.send(message, target),
            release: entity => this.release(entity)
        };

        if (this.transport) {
            this.unsubscribe = this.transport.onMessage(delivery => this.handleDelivery(delivery));
        }

        this.registerCoreSystems();
    }

    // ==========================================
    // Session
    // ==========================================

    session(): SessionInfo | null {
        return this.transport ? this.transport.session() : null;
    }

    /** Whether entities spawned now would be authoritative */
    get isAuthority(): boolean {
        return resolveRole(this.session()).role === 'authority';
    }

    // ==========================================
    // Systems
    // ==========================================

    /**
     * Add a system (local movers, animation, presentation).
     *
     * @returns Function to remove the system
     */
    addSystem(fn: SystemFn, options?: SystemOptions): () => void {
        return this.scheduler.add(fn, options);
    }

    /**
     * Advance one tick: every phase in order, then due deferred tasks.
     */
    tick(dt: number): void {
        this.scheduler.runAll(dt);
        this.tasks.advance(dt);
    }

    // ==========================================
    // Entities
    // ==========================================

    /**
     * Register the factory for an entity kind. Replica worlds need the same
     * kinds registered to build entities from spawn announcements.
     */
    registerKind(kind: string, factory: EntityFactory): void {
        this.kinds.set(kind, factory);
    }

    /**
     * Spawn an entity. Only the authority (or an offline world) spawns;
     * replicas receive the entity through its spawn announcement.
     */
    spawn(kind: string, transform: Transform): ReplicatedEnemy {
        const factory = this.kinds.get(kind);
        if (!factory) {
            throw new Error(`Unknown entity kind: '${kind}'`);
        }

        const resolved = resolveRole(this.session());
        if (resolved.role !== 'authority') {
            throw new Error(`Only the authority spawns replicated entities (kind '${kind}')`);
        }

        let entity = resolved.solo ? this.pool.acquire(kind) : null;
        if (!entity) {
            entity = new ReplicatedEnemy(this.host, this.idAllocator.allocate(), kind, transformClone(transform), factory);
        }

        this.addEntity(entity, transform);

        if (!entity.solo) {
            this.send({
                kind: 'spawn',
                entityId: entity.id,
                payload: encodeSpawn({ kind, transform })
            }, 'others');
        }
        return entity;
    }

    getEntity(id: EntityId): ReplicatedEnemy | null {
        return this.entities.get(id) ?? null;
    }

    getEntities(): ReplicatedEnemy[] {
        return [...this.entities.values()];
    }

    get entityCount(): number {
        return this.entities.size;
    }

    /**
     * Dispose every entity, detach from the transport, drop all systems
     * and tasks.
     */
    destroy(): void {
        this.unsubscribe?.();
        this.unsubscribe = null;

        for (const entity of this.entities.values()) {
            entity.dispose();
        }
        for (const entity of this.pool.drain()) {
            entity.dispose();
        }
        this.entities.clear();
        this.kinds.clear();
        this.scheduler.clear();
        this.tasks.clear();
        this.idAllocator.reset();
    }

    // ==========================================
    // Internals
    // ==========================================

    private addEntity(entity: ReplicatedEnemy, transform: Transform): void {
        if (this.entities.has(entity.id)) {
            throw new Error(`Entity ${entity.id} already exists`);
        }
        this.entities.set(entity.id, entity);
        entity.activate(transform);
        entity.start();
    }

    private release(entity: ReplicatedEnemy): void {
        if (this.entities.get(entity.id) !== entity) return;
        this.entities.delete(entity.id);
        entity.deactivate();

        if (entity.solo) {
            this.pool.release(entity);
        } else {
            entity.dispose();
            if (entity.isAuthority) this.idAllocator.free(entity.id);
        }

        if (this.config.debug) {
            console.log(`[ReplicationWorld] Released entity ${entity.id} (${entity.solo ? 'pooled' : 'removed'})`);
        }
    }

    private send(message: NetMessage, target: SendTarget): void {
        this.transport?.send(message, target);
    }

    private registerCoreSystems(): void {
        const each = (fn: (entity: ReplicatedEnemy) => void): void => {
            // Copy: teardown removes entities mid-iteration
            for (const entity of [...this.entities.values()]) fn(entity);
        };

        this.scheduler.add(() => each(e => e._guardPre()), {
            phase: 'prePhysics', order: GUARD_PRE_ORDER, name: 'guard-pre'
        });
        this.scheduler.add(dt => each(e => e._simulate(dt)), {
            phase: 'update', name: 'authority-simulate'
        });
        this.scheduler.add(dt => each(e => e._reconcile(dt)), {
            phase: 'postPhysics', name: 'reconcile'
        });
        this.scheduler.add(() => each(e => e._guardPost()), {
            phase: 'late', order: GUARD_POST_ORDER, name: 'guard-post'
        });
        this.scheduler.add(dt => this.publish(dt), {
            phase: 'late', order: PUBLISH_ORDER, name: 'publish-snapshots'
        });
    }

    private publish(dt: number): void {
        const interval = this.config.snapshotIntervalSeconds;
        if (interval > 0) {
            this.publishAccumulator += dt;
            if (this.publishAccumulator + TIME_EPSILON < interval) return;
            this.publishAccumulator -= interval;
            if (this.publishAccumulator >= interval) this.publishAccumulator = 0;
        }

        for (const entity of [...this.entities.values()]) {
            entity._publish();
        }
    }

    private handleDelivery({ from, message }: Delivery): void {
        if (message.kind === 'spawn') {
            this.handleSpawn(from, message);
            return;
        }

        const entity = this.entities.get(message.entityId);
        if (!entity) {
            console.warn(`[ReplicationWorld] ${message.kind} for unknown entity ${message.entityId} from '${from}'`);
            return;
        }

        switch (message.kind) {
            case 'snapshot':
                entity.onSnapshot(message.payload);
                break;
            case 'command':
                entity.onCommand(from, message.payload);
                break;
            case 'teardown':
                entity.onTeardown(from);
                break;
        }
    }

    private handleSpawn(from: string, message: NetMessage): void {
        const authorityId = this.session()?.authorityParticipantId ?? null;
        if (this.isAuthority || from !== authorityId) {
            console.warn(`[ReplicationWorld] Spawn for entity ${message.entityId} from non-authority '${from}' ignored`);
            return;
        }

        let announcement: SpawnAnnouncement;
        try {
            announcement = decodeSpawn(message.payload);
        } catch (error) {
            console.warn(`[ReplicationWorld] Dropped spawn from '${from}':`, error instanceof Error ? error.message : error);
            return;
        }

        const factory = this.kinds.get(announcement.kind);
        if (!factory) {
            console.warn(`[ReplicationWorld] No factory registered for kind '${announcement.kind}' (entity ${message.entityId})`);
            return;
        }
        if (this.entities.has(message.entityId)) {
            console.warn(`[ReplicationWorld] Duplicate spawn for entity ${message.entityId} ignored`);
            return;
        }

        const entity = new ReplicatedEnemy(this.host, message.entityId, announcement.kind, announcement.transform, factory);
        this.addEntity(entity, announcement.transform);

        if (this.config.debug) {
            console.log(`[ReplicationWorld] Spawned ${announcement.kind} ${message.entityId} as ${entity.role}`);
        }
    }
}
