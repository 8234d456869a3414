import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import { quatIdentity, vec3, vec3Zero } from '../math';
import type { Transform, Vec3 } from '../math';
import { LoopbackHub } from '../net/loopback';
import { encodeSpawn } from '../net/protocol';
import type { SyncConfig } from '../sync/config';
import { fakeKind, must } from '../testing/fakes';
import { ReplicationWorld } from './world';

function at(x: number, y: number, z: number): Transform {
    return { position: vec3(x, y, z), rotation: quatIdentity() };
}

function networked(config: Partial<SyncConfig> = {}, velocity: Vec3 = vec3Zero()) {
    const hub = new LoopbackHub();
    const hostKind = fakeKind(config, velocity);
    const peerKind = fakeKind(config, velocity);
    const host = new ReplicationWorld({ transport: hub.join('host'), config: { snapshotIntervalSeconds: 0 } });
    const peer = new ReplicationWorld({ transport: hub.join('peer'), config: { snapshotIntervalSeconds: 0 } });
    host.registerKind('grunt', hostKind.factory);
    peer.registerKind('grunt', peerKind.factory);
    return { hub, host, peer, hostKind, peerKind };
}

beforeEach(() => {
    // First-sync notices
    vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
    vi.restoreAllMocks();
});

describe('ReplicationWorld spawning', () => {
    test('the authority announces spawns and replicas build the same entity', () => {
        const { hub, host, peer, peerKind } = networked();

        const enemy = host.spawn('grunt', at(10, 0, 4));
        expect(enemy.role).toBe('authority');
        expect(enemy.solo).toBe(false);
        expect(peer.entityCount).toBe(0);

        expect(hub.flush()).toBe(1);
        const replica = must(peer.getEntity(enemy.id), 'replica');
        expect(replica.role).toBe('replica');
        expect(replica.kind).toBe('grunt');
        expect(peerKind.built[0].role).toBe('replica');
        expect(peerKind.built[0].body.position).toEqual({ x: 10, y: 0, z: 4 });
    });

    test('replicas cannot spawn', () => {
        const { peer } = networked();
        expect(() => peer.spawn('grunt', at(0, 0, 0))).toThrow("Only the authority spawns replicated entities (kind 'grunt')");
    });

    test('unknown kinds are rejected', () => {
        const { host } = networked();
        expect(() => host.spawn('ogre', at(0, 0, 0))).toThrow("Unknown entity kind: 'ogre'");
    });

    test('a spawn announcement for an unregistered kind is dropped', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const hub = new LoopbackHub();
        const host = new ReplicationWorld({ transport: hub.join('host') });
        const peer = new ReplicationWorld({ transport: hub.join('peer') });
        host.registerKind('grunt', fakeKind().factory);

        const enemy = host.spawn('grunt', at(0, 0, 0));
        hub.flush();

        expect(peer.entityCount).toBe(0);
        expect(warn).toHaveBeenCalledWith(`[ReplicationWorld] No factory registered for kind 'grunt' (entity ${enemy.id})`);
    });
});

describe('ReplicationWorld spawn trust', () => {
    test('spawn announcements from a non-authority are ignored', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const hub = new LoopbackHub();
        const host = new ReplicationWorld({ transport: hub.join('host') });
        const peerTransport = hub.join('peer');
        const bystander = new ReplicationWorld({ transport: hub.join('bystander') });
        host.registerKind('grunt', fakeKind().factory);
        bystander.registerKind('grunt', fakeKind().factory);

        peerTransport.send({
            kind: 'spawn',
            entityId: 0,
            payload: encodeSpawn({ kind: 'grunt', transform: at(1, 0, 1) })
        }, 'others');
        hub.flush();

        expect(host.entityCount).toBe(0);
        expect(bystander.entityCount).toBe(0);
        expect(warn).toHaveBeenCalledWith("[ReplicationWorld] Spawn for entity 0 from non-authority 'peer' ignored");

        const enemy = host.spawn('grunt', at(0, 0, 0));
        expect(enemy.id).toBe(0);
        expect(enemy.role).toBe('authority');
    });
});

describe('ReplicationWorld channel exclusivity', () => {
    test('observers that register after spawn are stripped by the re-checks on both roles', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const { hub, host, peer } = networked();
        const enemy = host.spawn('grunt', at(0, 0, 0));
        hub.flush();
        const replica = must(peer.getEntity(enemy.id));

        host.tick(0.25);
        peer.tick(0.25);
        enemy.channel.register({ observerId: 'stray-writer', serializeView: () => {} });
        replica.channel.register({ observerId: 'stray-reader', serializeView: () => {} });

        for (let i = 0; i < 12; i++) {
            host.tick(0.25);
            hub.flush();
            peer.tick(0.25);
        }

        expect(enemy.sweepsDone).toBe(true);
        expect(replica.sweepsDone).toBe(true);
        expect(enemy.channel.isExclusive(enemy)).toBe(true);
        expect(replica.channel.isExclusive(replica)).toBe(true);
        expect(enemy.channel.write().byteLength).toBe(33);
        expect(warn).toHaveBeenCalledWith(`[SnapshotChannel] Removed observer 'stray-writer' from entity ${enemy.id}`);
        expect(warn).toHaveBeenCalledWith(`[SnapshotChannel] Removed observer 'stray-reader' from entity ${enemy.id}`);
    });
});

describe('ReplicationWorld replication', () => {
    test('the first snapshot snaps and later ones ease in', () => {
        const { hub, host, peer, peerKind } = networked({ positionLerpRate: 2 }, vec3(4, 0, 0));
        host.spawn('grunt', at(10, 0, 4));
        hub.flush();
        const body = peerKind.built[0].body;

        host.tick(0.25);
        hub.flush();
        peer.tick(0.25);
        expect(body.position).toEqual({ x: 11, y: 0, z: 4 });

        host.tick(0.25);
        hub.flush();
        peer.tick(0.25);
        expect(body.position).toEqual({ x: 11.5, y: 0, z: 4 });
    });

    test('a lost snapshot is simply superseded', () => {
        const { hub, host, peer, peerKind } = networked({}, vec3(4, 0, 0));
        host.spawn('grunt', at(10, 0, 4));
        hub.flush();

        host.tick(0.25);
        expect(hub.discardPending()).toBe(1);
        host.tick(0.25);
        hub.flush();
        peer.tick(0.25);

        expect(peerKind.built[0].body.position).toEqual({ x: 12, y: 0, z: 4 });
    });

    test('the guard undoes local movers in physics and in late', () => {
        const { hub, host, peer, peerKind } = networked();
        const enemy = host.spawn('grunt', at(10, 0, 4));
        hub.flush();
        const body = peerKind.built[0].body;
        const push = () => {
            body.position = vec3(body.position.x + 3, body.position.y, body.position.z);
        };
        peer.addSystem(push, { phase: 'physics', name: 'stray-physics' });
        peer.addSystem(push, { phase: 'late', name: 'root-motion' });

        host.tick(0.1);
        hub.flush();
        peer.tick(0.1);
        peer.tick(0.1);

        const replica = must(peer.getEntity(enemy.id));
        expect(body.position).toEqual({ x: 10, y: 0, z: 4 });
        expect(must(replica.presentation).lastGoodPosition).toEqual({ x: 10, y: 0, z: 4 });
        expect(replica.guardStats).toEqual({ enforcements: 3, corrections: 2 });
    });

    test('replica damage is applied once by the authority and mirrored back', () => {
        const { hub, host, peer } = networked();
        const enemy = host.spawn('grunt', at(0, 0, 0));
        hub.flush();
        const replica = must(peer.getEntity(enemy.id));
        const hits: Array<string | null> = [];
        enemy.health.onDamage(event => hits.push(event.attacker));

        expect(replica.requestDamage(10, vec3(0, 1, 0), vec3(0, 0, 1))).toBe('forwarded');
        expect(replica.health.value).toBe(100);

        hub.flush();
        expect(enemy.health.value).toBe(90);
        expect(hits).toEqual(['peer']);

        host.tick(0.1);
        hub.flush();
        expect(replica.health.value).toBe(90);
    });

    test('death fires once on the replica and teardown follows on the authority', () => {
        const { hub, host, peer, hostKind, peerKind } = networked();
        const enemy = host.spawn('grunt', at(0, 0, 0));
        hub.flush();
        const replica = must(peer.getEntity(enemy.id));

        replica.requestDamage(100, vec3(0, 1, 0), vec3(0, 0, 1));
        hub.flush();
        expect(enemy.isDead).toBe(true);
        expect(hostKind.built[0].behavior.deaths).toBe(1);

        for (let i = 0; i < 5; i++) {
            host.tick(0.5);
            hub.flush();
        }
        expect(replica.isDead).toBe(true);
        expect(peerKind.built[0].behavior.deaths).toBe(1);
        expect(host.entityCount).toBe(1);

        host.tick(0.5);
        expect(host.entityCount).toBe(0);
        expect(host.idAllocator.isValid(enemy.id)).toBe(false);

        hub.flush();
        expect(peer.entityCount).toBe(0);
        expect(peerKind.built[0].behavior.deaths).toBe(1);
    });

    test('snapshots for unknown entities are reported', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const { hub, host } = networked();
        const enemy = host.spawn('grunt', at(0, 0, 0));
        hub.discardPending();

        host.tick(0.1);
        hub.flush();

        expect(warn).toHaveBeenCalledWith(`[ReplicationWorld] snapshot for unknown entity ${enemy.id} from 'host'`);
    });

    test('the kill plane tears the entity down everywhere', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const { hub, host, peer } = networked({}, vec3(0, -100, 0));
        const enemy = host.spawn('grunt', at(0, 0, 0));
        hub.flush();

        host.tick(0.25);
        host.tick(0.25);
        expect(host.entityCount).toBe(1);
        expect(must(enemy.state).position.y).toBe(-50);

        host.tick(0.25);
        expect(host.entityCount).toBe(0);
        expect(warn).toHaveBeenCalledWith(`[AuthoritySync] Entity ${enemy.id}: fell below y=-50, tearing down`);

        hub.flush();
        expect(peer.entityCount).toBe(0);
    });

    test('snapshots go out at the configured interval', () => {
        const hub = new LoopbackHub();
        const host = new ReplicationWorld({ transport: hub.join('host'), config: { snapshotIntervalSeconds: 0.1 } });
        hub.join('peer');
        host.registerKind('grunt', fakeKind().factory);
        host.spawn('grunt', at(0, 0, 0));
        hub.discardPending();

        host.tick(0.05);
        expect(hub.pendingCount).toBe(0);
        host.tick(0.05);
        expect(hub.pendingCount).toBe(1);
    });
});

describe('ReplicationWorld local simulation suppression', () => {
    test('re-freezes on the first tick, then on each sweep, then stops', () => {
        const { hub, host, peer, peerKind } = networked();
        const enemy = host.spawn('grunt', at(0, 0, 0));
        hub.flush();
        const replica = must(peer.getEntity(enemy.id));
        const [physics, rootMotion] = peerKind.built[0].simulations;

        physics.reactivate();
        rootMotion.reactivate();
        peer.tick(0.25);
        expect(replica.frozenCount).toBe(2);

        // Sweeps at 0.5s, 1.5s and 3.0s
        const frozenAfter: number[] = [];
        for (let i = 0; i < 11; i++) {
            physics.reactivate();
            peer.tick(0.25);
            frozenAfter.push(replica.frozenCount);
        }

        expect(frozenAfter).toEqual([3, 3, 3, 3, 4, 4, 4, 4, 4, 4, 5]);
        expect(replica.sweepsDone).toBe(true);

        physics.reactivate();
        peer.tick(0.25);
        expect(physics.active).toBe(true);
    });
});

describe('ReplicationWorld offline', () => {
    test('solo entities are pooled and reused with the same role', () => {
        const world = new ReplicationWorld();
        const kind = fakeKind();
        world.registerKind('grunt', kind.factory);

        const first = world.spawn('grunt', at(0, 0, 0));
        expect(first.solo).toBe(true);
        expect(first.requestDamage(30, vec3(0, 1, 0), vec3(0, 0, 1))).toBe('applied');
        expect(first.requestTeardown()).toBe(true);
        expect(world.entityCount).toBe(0);
        expect(world.pool.size('grunt')).toBe(1);

        const second = world.spawn('grunt', at(5, 0, 5));
        expect(second).toBe(first);
        expect(second.role).toBe('authority');
        expect(second.health.value).toBe(100);
        expect(must(second.state).position).toEqual({ x: 5, y: 0, z: 5 });
        expect(kind.built).toHaveLength(1);
        expect(world.pool.size()).toBe(0);
    });

    test('headless worlds skip the render phase', () => {
        const world = new ReplicationWorld({ config: { headless: true } });
        const render = vi.fn();
        const update = vi.fn();
        world.addSystem(render, { phase: 'render' });
        world.addSystem(update, { phase: 'update' });

        world.tick(0.1);

        expect(render).not.toHaveBeenCalled();
        expect(update).toHaveBeenCalledWith(0.1);
    });

    test('the entity context exposes world time and targets', () => {
        const world = new ReplicationWorld({ targets: () => vec3(1, 0, 1) });

        world.tick(0.25);
        world.tick(0.25);

        expect(world.context.time).toBe(0.5);
        expect(world.context.closestTarget(vec3(0, 0, 0))).toEqual({ x: 1, y: 0, z: 1 });
    });

    test('destroy disposes everything', () => {
        const world = new ReplicationWorld();
        world.registerKind('grunt', fakeKind().factory);
        const enemy = world.spawn('grunt', at(0, 0, 0));

        world.destroy();

        expect(world.entityCount).toBe(0);
        expect(enemy.active).toBe(false);
        expect(() => world.spawn('grunt', at(0, 0, 0))).toThrow("Unknown entity kind: 'grunt'");
    });
});
