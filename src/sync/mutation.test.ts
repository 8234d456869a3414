import { describe, test, expect, vi } from 'vitest';
import { vec3, quatIdentity } from '../math';
import { GroundTruthState, HealthAttribute } from './state';
import { MutationApplier } from './mutation';

const hit = vec3(0, 1, 0);
const dir = vec3(0, 0, 1);

function setup(maxHealth: number = 100) {
    const state = new GroundTruthState({ position: vec3(0, 0, 0), rotation: quatIdentity() }, new HealthAttribute(maxHealth));
    const onDeath = vi.fn();
    const applier = new MutationApplier(state, onDeath);
    applier.interceptLocalDamage();
    return { state, onDeath, applier };
}

describe('MutationApplier', () => {
    test('one command of 10 takes 100 to exactly 90, even with the damage event echoing back', () => {
        const { state, applier } = setup();
        const hitReactions = vi.fn();
        state.healthAttribute.onDamage(hitReactions);

        const result = applier.apply(10, hit, dir, 'peer');

        expect(result).toEqual({ outcome: 'applied', health: 90 });
        expect(state.health).toBe(90);
        expect(hitReactions).toHaveBeenCalledTimes(1);
    });

    test('is flagged as applying while the damage event is dispatched', () => {
        const { state, applier } = setup();
        const seen: boolean[] = [];
        state.healthAttribute.onDamage(() => seen.push(applier.isApplying));

        applier.apply(5, hit, dir, null);

        expect(seen).toEqual([true]);
        expect(applier.isApplying).toBe(false);
    });

    test('sets the death flag exactly once, on the killing blow', () => {
        const { state, onDeath, applier } = setup();

        expect(applier.apply(60, hit, dir, null).outcome).toBe('applied');
        expect(applier.apply(60, hit, dir, null)).toEqual({ outcome: 'killed', health: 0 });
        expect(state.isDead).toBe(true);
        expect(onDeath).toHaveBeenCalledTimes(1);
    });

    test('a dead entity ignores further damage', () => {
        const { state, onDeath, applier } = setup();
        applier.apply(100, hit, dir, null);

        expect(applier.apply(25, hit, dir, null)).toEqual({ outcome: 'dead', health: 0 });
        expect(state.health).toBe(0);
        expect(onDeath).toHaveBeenCalledTimes(1);
    });

    test('rejects negative and non-finite amounts', () => {
        const { state, applier } = setup();

        expect(applier.apply(-10, hit, dir, null).outcome).toBe('rejected');
        expect(applier.apply(Number.NaN, hit, dir, null).outcome).toBe('rejected');
        expect(applier.apply(Number.POSITIVE_INFINITY, hit, dir, null).outcome).toBe('rejected');
        expect(state.health).toBe(100);
    });

    test('health <= 0 and isDead agree after every mutation', () => {
        const { state, applier } = setup();
        for (const amount of [30, 30, 30, 30, 30]) {
            applier.apply(amount, hit, dir, null);
            expect(state.isDead).toBe(state.health <= 0);
        }
    });

    describe('local damage interception', () => {
        test('damage dealt straight to the attribute is applied once through the applier', () => {
            const { state, applier } = setup();

            state.healthAttribute.damage(15, hit, dir, 'trap');

            expect(state.health).toBe(85);
            expect(applier.isApplying).toBe(false);
        });

        test('a lethal local hit still goes through the single death path', () => {
            const { state, onDeath } = setup();

            state.healthAttribute.damage(150, hit, dir, 'fall');

            expect(state.health).toBe(0);
            expect(state.isDead).toBe(true);
            expect(onDeath).toHaveBeenCalledTimes(1);
        });

        test('a local hit is dispatched once and health changes once', () => {
            const { state } = setup();
            const hitReactions = vi.fn();
            const changes: number[] = [];
            state.healthAttribute.onDamage(hitReactions);
            state.healthAttribute.onChange(value => changes.push(value));

            state.healthAttribute.damage(15, hit, dir, 'trap');

            expect(state.health).toBe(85);
            expect(hitReactions).toHaveBeenCalledTimes(1);
            expect(changes).toEqual([85]);
        });

        test('a lethal local hit reaches listeners once', () => {
            const { state, onDeath } = setup();
            const hitReactions = vi.fn();
            state.healthAttribute.onDamage(hitReactions);

            state.healthAttribute.damage(150, hit, dir, 'fall');

            expect(hitReactions).toHaveBeenCalledTimes(1);
            expect(onDeath).toHaveBeenCalledTimes(1);
        });

        test('detach stops interception', () => {
            const { state, onDeath, applier } = setup();
            applier.detach();

            state.healthAttribute.damage(100, hit, dir);

            expect(state.health).toBe(0);
            expect(state.isDead).toBe(false);
            expect(onDeath).not.toHaveBeenCalled();
        });
    });
});
