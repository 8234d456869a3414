import { describe, test, expect, vi } from 'vitest';
import { DeathEdgeDispatcher } from './death-edge';

function replay(dispatcher: DeathEdgeDispatcher, sequence: boolean[]): number[] {
    const firedAt: number[] = [];
    let previous = false;
    sequence.forEach((isDead, index) => {
        if (dispatcher.onSnapshotApplied(previous, isDead)) firedAt.push(index);
        previous = isDead;
    });
    return firedAt;
}

describe('DeathEdgeDispatcher', () => {
    test('[alive, alive, dead, dead, dead] fires once, at index 2', () => {
        const onDeath = vi.fn();
        const dispatcher = new DeathEdgeDispatcher(onDeath);

        expect(replay(dispatcher, [false, false, true, true, true])).toEqual([2]);
        expect(onDeath).toHaveBeenCalledTimes(1);
        expect(dispatcher.hasFired).toBe(true);
    });

    test('fires when the first snapshot seen is already dead', () => {
        const onDeath = vi.fn();
        const dispatcher = new DeathEdgeDispatcher(onDeath);

        expect(dispatcher.onSnapshotApplied(false, true)).toBe(true);
        expect(onDeath).toHaveBeenCalledTimes(1);
    });

    test('does not fire again even if the flag flickers', () => {
        const onDeath = vi.fn();
        const dispatcher = new DeathEdgeDispatcher(onDeath);

        replay(dispatcher, [false, true, false, true]);
        expect(onDeath).toHaveBeenCalledTimes(1);
    });

    test('reset re-arms for pooled reuse', () => {
        const onDeath = vi.fn();
        const dispatcher = new DeathEdgeDispatcher(onDeath);

        replay(dispatcher, [false, true]);
        dispatcher.reset();
        replay(dispatcher, [false, true]);

        expect(onDeath).toHaveBeenCalledTimes(2);
    });
});
