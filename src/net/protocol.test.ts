import { describe, test, expect } from 'vitest';
import { quatIdentity, quatFromEulerY, vec3 } from '../math';
import {
    MSG_SNAPSHOT,
    MSG_TEARDOWN,
    decodeControl,
    decodeFrame,
    decodeOutbound,
    decodeRelayed,
    decodeSpawn,
    encodeControl,
    encodeFrame,
    encodeOutbound,
    encodeRelayed,
    encodeSpawn
} from './protocol';
import type { NetMessage } from './transport';

const message: NetMessage = { kind: 'snapshot', entityId: 258, payload: new Uint8Array([7, 8, 9]) };

describe('frames', () => {
    test('header is type then little-endian entity id', () => {
        const bytes = encodeFrame(message);
        expect([...bytes]).toEqual([MSG_SNAPSHOT, 2, 1, 0, 0, 7, 8, 9]);
        expect(decodeFrame(bytes)).toEqual(message);
    });

    test('a teardown frame is header only', () => {
        const bytes = encodeFrame({ kind: 'teardown', entityId: 3, payload: new Uint8Array(0) });
        expect([...bytes]).toEqual([MSG_TEARDOWN, 3, 0, 0, 0]);
    });

    test('rejects short frames and unknown types', () => {
        expect(() => decodeFrame(new Uint8Array(4))).toThrow('Frame too short: 4 byte(s)');
        expect(() => decodeFrame(new Uint8Array([0x42, 0, 0, 0, 0]))).toThrow('Unknown message type: 0x42');
    });

    test('outbound frames carry the route', () => {
        const toAuthority = encodeOutbound(message, 'authority');
        expect(toAuthority[0]).toBe(1);
        const decoded = decodeOutbound(toAuthority);
        expect(decoded.target).toBe('authority');
        expect(decodeFrame(decoded.frame)).toEqual(message);

        expect(decodeOutbound(encodeOutbound(message, 'others')).target).toBe('others');
    });

    test('rejects an unknown route', () => {
        const bytes = encodeOutbound(message, 'others');
        bytes[0] = 9;
        expect(() => decodeOutbound(bytes)).toThrow('Unknown route: 9');
    });

    test('relayed frames name their sender', () => {
        const relayed = encodeRelayed('host', encodeFrame(message));
        expect([...relayed.subarray(0, 2)]).toEqual([4, 0]);
        expect(decodeRelayed(relayed)).toEqual({ from: 'host', message });
    });

    test('rejects a relayed frame with a truncated sender', () => {
        const relayed = encodeRelayed('host', encodeFrame(message));
        expect(() => decodeRelayed(relayed.subarray(0, 4))).toThrow('Relayed frame sender truncated: need 4 byte(s)');
    });
});

describe('spawn payload', () => {
    test('carries kind and transform', () => {
        const transform = { position: vec3(10, 0, 4), rotation: quatFromEulerY(0) };
        const bytes = encodeSpawn({ kind: 'grunt', transform });
        expect(bytes.byteLength).toBe(2 + 5 + 28);
        expect(decodeSpawn(bytes)).toEqual({ kind: 'grunt', transform });
    });

    test('rejects a truncated payload', () => {
        const bytes = encodeSpawn({ kind: 'grunt', transform: { position: vec3(0, 0, 0), rotation: quatIdentity() } });
        expect(() => decodeSpawn(bytes.subarray(0, 20))).toThrow('Spawn payload too short: 20 byte(s)');
    });

    test('rejects non-finite values', () => {
        const bytes = encodeSpawn({
            kind: 'grunt',
            transform: { position: vec3(Number.POSITIVE_INFINITY, 0, 0), rotation: quatFromEulerY(0) }
        });
        expect(() => decodeSpawn(bytes)).toThrow('Spawn payload contains a non-finite value');
    });
});

describe('control messages', () => {
    test('JOIN_ROOM survives encoding', () => {
        const join = { type: 'JOIN_ROOM', payload: { roomId: 'arena', participantId: 'peer' } } as const;
        expect(decodeControl(encodeControl(join))).toEqual(join);
    });

    test('ROOM_STATE accepts a null authority', () => {
        const text = '{"type":"ROOM_STATE","payload":{"roomId":"arena","participantId":"peer","authorityId":null,"members":["peer"]}}';
        expect(decodeControl(text)).toEqual({
            type: 'ROOM_STATE',
            payload: { roomId: 'arena', participantId: 'peer', authorityId: null, members: ['peer'] }
        });
    });

    test('rejects malformed control frames', () => {
        expect(() => decodeControl('[]')).toThrow('Control frame must be an object');
        expect(() => decodeControl('{"type":"JOIN_ROOM"}')).toThrow('Control frame must carry a payload object');
        expect(() => decodeControl('{"type":"JOIN_ROOM","payload":{"roomId":1}}'))
            .toThrow('JOIN_ROOM needs string roomId and participantId');
        expect(() => decodeControl('{"type":"PING","payload":{}}')).toThrow('Unknown control type: PING');
        expect(() => decodeControl('not json')).toThrow(/^Control frame is not JSON/);
    });
});
