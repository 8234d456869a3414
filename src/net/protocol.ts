/**
 * Wire protocol
 *
 * Binary frames (little-endian):
 *   frame      [type u8][entityId u32][payload...]
 *   outbound   [route u8][frame...]                       client -> relay
 *   relayed    [senderLen u16][sender utf8][frame...]     relay -> client
 *
 * Room control travels as JSON text frames (JOIN_ROOM, ROOM_STATE).
 */

import type { EntityId } from '../core/entity-id';
import { Transform, Vec3, Quat, vec3IsFinite, quatIsFinite } from '../math';
import type { MessageKind, NetMessage, SendTarget } from './transport';

// ============================================
// Message types
// ============================================

export const MSG_SNAPSHOT = 0x10;
export const MSG_COMMAND = 0x11;
export const MSG_SPAWN = 0x12;
export const MSG_TEARDOWN = 0x13;

const KIND_TO_TYPE: Record<MessageKind, number> = {
    snapshot: MSG_SNAPSHOT,
    command: MSG_COMMAND,
    spawn: MSG_SPAWN,
    teardown: MSG_TEARDOWN
};

function kindFromType(type: number): MessageKind {
    switch (type) {
        case MSG_SNAPSHOT: return 'snapshot';
        case MSG_COMMAND: return 'command';
        case MSG_SPAWN: return 'spawn';
        case MSG_TEARDOWN: return 'teardown';
        default:
            throw new Error(`Unknown message type: 0x${type.toString(16)}`);
    }
}

const ROUTE_OTHERS = 0;
const ROUTE_AUTHORITY = 1;

const FRAME_HEADER_BYTES = 5;

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

// ============================================
// Frames
// ============================================

export function encodeFrame(message: NetMessage): Uint8Array {
    const bytes = new Uint8Array(FRAME_HEADER_BYTES + message.payload.length);
    const view = new DataView(bytes.buffer);
    view.setUint8(0, KIND_TO_TYPE[message.kind]);
    view.setUint32(1, message.entityId, true);
    bytes.set(message.payload, FRAME_HEADER_BYTES);
    return bytes;
}

export function decodeFrame(bytes: Uint8Array): NetMessage {
    if (bytes.byteLength < FRAME_HEADER_BYTES) {
        throw new Error(`Frame too short: ${bytes.byteLength} byte(s)`);
    }
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    return {
        kind: kindFromType(view.getUint8(0)),
        entityId: view.getUint32(1, true),
        payload: bytes.slice(FRAME_HEADER_BYTES)
    };
}

export function encodeOutbound(message: NetMessage, target: SendTarget): Uint8Array {
    const frame = encodeFrame(message);
    const bytes = new Uint8Array(1 + frame.length);
    bytes[0] = target === 'authority' ? ROUTE_AUTHORITY : ROUTE_OTHERS;
    bytes.set(frame, 1);
    return bytes;
}

export interface OutboundFrame {
    target: SendTarget;
    /** The frame without its route byte, ready to relay */
    frame: Uint8Array;
}

export function decodeOutbound(bytes: Uint8Array): OutboundFrame {
    if (bytes.byteLength < 1 + FRAME_HEADER_BYTES) {
        throw new Error(`Outbound frame too short: ${bytes.byteLength} byte(s)`);
    }
    const route = bytes[0];
    if (route !== ROUTE_OTHERS && route !== ROUTE_AUTHORITY) {
        throw new Error(`Unknown route: ${route}`);
    }
    return {
        target: route === ROUTE_AUTHORITY ? 'authority' : 'others',
        frame: bytes.subarray(1)
    };
}

export function encodeRelayed(senderId: string, frame: Uint8Array): Uint8Array {
    const sender = textEncoder.encode(senderId);
    if (sender.length > 0xffff) {
        throw new Error(`Sender id too long (${sender.length} bytes)`);
    }
    const bytes = new Uint8Array(2 + sender.length + frame.length);
    new DataView(bytes.buffer).setUint16(0, sender.length, true);
    bytes.set(sender, 2);
    bytes.set(frame, 2 + sender.length);
    return bytes;
}

export interface RelayedFrame {
    from: string;
    message: NetMessage;
}

export function decodeRelayed(bytes: Uint8Array): RelayedFrame {
    if (bytes.byteLength < 2) {
        throw new Error(`Relayed frame too short: ${bytes.byteLength} byte(s)`);
    }
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    const senderLen = view.getUint16(0, true);
    if (2 + senderLen > bytes.byteLength) {
        throw new Error(`Relayed frame sender truncated: need ${senderLen} byte(s)`);
    }
    return {
        from: textDecoder.decode(bytes.subarray(2, 2 + senderLen)),
        message: decodeFrame(bytes.subarray(2 + senderLen))
    };
}

// ============================================
// Spawn announcement payload
// ============================================

export interface SpawnAnnouncement {
    kind: string;
    transform: Transform;
}

/** [kindLen u16][kind utf8][position 3 x f32][rotation 4 x f32] */
export function encodeSpawn(announcement: SpawnAnnouncement): Uint8Array {
    const kind = textEncoder.encode(announcement.kind);
    const bytes = new Uint8Array(2 + kind.length + 28);
    const view = new DataView(bytes.buffer);
    view.setUint16(0, kind.length, true);
    bytes.set(kind, 2);

    const { position: p, rotation: r } = announcement.transform;
    let offset = 2 + kind.length;
    for (const value of [p.x, p.y, p.z, r.x, r.y, r.z, r.w]) {
        view.setFloat32(offset, value, true);
        offset += 4;
    }
    return bytes;
}

export function decodeSpawn(bytes: Uint8Array): SpawnAnnouncement {
    if (bytes.byteLength < 2) {
        throw new Error(`Spawn payload too short: ${bytes.byteLength} byte(s)`);
    }
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    const kindLen = view.getUint16(0, true);
    if (bytes.byteLength < 2 + kindLen + 28) {
        throw new Error(`Spawn payload too short: ${bytes.byteLength} byte(s)`);
    }

    const kind = textDecoder.decode(bytes.subarray(2, 2 + kindLen));
    let offset = 2 + kindLen;
    const next = (): number => {
        const value = view.getFloat32(offset, true);
        offset += 4;
        return value;
    };
    const position: Vec3 = { x: next(), y: next(), z: next() };
    const rotation: Quat = { x: next(), y: next(), z: next(), w: next() };

    if (!vec3IsFinite(position) || !quatIsFinite(rotation)) {
        throw new Error('Spawn payload contains a non-finite value');
    }
    return { kind, transform: { position, rotation } };
}

// ============================================
// JSON control
// ============================================

export interface JoinRoomMessage {
    type: 'JOIN_ROOM';
    payload: { roomId: string; participantId: string };
}

export interface RoomStateMessage {
    type: 'ROOM_STATE';
    payload: {
        roomId: string;
        /** The receiving participant */
        participantId: string;
        authorityId: string | null;
        members: string[];
    };
}

export type ControlMessage = JoinRoomMessage | RoomStateMessage;

export function encodeControl(message: ControlMessage): string {
    return JSON.stringify(message);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(v => typeof v === 'string');
}

export function decodeControl(text: string): ControlMessage {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (error) {
        throw new Error(`Control frame is not JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
    if (!isRecord(parsed)) {
        throw new Error('Control frame must be an object');
    }
    const payload = parsed.payload;
    if (!isRecord(payload)) {
        throw new Error('Control frame must carry a payload object');
    }

    if (parsed.type === 'JOIN_ROOM') {
        if (typeof payload.roomId !== 'string' || typeof payload.participantId !== 'string') {
            throw new Error('JOIN_ROOM needs string roomId and participantId');
        }
        return { type: 'JOIN_ROOM', payload: { roomId: payload.roomId, participantId: payload.participantId } };
    }

    if (parsed.type === 'ROOM_STATE') {
        const authorityId = payload.authorityId;
        if (
            typeof payload.roomId !== 'string' ||
            typeof payload.participantId !== 'string' ||
            !(authorityId === null || typeof authorityId === 'string') ||
            !isStringArray(payload.members)
        ) {
            throw new Error('Malformed ROOM_STATE payload');
        }
        return {
            type: 'ROOM_STATE',
            payload: {
                roomId: payload.roomId,
                participantId: payload.participantId,
                authorityId,
                members: payload.members
            }
        };
    }

    throw new Error(`Unknown control type: ${String(parsed.type)}`);
}
