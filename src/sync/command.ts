/**
 * Command Forwarder
 *
 * State-changing requests (damage) travel out-of-band to the authority; the
 * resulting state only ever comes back through the snapshot channel.
 *
 * Command wire layout (little-endian):
 *   f32 amount | 3 x f32 position | 3 x f32 direction | u16 senderLen | utf8 senderId
 */

import { Vec3, vec3Clone, vec3Normalize, vec3IsFinite } from '../math';
import type { Role } from './role';
import type { MutationResult } from './mutation';

export interface CommandRequest {
    amount: number;
    position: Vec3;
    direction: Vec3;
    senderId: string;
}

const COMMAND_FIXED_BYTES = 4 + 12 + 12 + 2;
const MAX_SENDER_BYTES = 0xffff;

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

export function encodeCommand(request: CommandRequest): Uint8Array {
    const sender = textEncoder.encode(request.senderId);
    if (sender.length > MAX_SENDER_BYTES) {
        throw new Error(`Command senderId too long (${sender.length} bytes)`);
    }

    const bytes = new Uint8Array(COMMAND_FIXED_BYTES + sender.length);
    const view = new DataView(bytes.buffer);
    let offset = 0;

    view.setFloat32(offset, request.amount, true); offset += 4;
    for (const v of [request.position, request.direction]) {
        view.setFloat32(offset, v.x, true); offset += 4;
        view.setFloat32(offset, v.y, true); offset += 4;
        view.setFloat32(offset, v.z, true); offset += 4;
    }
    view.setUint16(offset, sender.length, true); offset += 2;
    bytes.set(sender, offset);

    return bytes;
}

export function decodeCommand(bytes: Uint8Array): CommandRequest {
    if (bytes.byteLength < COMMAND_FIXED_BYTES) {
        throw new Error(`Command payload too short: ${bytes.byteLength} byte(s)`);
    }

    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    let offset = 0;
    const readVec3 = (): Vec3 => {
        const x = view.getFloat32(offset, true);
        const y = view.getFloat32(offset + 4, true);
        const z = view.getFloat32(offset + 8, true);
        offset += 12;
        return { x, y, z };
    };

    const amount = view.getFloat32(offset, true); offset += 4;
    const position = readVec3();
    const direction = readVec3();
    const senderLen = view.getUint16(offset, true); offset += 2;

    if (offset + senderLen > bytes.byteLength) {
        throw new Error(`Command senderId truncated: need ${senderLen} byte(s), have ${bytes.byteLength - offset}`);
    }
    if (!Number.isFinite(amount) || !vec3IsFinite(position) || !vec3IsFinite(direction)) {
        throw new Error('Command payload contains a non-finite value');
    }

    const senderId = textDecoder.decode(bytes.subarray(offset, offset + senderLen));
    return { amount, position, direction, senderId };
}

// ============================================
// Forwarder
// ============================================

export type ForwardOutcome =
    /** Applied on this participant (authority) */
    | 'applied'
    /** Sent to the authority; the effect arrives later in a snapshot */
    | 'forwarded'
    /** Dropped: entity known dead or amount invalid */
    | 'ignored';

export interface ForwarderDeps {
    role: Role;
    localId: string;
    /** Authority: apply on the ground truth */
    applyLocally(amount: number, position: Vec3, direction: Vec3, attacker: string | null): MutationResult;
    /** Replica: fire-and-forget send addressed to the authority */
    sendToAuthority(payload: Uint8Array): void;
    /** Replica: death flag as last seen in a snapshot */
    knownDead(): boolean;
}

export class CommandForwarder {
    constructor(private readonly deps: ForwarderDeps) {}

    requestMutation(amount: number, position: Vec3, direction: Vec3, attacker: string | null = null): ForwardOutcome {
        if (!Number.isFinite(amount) || amount < 0) return 'ignored';
        if (this.deps.knownDead()) return 'ignored';

        if (this.deps.role === 'authority') {
            const result = this.deps.applyLocally(amount, position, vec3Normalize(direction), attacker);
            return result.outcome === 'applied' || result.outcome === 'killed' ? 'applied' : 'ignored';
        }

        this.deps.sendToAuthority(encodeCommand({
            amount,
            position: vec3Clone(position),
            direction: vec3Normalize(direction),
            senderId: this.deps.localId
        }));
        return 'forwarded';
    }
}
