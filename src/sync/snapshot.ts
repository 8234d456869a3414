/**
 * Snapshot
 *
 * One authoritative state sample. The tuple is always written and read as
 * (position, rotation, health, isDead), in that order.
 */

import { Vec3, Quat, vec3Clone, vec3IsFinite, quatClone, quatIsFinite } from '../math';
import { SnapshotStream } from './snapshot-stream';

export interface Snapshot {
    readonly position: Vec3;
    readonly rotation: Quat;
    readonly health: number;
    readonly isDead: boolean;
}

/** position (12) + rotation (16) + health (4) + isDead (1) */
export const SNAPSHOT_BYTE_LENGTH = 33;

export function createSnapshot(position: Vec3, rotation: Quat, health: number, isDead: boolean): Snapshot {
    return Object.freeze({
        position: vec3Clone(position),
        rotation: quatClone(rotation),
        health,
        isDead
    });
}

export function writeSnapshot(stream: SnapshotStream, snapshot: Snapshot): void {
    stream.writeVec3(snapshot.position);
    stream.writeQuat(snapshot.rotation);
    stream.writeFloat(snapshot.health);
    stream.writeBool(snapshot.isDead);
}

export function readSnapshot(stream: SnapshotStream): Snapshot {
    const position = stream.readVec3();
    const rotation = stream.readQuat();
    const health = stream.readFloat();
    const isDead = stream.readBool();
    if (!vec3IsFinite(position) || !quatIsFinite(rotation) || !Number.isFinite(health)) {
        throw new Error('Snapshot contains a non-finite value');
    }
    return Object.freeze({ position, rotation, health, isDead });
}

export function encodeSnapshot(snapshot: Snapshot): Uint8Array {
    const stream = SnapshotStream.forWriting(SNAPSHOT_BYTE_LENGTH);
    writeSnapshot(stream, snapshot);
    return stream.toBytes();
}

export function decodeSnapshot(bytes: Uint8Array): Snapshot {
    return readSnapshot(SnapshotStream.forReading(bytes));
}
