/**
 * Snapshot Stream
 *
 * An untagged, ordered value stream shared by every observer of one entity's
 * channel. Values carry no type or length markers: a reader only stays
 * aligned if it reads exactly what the writer wrote, in the same order.
 *
 * Layout (little-endian): f32 for scalars, 3 x f32 for Vec3, 4 x f32 for
 * Quat, u8 for booleans.
 */

import type { Vec3, Quat } from '../math';

const INITIAL_CAPACITY = 64;

export class SnapshotStream {
    private bytes: Uint8Array;
    private view: DataView;
    private offset: number = 0;
    private readonly length: number;

    private constructor(readonly isWriting: boolean, bytes: Uint8Array) {
        this.bytes = bytes;
        this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
        this.length = isWriting ? 0 : bytes.byteLength;
    }

    static forWriting(capacity: number = INITIAL_CAPACITY): SnapshotStream {
        return new SnapshotStream(true, new Uint8Array(Math.max(1, capacity)));
    }

    static forReading(bytes: Uint8Array): SnapshotStream {
        return new SnapshotStream(false, bytes);
    }

    get isReading(): boolean {
        return !this.isWriting;
    }

    /** Bytes written (writing) or consumed (reading) so far */
    get byteOffset(): number {
        return this.offset;
    }

    /** Unread bytes left (reading only) */
    get remaining(): number {
        return this.isWriting ? 0 : this.length - this.offset;
    }

    // ==========================================
    // Writing
    // ==========================================

    writeFloat(value: number): void {
        this.reserve(4);
        this.view.setFloat32(this.offset, value, true);
        this.offset += 4;
    }

    writeBool(value: boolean): void {
        this.reserve(1);
        this.view.setUint8(this.offset, value ? 1 : 0);
        this.offset += 1;
    }

    writeVec3(v: Vec3): void {
        this.writeFloat(v.x);
        this.writeFloat(v.y);
        this.writeFloat(v.z);
    }

    writeQuat(q: Quat): void {
        this.writeFloat(q.x);
        this.writeFloat(q.y);
        this.writeFloat(q.z);
        this.writeFloat(q.w);
    }

    /**
     * Copy of everything written so far.
     */
    toBytes(): Uint8Array {
        if (!this.isWriting) {
            throw new Error('toBytes() called on a reading stream');
        }
        return this.bytes.slice(0, this.offset);
    }

    // ==========================================
    // Reading
    // ==========================================

    readFloat(): number {
        this.consume(4);
        const value = this.view.getFloat32(this.offset, true);
        this.offset += 4;
        return value;
    }

    readBool(): boolean {
        this.consume(1);
        const value = this.view.getUint8(this.offset) !== 0;
        this.offset += 1;
        return value;
    }

    readVec3(): Vec3 {
        const x = this.readFloat();
        const y = this.readFloat();
        const z = this.readFloat();
        return { x, y, z };
    }

    readQuat(): Quat {
        const x = this.readFloat();
        const y = this.readFloat();
        const z = this.readFloat();
        const w = this.readFloat();
        return { x, y, z, w };
    }

    // ==========================================
    // Internals
    // ==========================================

    private reserve(byteCount: number): void {
        if (!this.isWriting) {
            throw new Error('Cannot write to a snapshot stream opened for reading');
        }
        const needed = this.offset + byteCount;
        if (needed <= this.bytes.byteLength) return;

        let capacity = this.bytes.byteLength * 2;
        while (capacity < needed) capacity *= 2;

        const grown = new Uint8Array(capacity);
        grown.set(this.bytes.subarray(0, this.offset));
        this.bytes = grown;
        this.view = new DataView(grown.buffer);
    }

    private consume(byteCount: number): void {
        if (this.isWriting) {
            throw new Error('Cannot read from a snapshot stream opened for writing');
        }
        if (this.offset + byteCount > this.length) {
            throw new Error(
                `Snapshot stream underflow: need ${byteCount} byte(s) at offset ${this.offset}, ` +
                `stream has ${this.length}`
            );
        }
    }
}
