/**
 * Snapshot Channel
 *
 * Per-entity list of observers that write (authority) or read (replica) the
 * entity's snapshot stream, in registration order, once per network tick.
 *
 * The stream is untagged, so every participant must run exactly the same
 * observers in the same order or every later field decodes as garbage. The
 * entity's sync component therefore claims the channel exclusively, on every
 * participant, and claims it again later in its lifecycle to catch observers
 * that registered in between.
 */

import type { EntityId } from '../core/entity-id';
import { SnapshotStream } from './snapshot-stream';
import { SNAPSHOT_BYTE_LENGTH } from './snapshot';

export interface StreamObserver {
    readonly observerId: string;
    /** Write when stream.isWriting, read otherwise */
    serializeView(stream: SnapshotStream): void;
}

export class SnapshotChannel {
    private _observers: StreamObserver[] = [];

    constructor(
        readonly entityId: EntityId,
        private readonly debug: boolean = false
    ) {}

    get observers(): readonly StreamObserver[] {
        return this._observers;
    }

    /**
     * Add an observer. Registering the same observer twice is a no-op.
     */
    register(observer: StreamObserver): void {
        if (this._observers.includes(observer)) return;
        this._observers.push(observer);
    }

    unregister(observer: StreamObserver): boolean {
        const index = this._observers.indexOf(observer);
        if (index === -1) return false;
        this._observers.splice(index, 1);
        return true;
    }

    /**
     * Strip every observer except `owner`, registering `owner` if missing.
     *
     * @returns ids of the observers that were removed
     */
    claimExclusive(owner: StreamObserver): string[] {
        const removed: string[] = [];
        for (let i = this._observers.length - 1; i >= 0; i--) {
            const observer = this._observers[i];
            if (observer === owner) continue;
            this._observers.splice(i, 1);
            removed.unshift(observer.observerId);
        }

        if (!this._observers.includes(owner)) {
            this._observers.push(owner);
        }

        for (const id of removed) {
            console.warn(`[SnapshotChannel] Removed observer '${id}' from entity ${this.entityId}`);
        }
        if (this.debug) {
            const list = this._observers.map(o => o.observerId).join(', ');
            console.log(`[SnapshotChannel] Observers for entity ${this.entityId}: [${list}]`);
        }

        return removed;
    }

    isExclusive(owner: StreamObserver): boolean {
        return this._observers.length === 1 && this._observers[0] === owner;
    }

    /**
     * Run every observer in writing mode and return the stream bytes.
     */
    write(): Uint8Array {
        const stream = SnapshotStream.forWriting(SNAPSHOT_BYTE_LENGTH);
        for (const observer of this._observers) {
            observer.serializeView(stream);
        }
        return stream.toBytes();
    }

    /**
     * Run every observer in reading mode over the received bytes.
     */
    read(bytes: Uint8Array): void {
        const stream = SnapshotStream.forReading(bytes);
        for (const observer of this._observers) {
            observer.serializeView(stream);
        }
    }
}
