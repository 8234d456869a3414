/**
 * Loopback Transport
 *
 * In-process session for tests and same-process participants. Sends are
 * queued and only delivered on flush(), so callers decide when the network
 * "arrives" and can drop traffic with discardPending().
 */

import type { SessionInfo } from '../sync/role';
import type { Delivery, MessageHandler, NetMessage, SendTarget, Transport } from './transport';

interface QueuedSend {
    from: string;
    target: SendTarget;
    message: NetMessage;
}

export class LoopbackHub {
    private participants: Map<string, LoopbackTransport> = new Map();
    private queue: QueuedSend[] = [];
    private _authorityId: string | null = null;
    private authorityAssigned: boolean = false;

    /** The first participant to join; null once it has left */
    get authorityId(): string | null {
        return this._authorityId;
    }

    get pendingCount(): number {
        return this.queue.length;
    }

    join(participantId: string): LoopbackTransport {
        if (this.participants.has(participantId)) {
            throw new Error(`Participant '${participantId}' already joined`);
        }
        const transport = new LoopbackTransport(this, participantId);
        this.participants.set(participantId, transport);

        if (!this.authorityAssigned) {
            this.authorityAssigned = true;
            this._authorityId = participantId;
        }
        return transport;
    }

    leave(participantId: string): boolean {
        const removed = this.participants.delete(participantId);
        if (removed && participantId === this._authorityId) {
            this._authorityId = null;
        }
        return removed;
    }

    isJoined(participantId: string): boolean {
        return this.participants.has(participantId);
    }

    /**
     * Deliver every message queued before this call, in send order.
     * Messages sent while delivering wait for the next flush.
     *
     * @returns Number of deliveries made
     */
    flush(): number {
        const batch = this.queue;
        this.queue = [];

        let delivered = 0;
        for (const item of batch) {
            for (const recipient of this.recipients(item)) {
                recipient._deliver({ from: item.from, message: item.message });
                delivered++;
            }
        }
        return delivered;
    }

    /**
     * Drop everything queued (models loss).
     *
     * @returns Number of messages dropped
     */
    discardPending(): number {
        const count = this.queue.length;
        this.queue = [];
        return count;
    }

    /** @internal */
    _enqueue(from: string, message: NetMessage, target: SendTarget): void {
        if (!this.participants.has(from)) return;
        this.queue.push({
            from,
            target,
            message: { kind: message.kind, entityId: message.entityId, payload: message.payload.slice() }
        });
    }

    private recipients(item: QueuedSend): LoopbackTransport[] {
        if (item.target === 'authority') {
            const authority = this._authorityId === null ? undefined : this.participants.get(this._authorityId);
            return authority ? [authority] : [];
        }
        return [...this.participants.values()].filter(p => p.localId !== item.from);
    }
}

export class LoopbackTransport implements Transport {
    private handlers: Set<MessageHandler> = new Set();

    constructor(
        private readonly hub: LoopbackHub,
        readonly localId: string
    ) {}

    session(): SessionInfo {
        const connected = this.hub.isJoined(this.localId);
        return {
            connected,
            localParticipantId: connected ? this.localId : null,
            authorityParticipantId: connected ? this.hub.authorityId : null
        };
    }

    send(message: NetMessage, target: SendTarget): void {
        this.hub._enqueue(this.localId, message, target);
    }

    onMessage(handler: MessageHandler): () => void {
        this.handlers.add(handler);
        return () => this.handlers.delete(handler);
    }

    leave(): void {
        this.hub.leave(this.localId);
    }

    /** @internal */
    _deliver(delivery: Delivery): void {
        for (const handler of [...this.handlers]) {
            handler(delivery);
        }
    }
}
