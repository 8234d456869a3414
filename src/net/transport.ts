/**
 * Transport contract
 *
 * What the replication layer needs from the network: a role query, a
 * best-effort send to everyone else or to the authority, and push delivery.
 * Delivery order and reliability are whatever the implementation gives.
 */

import type { EntityId } from '../core/entity-id';
import type { SessionInfo } from '../sync/role';

export type MessageKind = 'snapshot' | 'command' | 'spawn' | 'teardown';

export interface NetMessage {
    kind: MessageKind;
    entityId: EntityId;
    payload: Uint8Array;
}

/** 'others': every participant but the sender. 'authority': the session authority only. */
export type SendTarget = 'others' | 'authority';

export interface Delivery {
    /** Participant id of the sender */
    from: string;
    message: NetMessage;
}

export type MessageHandler = (delivery: Delivery) => void;

export interface Transport {
    readonly localId: string;

    /** Current session role information */
    session(): SessionInfo;

    /** Fire-and-forget; never blocks and never reports delivery */
    send(message: NetMessage, target: SendTarget): void;

    /**
     * @returns Function to remove the handler
     */
    onMessage(handler: MessageHandler): () => void;
}
