/**
 * WebSocket Transport
 *
 * Client side of the relay. Joins one room, learns the room's authority from
 * ROOM_STATE, and exchanges binary frames. Sends before the socket is open
 * are dropped: the layer above tolerates loss.
 */

import WebSocket from 'ws';
import type { RawData } from 'ws';
import type { SessionInfo } from '../sync/role';
import {
    decodeControl,
    decodeRelayed,
    encodeControl,
    encodeOutbound
} from './protocol';
import type { ControlMessage, RelayedFrame } from './protocol';
import type { MessageHandler, NetMessage, SendTarget, Transport } from './transport';
import { fromRawData } from './ws-data';

/** Callbacks a client socket reports into */
export interface ClientSocketEvents {
    onOpen(): void;
    onMessage(data: string | Uint8Array): void;
    onClose(): void;
    onError(error: Error): void;
}

export interface ClientSocket {
    readonly isOpen: boolean;
    send(data: string | Uint8Array): void;
    close(): void;
}

export type ClientSocketFactory = (url: string, events: ClientSocketEvents) => ClientSocket;

/**
 * Default factory: a real `ws` client.
 */
export const wsSocketFactory: ClientSocketFactory = (url, events) => {
    const ws = new WebSocket(url);
    ws.on('open', () => events.onOpen());
    ws.on('message', (data: RawData, isBinary: boolean) => events.onMessage(fromRawData(data, isBinary)));
    ws.on('close', () => events.onClose());
    ws.on('error', (error: Error) => events.onError(error));

    return {
        get isOpen() {
            return ws.readyState === WebSocket.OPEN;
        },
        send: data => ws.send(data),
        close: () => ws.close()
    };
};

export interface WsTransportOptions {
    url: string;
    roomId: string;
    participantId: string;
    debug?: boolean;
}

interface RoomView {
    authorityId: string | null;
    members: string[];
}

export class WsTransport implements Transport {
    readonly localId: string;
    private socket: ClientSocket | null = null;
    private room: RoomView | null = null;
    private handlers: Set<MessageHandler> = new Set();
    private debug: boolean;

    private pendingJoin: { resolve: (session: SessionInfo) => void; reject: (error: Error) => void } | null = null;

    constructor(
        private readonly options: WsTransportOptions,
        private readonly createSocket: ClientSocketFactory = wsSocketFactory
    ) {
        this.localId = options.participantId;
        this.debug = options.debug ?? false;
    }

    get members(): readonly string[] {
        return this.room ? this.room.members : [];
    }

    /**
     * Open the socket and join the room.
     *
     * @returns Session info from the first ROOM_STATE
     */
    connect(): Promise<SessionInfo> {
        if (this.socket) {
            return Promise.reject(new Error('WsTransport already connected'));
        }

        return new Promise<SessionInfo>((resolve, reject) => {
            this.pendingJoin = { resolve, reject };
            this.socket = this.createSocket(this.options.url, {
                onOpen: () => this.handleOpen(),
                onMessage: data => this.handleMessage(data),
                onClose: () => this.handleClose(),
                onError: error => this.handleError(error)
            });
        });
    }

    session(): SessionInfo {
        if (!this.room) {
            return { connected: false, localParticipantId: null, authorityParticipantId: null };
        }
        return {
            connected: true,
            localParticipantId: this.localId,
            authorityParticipantId: this.room.authorityId
        };
    }

    send(message: NetMessage, target: SendTarget): void {
        if (!this.socket || !this.socket.isOpen || !this.room) {
            if (this.debug) {
                console.log(`[WsTransport] Not in a room, dropped ${message.kind} for entity ${message.entityId}`);
            }
            return;
        }
        this.socket.send(encodeOutbound(message, target));
    }

    onMessage(handler: MessageHandler): () => void {
        this.handlers.add(handler);
        return () => this.handlers.delete(handler);
    }

    close(): void {
        this.socket?.close();
    }

    private handleOpen(): void {
        this.socket?.send(encodeControl({
            type: 'JOIN_ROOM',
            payload: { roomId: this.options.roomId, participantId: this.localId }
        }));
    }

    private handleMessage(data: string | Uint8Array): void {
        if (typeof data === 'string') {
            this.handleControl(data);
            return;
        }

        let relayed: RelayedFrame;
        try {
            relayed = decodeRelayed(data);
        } catch (error) {
            console.warn('[WsTransport] Dropped malformed frame:', error instanceof Error ? error.message : error);
            return;
        }
        for (const handler of [...this.handlers]) {
            handler(relayed);
        }
    }

    private handleControl(text: string): void {
        let control: ControlMessage;
        try {
            control = decodeControl(text);
        } catch (error) {
            console.warn('[WsTransport] Dropped malformed control frame:', error instanceof Error ? error.message : error);
            return;
        }
        if (control.type !== 'ROOM_STATE') return;

        this.room = { authorityId: control.payload.authorityId, members: control.payload.members };
        if (this.debug) {
            console.log(`[WsTransport] Room ${control.payload.roomId}: authority=${control.payload.authorityId ?? 'none'}, members=${control.payload.members.length}`);
        }

        if (this.pendingJoin) {
            const { resolve } = this.pendingJoin;
            this.pendingJoin = null;
            resolve(this.session());
        }
    }

    private handleClose(): void {
        this.room = null;
        this.socket = null;
        if (this.pendingJoin) {
            const { reject } = this.pendingJoin;
            this.pendingJoin = null;
            reject(new Error('Socket closed before joining the room'));
        }
    }

    private handleError(error: Error): void {
        console.warn('[WsTransport] Socket error:', error.message);
        if (this.pendingJoin) {
            const { reject } = this.pendingJoin;
            this.pendingJoin = null;
            reject(error);
        }
    }
}
