/**
 * Relay rooms
 *
 * Socket-independent half of the relay: room membership, the fixed
 * authority, and frame routing. RelayServer binds it to `ws`.
 */

import {
    decodeControl,
    decodeOutbound,
    encodeControl,
    encodeRelayed
} from './protocol';

/** The one method the relay needs from a connected client */
export interface RelaySocket {
    send(data: string | Uint8Array): void;
}

export class RelayRoom {
    private members: Map<string, RelaySocket> = new Map();
    private _authorityId: string | null = null;
    private authorityAssigned: boolean = false;

    constructor(readonly roomId: string) {}

    /** First member ever to join; null after it leaves (no migration) */
    get authorityId(): string | null {
        return this._authorityId;
    }

    get size(): number {
        return this.members.size;
    }

    get memberIds(): string[] {
        return [...this.members.keys()];
    }

    has(participantId: string): boolean {
        return this.members.has(participantId);
    }

    join(participantId: string, socket: RelaySocket): void {
        if (this.members.has(participantId)) {
            throw new Error(`Participant '${participantId}' is already in room '${this.roomId}'`);
        }
        this.members.set(participantId, socket);

        if (!this.authorityAssigned) {
            this.authorityAssigned = true;
            this._authorityId = participantId;
        }
        this.announce();
    }

    leave(participantId: string): boolean {
        if (!this.members.delete(participantId)) return false;
        if (participantId === this._authorityId) {
            this._authorityId = null;
        }
        this.announce();
        return true;
    }

    /**
     * Forward one outbound frame from `from`.
     *
     * @returns Number of members the frame was sent to
     */
    route(from: string, bytes: Uint8Array): number {
        if (!this.members.has(from)) {
            throw new Error(`Participant '${from}' is not in room '${this.roomId}'`);
        }

        const { target, frame } = decodeOutbound(bytes);
        const relayed = encodeRelayed(from, frame);

        if (target === 'authority') {
            if (this._authorityId === null) return 0;
            const authority = this.members.get(this._authorityId);
            if (!authority) return 0;
            authority.send(relayed);
            return 1;
        }

        let sent = 0;
        for (const [id, socket] of this.members) {
            if (id === from) continue;
            socket.send(relayed);
            sent++;
        }
        return sent;
    }

    private announce(): void {
        const members = this.memberIds;
        for (const [id, socket] of this.members) {
            socket.send(encodeControl({
                type: 'ROOM_STATE',
                payload: { roomId: this.roomId, participantId: id, authorityId: this._authorityId, members }
            }));
        }
    }
}

// ============================================
// Lobby
// ============================================

/**
 * One client connection as seen by the lobby.
 */
export class RelayConnection {
    private room: RelayRoom | null = null;
    private participantId: string | null = null;

    constructor(
        private readonly lobby: RelayLobby,
        private readonly socket: RelaySocket
    ) {}

    get roomId(): string | null {
        return this.room ? this.room.roomId : null;
    }

    /**
     * Handle one inbound frame: JSON text for control, binary for relay.
     * Throws on malformed frames; the caller decides whether to drop or close.
     */
    receive(data: string | Uint8Array): void {
        if (typeof data === 'string') {
            const control = decodeControl(data);
            if (control.type !== 'JOIN_ROOM') {
                throw new Error(`Clients cannot send ${control.type}`);
            }
            if (this.room) {
                throw new Error(`Connection already joined room '${this.room.roomId}'`);
            }
            const room = this.lobby.getOrCreateRoom(control.payload.roomId);
            room.join(control.payload.participantId, this.socket);
            this.room = room;
            this.participantId = control.payload.participantId;
            return;
        }

        if (!this.room || this.participantId === null) {
            throw new Error('Binary frame before JOIN_ROOM');
        }
        this.room.route(this.participantId, data);
    }

    close(): void {
        if (this.room && this.participantId !== null) {
            this.room.leave(this.participantId);
            this.lobby.pruneRoom(this.room);
        }
        this.room = null;
        this.participantId = null;
    }
}

export class RelayLobby {
    private rooms: Map<string, RelayRoom> = new Map();

    get roomCount(): number {
        return this.rooms.size;
    }

    getRoom(roomId: string): RelayRoom | undefined {
        return this.rooms.get(roomId);
    }

    getOrCreateRoom(roomId: string): RelayRoom {
        let room = this.rooms.get(roomId);
        if (!room) {
            room = new RelayRoom(roomId);
            this.rooms.set(roomId, room);
        }
        return room;
    }

    connect(socket: RelaySocket): RelayConnection {
        return new RelayConnection(this, socket);
    }

    /** Drop a room once its last member has left */
    pruneRoom(room: RelayRoom): void {
        if (room.size === 0 && this.rooms.get(room.roomId) === room) {
            this.rooms.delete(room.roomId);
        }
    }
}
