/**
 * Relay Server
 *
 * Minimal `ws` relay: clients JOIN_ROOM with a JSON text frame, then send
 * binary outbound frames that the room forwards to everyone else or to the
 * room's authority.
 */

import type { Server } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import type { RawData } from 'ws';
import { RelayLobby } from './relay-room';
import { fromRawData } from './ws-data';

export interface RelayServerOptions {
    /** Listen on this port (ignored when `server` is given) */
    port?: number;
    /** Attach to an existing HTTP server */
    server?: Server;
    path?: string;
    debug?: boolean;
}

export class RelayServer {
    readonly lobby: RelayLobby = new RelayLobby();
    private wss: WebSocketServer;
    private debug: boolean;

    constructor(options: RelayServerOptions = {}) {
        this.debug = options.debug ?? false;
        this.wss = options.server
            ? new WebSocketServer({ server: options.server, path: options.path })
            : new WebSocketServer({ port: options.port ?? 8080, path: options.path });

        this.wss.on('listening', () => {
            console.log(`[RelayServer] Listening${options.port !== undefined ? ` on port ${options.port}` : ''}`);
        });
        this.wss.on('connection', (socket: WebSocket) => this.handleConnection(socket));
    }

    private handleConnection(socket: WebSocket): void {
        const connection = this.lobby.connect({ send: data => socket.send(data) });

        socket.on('message', (data: RawData, isBinary: boolean) => {
            try {
                connection.receive(fromRawData(data, isBinary));
            } catch (error) {
                console.warn('[RelayServer] Dropped frame:', error instanceof Error ? error.message : error);
            }
        });

        socket.on('close', () => {
            if (this.debug) {
                console.log(`[RelayServer] Connection closed (room ${connection.roomId ?? 'none'})`);
            }
            connection.close();
        });

        socket.on('error', (error: Error) => {
            console.warn('[RelayServer] Socket error:', error.message);
        });
    }

    close(): Promise<void> {
        for (const client of this.wss.clients) {
            client.terminate();
        }
        return new Promise((resolve, reject) => {
            this.wss.close(error => (error ? reject(error) : resolve()));
        });
    }
}
