/**
 * Role Resolver
 *
 * Decides, once per entity and before anything else about it runs, whether
 * this process simulates the entity (authority) or only displays it (replica).
 */

export type Role = 'authority' | 'replica';

/**
 * Session-wide role information, as reported by the transport.
 */
export interface SessionInfo {
    /** Whether the transport has joined a session */
    connected: boolean;
    /** This participant's id in the session */
    localParticipantId: string | null;
    /** The participant that simulates hostile entities */
    authorityParticipantId: string | null;
}

export interface ResolvedRole {
    readonly role: Role;
    /** Authority with no replication traffic (offline or no session yet) */
    readonly solo: boolean;
}

const SOLO: ResolvedRole = Object.freeze({ role: 'authority', solo: true });

/**
 * Resolve the local role for an entity created now.
 *
 * Missing or incomplete session information resolves to solo, so an entity
 * created before the session is joined still simulates locally.
 */
export function resolveRole(session: SessionInfo | null | undefined): ResolvedRole {
    if (!session || !session.connected) return SOLO;
    if (session.localParticipantId === null || session.authorityParticipantId === null) return SOLO;

    if (session.localParticipantId === session.authorityParticipantId) {
        return { role: 'authority', solo: false };
    }
    return { role: 'replica', solo: false };
}
