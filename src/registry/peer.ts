/**
 * Lifecycle of a remote companion as seen from this node.
 */
export type PeerState =
  | 'discovered'      // Sighted, no session
  | 'authenticating'  // Handshake in flight
  | 'active'          // Session established, heartbeats flowing
  | 'degraded'        // Heartbeats missed, outbound traffic queued
  | 'closed'          // Session torn down, entry kept for reconnection dedup
  | 'rejected';       // Authentication refused, cooling down

/**
 * A peer is a remote companion instance on the network
 */
export interface Peer {
  /** Identity (derived from the public key) */
  peerId: string;
  /** Last known network address; may change between sightings */
  address: string;
  /** Identity public key (hex-encoded ed25519 SPKI); unverified until a handshake completes */
  publicKey: string;
  /** User the peer claims to act for */
  ownerId?: string;
  state: PeerState;
  /** Unix timestamp (ms) when this peer was last seen (sighting or traffic) */
  lastSeen: number;
  /** When the current handshake started */
  authStartedAt?: number;
  /** No new handshake before this time */
  rejectedUntil?: number;
  /** Why the peer was last rejected or closed */
  reason?: string;
  /** Optional metadata about the peer */
  metadata?: {
    /** Human-readable alias */
    name?: string;
    /** Mesh protocol version the peer speaks */
    protocolVersion?: string;
  };
}

export const PEER_TRANSITIONS: Readonly<Record<PeerState, readonly PeerState[]>> = {
  discovered: ['authenticating', 'rejected'],
  authenticating: ['active', 'rejected', 'closed'],
  active: ['degraded', 'closed'],
  degraded: ['active', 'closed'],
  closed: ['authenticating', 'rejected'],
  rejected: ['authenticating', 'rejected'],
};

/** States that count against the concurrent peer cap. */
export const SLOT_STATES: readonly PeerState[] = ['authenticating', 'active', 'degraded'];

/** States in which the peer's identity has been proven. */
export const AUTHENTICATED_STATES: readonly PeerState[] = ['active', 'degraded'];

export function canTransition(from: PeerState, to: PeerState): boolean {
  return PEER_TRANSITIONS[from].includes(to);
}

export function holdsSlot(state: PeerState): boolean {
  return SLOT_STATES.includes(state);
}

export function isAuthenticated(state: PeerState): boolean {
  return AUTHENTICATED_STATES.includes(state);
}

/**
 * One observation of a peer on the local network. Carries no trust.
 */
export interface Sighting {
  peerId: string;
  address: string;
  publicKey: string;
  ownerId?: string;
  name?: string;
  protocolVersion?: string;
}
