import { derivePeerId } from '../identity/keypair.js';
import {
  canTransition,
  holdsSlot,
  isAuthenticated,
  type Peer,
  type PeerState,
  type Sighting,
} from './peer.js';

export type SightingOutcome = 'created' | 'refreshed';

export interface TransitionPatch {
  reason?: string;
  rejectedUntil?: number;
}

/**
 * In-memory directory of known peers on the network.
 *
 * The only shared mutable state in the mesh. Every mutation is a single
 * synchronous method, so no caller ever sees a half-updated peer, and reads
 * hand out frozen copies rather than the records themselves.
 */
export class PeerStore {
  private peers: Map<string, Peer> = new Map();
  private readonly now: () => number;

  constructor(options: { now?: () => number } = {}) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Record a discovery sighting.
   *
   * Unknown peers are created in `discovered`. Authenticated peers only get
   * their address and last-seen time refreshed; their pinned key and owner
   * stay as the handshake proved them.
   *
   * @returns the outcome and the peer after the update, or null when the
   *   advertised id does not belong to the advertised key
   */
  recordSighting(sighting: Sighting): { outcome: SightingOutcome; peer: Readonly<Peer> } | null {
    if (derivePeerId(sighting.publicKey) !== sighting.peerId) {
      return null;
    }

    const now = this.now();
    const existing = this.peers.get(sighting.peerId);

    if (!existing) {
      const peer: Peer = {
        peerId: sighting.peerId,
        address: sighting.address,
        publicKey: sighting.publicKey,
        ownerId: sighting.ownerId,
        state: 'discovered',
        lastSeen: now,
        metadata: metadataOf(sighting),
      };
      this.peers.set(peer.peerId, peer);
      return { outcome: 'created', peer: snapshot(peer) };
    }

    existing.address = sighting.address;
    existing.lastSeen = now;

    if (!isAuthenticated(existing.state)) {
      existing.publicKey = sighting.publicKey;
      existing.ownerId = sighting.ownerId ?? existing.ownerId;
      existing.metadata = metadataOf(sighting) ?? existing.metadata;
    }

    return { outcome: 'refreshed', peer: snapshot(existing) };
  }

  /**
   * Make sure a peer that reached us directly (without a prior sighting) has
   * an entry. The address is only taken for new entries: an inbound link's
   * address is not necessarily one we can dial back. Existing authenticated
   * entries keep their key and owner.
   */
  ensurePeer(fields: Omit<Sighting, 'name' | 'protocolVersion'> & { protocolVersion?: string }): Readonly<Peer> {
    const existing = this.peers.get(fields.peerId);
    if (existing) {
      if (!isAuthenticated(existing.state)) {
        existing.publicKey = fields.publicKey;
        existing.ownerId = fields.ownerId ?? existing.ownerId;
      }
      existing.lastSeen = this.now();
      return snapshot(existing);
    }

    const peer: Peer = {
      peerId: fields.peerId,
      address: fields.address,
      publicKey: fields.publicKey,
      ownerId: fields.ownerId,
      state: 'discovered',
      lastSeen: this.now(),
      metadata: fields.protocolVersion ? { protocolVersion: fields.protocolVersion } : undefined,
    };
    this.peers.set(peer.peerId, peer);
    return snapshot(peer);
  }

  /**
   * Move a peer to a new lifecycle state.
   *
   * @throws Error if the peer is unknown or the transition is not allowed
   */
  transition(peerId: string, to: PeerState, patch: TransitionPatch = {}): Readonly<Peer> {
    const peer = this.peers.get(peerId);
    if (!peer) {
      throw new Error(`Unknown peer: ${peerId}`);
    }
    if (!canTransition(peer.state, to)) {
      throw new Error(`Invalid peer transition ${peer.state} -> ${to} for ${peerId}`);
    }

    peer.state = to;
    peer.authStartedAt = to === 'authenticating' ? this.now() : undefined;
    if (to === 'rejected') {
      peer.rejectedUntil = patch.rejectedUntil;
    } else if (to === 'authenticating' || to === 'active') {
      peer.rejectedUntil = undefined;
    }
    if (patch.reason !== undefined) {
      peer.reason = patch.reason;
    } else if (to === 'active') {
      peer.reason = undefined;
    }

    return snapshot(peer);
  }

  /**
   * Refresh last-seen on inbound traffic.
   */
  touch(peerId: string): void {
    const peer = this.peers.get(peerId);
    if (peer) {
      peer.lastSeen = this.now();
    }
  }

  /**
   * Remove a peer from the store.
   *
   * @param peerId - The id of the peer to remove
   * @returns true if the peer was removed, false if it didn't exist
   */
  removePeer(peerId: string): boolean {
    return this.peers.delete(peerId);
  }

  /**
   * Get a peer by id.
   *
   * @returns The peer if found, undefined otherwise
   */
  getPeer(peerId: string): Readonly<Peer> | undefined {
    const peer = this.peers.get(peerId);
    return peer ? snapshot(peer) : undefined;
  }

  /**
   * Get all peers in the store.
   */
  allPeers(): Readonly<Peer>[] {
    return Array.from(this.peers.values(), snapshot);
  }

  /**
   * Get all peers currently in one of the given states.
   */
  peersInState(...states: PeerState[]): Readonly<Peer>[] {
    return this.allPeers().filter(peer => states.includes(peer.state));
  }

  /**
   * Number of peers holding a capacity slot (authenticating, active or degraded).
   */
  slotCount(): number {
    let count = 0;
    for (const peer of this.peers.values()) {
      if (holdsSlot(peer.state)) {
        count++;
      }
    }
    return count;
  }

  /**
   * Peers not seen within the specified time window.
   */
  stalePeers(maxAgeMs: number): Readonly<Peer>[] {
    const cutoff = this.now() - maxAgeMs;
    return this.allPeers().filter(peer => peer.lastSeen < cutoff);
  }

  /**
   * Remove peers that haven't been seen within the specified time window.
   *
   * @param maxAgeMs - Maximum age in milliseconds. Peers older than this will be removed.
   * @returns Ids of the removed peers
   */
  prune(maxAgeMs: number): string[] {
    const removed: string[] = [];
    for (const peer of this.stalePeers(maxAgeMs)) {
      this.peers.delete(peer.peerId);
      removed.push(peer.peerId);
    }
    return removed;
  }

  get size(): number {
    return this.peers.size;
  }
}

function metadataOf(sighting: Sighting): Peer['metadata'] {
  if (sighting.name === undefined && sighting.protocolVersion === undefined) {
    return undefined;
  }
  return { name: sighting.name, protocolVersion: sighting.protocolVersion };
}

function snapshot(peer: Peer): Readonly<Peer> {
  return Object.freeze({
    ...peer,
    ...(peer.metadata ? { metadata: Object.freeze({ ...peer.metadata }) } : {}),
  });
}
