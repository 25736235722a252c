import { MeshError, ProtocolError, describeError } from '../errors.js';
import { fingerprint } from '../identity/keypair.js';
import type { Logger } from '../logger.js';
import {
  createEnvelope,
  decodeEnvelope,
  encodeEnvelope,
  type MessageType,
  type WireEnvelope,
} from '../message/envelope.js';
import {
  isHandshakeAckPayload,
  isHandshakeInitPayload,
  isHandshakeResponsePayload,
  type HandshakeInitPayload,
  type HandshakeRejectReason,
  type HandshakeRefusePayload,
} from '../message/types/handshake.js';
import type { RelationshipCache } from '../policy/relationship-cache.js';
import type { PeerStore } from '../registry/peer-store.js';
import { holdsSlot, isAuthenticated, type Peer } from '../registry/peer.js';
import { FrameQueue } from '../transport/frame-queue.js';
import type { PeerLink } from '../transport/types.js';
import { shortId } from '../utils.js';
import {
  InitiatorHandshake,
  ResponderHandshake,
  assertInitIdentity,
  type HandshakeRole,
  type LocalIdentity,
  type RemoteIdentity,
} from './handshake.js';

/** Default window in which a nonce may not be reused by the same peer */
const DEFAULT_REPLAY_WINDOW_MS = 60_000;

export interface HandshakeProtocolConfig {
  identity: LocalIdentity;
  peerStore: PeerStore;
  /** Concurrent authenticating/active/degraded peers allowed */
  maxPeers: number;
  handshakeTimeoutMs: number;
  /** How long a rejected peer must wait before another attempt */
  rejectCooldownMs: number;
  replayWindowMs?: number;
  /** Identity fingerprints refused outright */
  denylist?: Iterable<string>;
  /** Used to refuse peers whose owner the local user blocked */
  relationships?: RelationshipCache;
  now?: () => number;
  logger?: Logger;
}

export type HandshakeFailureReason =
  | HandshakeRejectReason
  | 'timeout'
  | 'bad-signature'
  | 'identity-mismatch'
  | 'malformed'
  | 'link-closed'
  | 'superseded'
  | 'unknown-peer'
  | 'unreachable'
  | 'busy';

export type HandshakeOutcome =
  | {
      ok: true;
      peerId: string;
      role: HandshakeRole;
      sessionKey: Buffer;
      remote: RemoteIdentity;
      /**
       * Still collecting frames that arrive after the handshake. Release it
       * in the same tick the session attaches to the link, or frames are lost.
       */
      frames: FrameQueue;
    }
  | {
      ok: false;
      peerId?: string;
      reason: HandshakeFailureReason;
      error?: MeshError;
    };

interface Attempt {
  role: HandshakeRole;
  link: PeerLink;
  frames: FrameQueue;
  superseded: boolean;
}

/**
 * Runs handshakes over links and keeps the peer registry in step with them.
 *
 * Admission (cap, cooldown, denylist, replay, blocked owners) is decided
 * here; the cryptography lives in InitiatorHandshake / ResponderHandshake.
 * On success the peer is left in `authenticating` for the session manager
 * to promote.
 */
export class HandshakeProtocol {
  private readonly identity: LocalIdentity;
  private readonly peerStore: PeerStore;
  private readonly denylist: Set<string>;
  private readonly replayWindowMs: number;
  private readonly now: () => number;
  private readonly logger: Logger | null;
  private inFlight = new Map<string, Attempt>();
  private seenNonces = new Map<string, Map<string, number>>();

  constructor(private readonly config: HandshakeProtocolConfig) {
    this.identity = config.identity;
    this.peerStore = config.peerStore;
    this.denylist = new Set(Array.from(config.denylist ?? [], (entry) => entry.toLowerCase()));
    this.replayWindowMs = config.replayWindowMs ?? DEFAULT_REPLAY_WINDOW_MS;
    this.now = config.now ?? Date.now;
    this.logger = config.logger ?? null;
  }

  /**
   * Add a fingerprint to the denylist. Takes effect for the next handshake
   * in either direction.
   */
  deny(denied: string): void {
    this.denylist.add(denied.toLowerCase());
  }

  isDenylisted(publicKey: string): boolean {
    return this.denylist.has(fingerprint(publicKey));
  }

  /** Peers with nonces still inside the replay window */
  get replayCacheSize(): number {
    return this.seenNonces.size;
  }

  isInFlight(peerId: string): boolean {
    return this.inFlight.has(peerId);
  }

  /**
   * Run the initiator side of a handshake over a freshly dialed link.
   * The link is closed on failure; on success it belongs to the caller.
   */
  async initiate(link: PeerLink, peerId: string): Promise<HandshakeOutcome> {
    const peer = this.peerStore.getPeer(peerId);
    const refusal = peer ? this.checkOutboundAdmission(peer) : 'unknown-peer';
    if (refusal) {
      link.close();
      return { ok: false, peerId, reason: refusal };
    }

    this.peerStore.transition(peerId, 'authenticating');
    const attempt: Attempt = { role: 'initiator', link, frames: new FrameQueue(link), superseded: false };
    this.inFlight.set(peerId, attempt);
    const deadline = this.now() + this.config.handshakeTimeoutMs;

    try {
      const handshake = new InitiatorHandshake(this.identity, { peerId, publicKey: peer?.publicKey });
      this.send(link, 'handshake-init', handshake.init);

      const envelope = await this.expect(attempt.frames, 'handshake-response', peerId, deadline);
      const response = envelope.payload;
      if (!isHandshakeResponsePayload(response)) {
        throw new ProtocolError('Malformed handshake response', 'MALFORMED');
      }

      if (response.outcome === 'rejected') {
        return this.handleRefusal(attempt, peerId, response);
      }

      const { ack, sessionKey, remote } = handshake.handleResponse(response);
      this.send(link, 'handshake-ack', ack);
      this.logger?.debug(`Handshake with ${shortId(peerId)} complete (initiator)`);

      return { ok: true, peerId, role: 'initiator', sessionKey, remote, frames: attempt.frames };
    } catch (err) {
      attempt.frames.release();
      if (attempt.superseded) {
        link.close();
        return { ok: false, peerId, reason: 'superseded' };
      }
      return this.failAttempt(link, peerId, err);
    } finally {
      if (this.inFlight.get(peerId) === attempt) {
        this.inFlight.delete(peerId);
      }
    }
  }

  /**
   * Run the responder side for an inbound link whose first frame was read
   * through `frames`.
   */
  async respond(link: PeerLink, frames: FrameQueue, first: WireEnvelope): Promise<HandshakeOutcome> {
    const deadline = this.now() + this.config.handshakeTimeoutMs;

    if (first.type !== 'handshake-init' || !isHandshakeInitPayload(first.payload) || first.sender !== first.payload.peerId) {
      this.refuse(link, frames, 'invalid');
      return { ok: false, reason: 'malformed', error: new ProtocolError('Expected a handshake-init', 'UNEXPECTED_MESSAGE') };
    }

    const init = first.payload;
    const peerId = init.peerId;

    try {
      assertInitIdentity(init);
    } catch (err) {
      this.refuse(link, frames, 'invalid');
      return { ok: false, reason: 'identity-mismatch', error: err instanceof MeshError ? err : undefined };
    }
    if (peerId === this.identity.peerId) {
      this.refuse(link, frames, 'invalid');
      return { ok: false, peerId, reason: 'invalid' };
    }

    const peer = this.peerStore.ensurePeer({
      peerId,
      address: link.address,
      publicKey: init.publicKey,
      ownerId: init.ownerId,
      protocolVersion: init.protocolVersion,
    });

    const admission = this.checkInboundAdmission(peer, init);
    if (admission) {
      this.refuse(link, frames, admission.reason, admission.retryAfterMs);
      if (admission.reject) {
        this.markRejected(peerId, admission.reason);
      }
      return { ok: false, peerId, reason: admission.reason };
    }

    // Simultaneous initiation: the larger id gives up its own attempt.
    const outbound = this.inFlight.get(peerId);
    if (outbound) {
      outbound.superseded = true;
      outbound.frames.release();
      this.inFlight.delete(peerId);
    }

    const attempt: Attempt = { role: 'responder', link, frames, superseded: false };
    this.inFlight.set(peerId, attempt);
    this.rememberNonce(peerId, init.nonce);

    const supersedesSession = isAuthenticated(peer.state);
    if (!supersedesSession && peer.state !== 'authenticating') {
      this.peerStore.transition(peerId, 'authenticating');
    }

    try {
      if (this.config.relationships) {
        const relationship = await this.config.relationships.get(this.identity.ownerId, init.ownerId);
        if (relationship.type === 'blocked') {
          this.refuse(link, frames, 'policy');
          if (!supersedesSession) {
            this.markRejected(peerId, 'policy');
          }
          return { ok: false, peerId, reason: 'policy' };
        }
      }

      const handshake = ResponderHandshake.accept(this.identity, init);
      this.send(link, 'handshake-response', handshake.response);

      const envelope = await this.expect(frames, 'handshake-ack', peerId, deadline);
      if (!isHandshakeAckPayload(envelope.payload)) {
        throw new ProtocolError('Malformed handshake ack', 'MALFORMED');
      }
      const sessionKey = handshake.handleAck(envelope.payload);
      this.logger?.debug(`Handshake with ${shortId(peerId)} complete (responder)`);

      return { ok: true, peerId, role: 'responder', sessionKey, remote: handshake.remote, frames };
    } catch (err) {
      frames.release();
      if (supersedesSession) {
        // A failed re-handshake leaves the live session alone.
        link.close();
        const reason = failureReason(err);
        this.logger?.warn(`Re-handshake from ${shortId(peerId)} failed (${reason}); existing session kept`);
        return { ok: false, peerId, reason, error: err instanceof MeshError ? err : undefined };
      }
      return this.failAttempt(link, peerId, err);
    } finally {
      if (this.inFlight.get(peerId) === attempt) {
        this.inFlight.delete(peerId);
      }
    }
  }

  private checkOutboundAdmission(peer: Readonly<Peer>): HandshakeFailureReason | null {
    if (this.inFlight.has(peer.peerId) || isAuthenticated(peer.state) || peer.state === 'authenticating') {
      return 'busy';
    }
    if (this.isDenylisted(peer.publicKey)) {
      return 'denylisted';
    }
    if (peer.state === 'rejected' && peer.rejectedUntil !== undefined && this.now() < peer.rejectedUntil) {
      return 'cooldown';
    }
    if (this.peerStore.slotCount() >= this.config.maxPeers) {
      return 'capacity';
    }
    return null;
  }

  private checkInboundAdmission(
    peer: Readonly<Peer>,
    init: HandshakeInitPayload,
  ): { reason: HandshakeRejectReason; reject: boolean; retryAfterMs?: number } | null {
    const authenticated = isAuthenticated(peer.state);

    if (this.denylist.has(init.fingerprint)) {
      return { reason: 'denylisted', reject: !authenticated };
    }
    if (this.isReplay(peer.peerId, init.nonce)) {
      return { reason: 'replay', reject: !authenticated };
    }

    const outbound = this.inFlight.get(peer.peerId);
    if (outbound && (outbound.role === 'responder' || this.identity.peerId < peer.peerId)) {
      return { reason: 'role-conflict', reject: false };
    }

    if (peer.state === 'rejected' && peer.rejectedUntil !== undefined && this.now() < peer.rejectedUntil) {
      return { reason: 'cooldown', reject: false, retryAfterMs: peer.rejectedUntil - this.now() };
    }
    if (!holdsSlot(peer.state) && this.peerStore.slotCount() >= this.config.maxPeers) {
      return { reason: 'capacity', reject: true, retryAfterMs: this.config.rejectCooldownMs };
    }
    return null;
  }

  private handleRefusal(attempt: Attempt, peerId: string, response: HandshakeRefusePayload): HandshakeOutcome {
    attempt.frames.release();
    attempt.link.close();

    if (attempt.superseded) {
      return { ok: false, peerId, reason: 'superseded' };
    }

    if (response.reason === 'role-conflict') {
      // The other side is initiating; step aside without a cooldown.
      const peer = this.peerStore.getPeer(peerId);
      if (peer?.state === 'authenticating') {
        this.peerStore.transition(peerId, 'closed', { reason: 'role-conflict' });
      }
    } else {
      this.markRejected(peerId, response.reason, response.retryAfterMs);
    }

    this.logger?.info(`Handshake with ${shortId(peerId)} refused: ${response.reason}`);
    return { ok: false, peerId, reason: response.reason };
  }

  private failAttempt(link: PeerLink, peerId: string, err: unknown): HandshakeOutcome {
    link.close();
    const reason = failureReason(err);
    const peer = this.peerStore.getPeer(peerId);

    if (peer?.state === 'authenticating') {
      if (reason === 'link-closed') {
        this.peerStore.transition(peerId, 'closed', { reason });
      } else {
        this.markRejected(peerId, reason);
      }
    }

    this.logger?.warn(`Handshake with ${shortId(peerId)} failed: ${describeError(err)}`);
    return { ok: false, peerId, reason, error: err instanceof MeshError ? err : undefined };
  }

  private markRejected(peerId: string, reason: string, retryAfterMs?: number): void {
    const peer = this.peerStore.getPeer(peerId);
    if (!peer || isAuthenticated(peer.state)) {
      return;
    }
    const cooldown = Math.max(retryAfterMs ?? 0, this.config.rejectCooldownMs);
    this.peerStore.transition(peerId, 'rejected', { reason, rejectedUntil: this.now() + cooldown });
  }

  private refuse(link: PeerLink, frames: FrameQueue, reason: HandshakeRejectReason, retryAfterMs?: number): void {
    const payload: HandshakeRefusePayload = {
      outcome: 'rejected',
      reason,
      ...(retryAfterMs !== undefined ? { retryAfterMs } : {}),
    };
    this.send(link, 'handshake-response', payload);
    frames.release();
    link.close();
  }

  private async expect(
    frames: FrameQueue,
    type: MessageType,
    peerId: string,
    deadline: number,
  ): Promise<WireEnvelope> {
    const frame = await frames.next(deadline - this.now());
    const decoded = decodeEnvelope(frame);
    if (!decoded.ok) {
      throw new ProtocolError(`Malformed frame during handshake: ${decoded.reason}`, 'MALFORMED');
    }
    if (decoded.envelope.type !== type) {
      throw new ProtocolError(`Expected ${type}, got ${decoded.envelope.type}`, 'UNEXPECTED_MESSAGE');
    }
    if (decoded.envelope.sender !== peerId) {
      throw new ProtocolError('Handshake frame from unexpected sender', 'IDENTITY_MISMATCH');
    }
    return decoded.envelope;
  }

  private send(link: PeerLink, type: MessageType, payload: unknown): void {
    link.send(encodeEnvelope(createEnvelope(type, this.identity.peerId, 0, payload)));
  }

  private isReplay(peerId: string, nonce: string): boolean {
    this.pruneNonces();
    return this.seenNonces.get(peerId)?.has(nonce) ?? false;
  }

  /** Forget nonces older than the replay window, for every peer. */
  private pruneNonces(): void {
    const cutoff = this.now() - this.replayWindowMs;
    for (const [peerId, nonces] of this.seenNonces) {
      for (const [seen, at] of nonces) {
        if (at < cutoff) {
          nonces.delete(seen);
        }
      }
      if (nonces.size === 0) {
        this.seenNonces.delete(peerId);
      }
    }
  }

  private rememberNonce(peerId: string, nonce: string): void {
    let nonces = this.seenNonces.get(peerId);
    if (!nonces) {
      nonces = new Map();
      this.seenNonces.set(peerId, nonces);
    }
    nonces.set(nonce, this.now());
  }
}

function failureReason(err: unknown): HandshakeFailureReason {
  if (err instanceof ProtocolError) {
    switch (err.code) {
      case 'HANDSHAKE_TIMEOUT':
        return 'timeout';
      case 'LINK_CLOSED':
        return 'link-closed';
      case 'BAD_SIGNATURE':
        return 'bad-signature';
      case 'IDENTITY_MISMATCH':
        return 'identity-mismatch';
      case 'REPLAY':
        return 'replay';
      default:
        return 'malformed';
    }
  }
  return 'malformed';
}
