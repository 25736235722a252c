import { EventEmitter } from 'node:events';
import { validateNetworkConfig, type MeshConfig, type NetworkConfig } from './config.js';
import { DiscoveryService } from './discovery/discovery-service.js';
import { FatalError, MeshError, describeError } from './errors.js';
import { PROTOCOL_VERSION, createLocalIdentity, resolveHandshakeRole, type LocalIdentity } from './handshake/handshake.js';
import { HandshakeProtocol, type HandshakeOutcome } from './handshake/protocol.js';
import { validateKeyPair } from './identity/keypair.js';
import type { Logger } from './logger.js';
import { decodeEnvelope } from './message/envelope.js';
import type { CompanionMode } from './policy/modes.js';
import { RelationshipCache, type RelationshipRegistry } from './policy/relationship-cache.js';
import { PeerStore } from './registry/peer-store.js';
import type { Peer, Sighting } from './registry/peer.js';
import { ContextPublisher, type ContextProvider, type PublishResult } from './session/context-publisher.js';
import type { Session, SessionCloseReason } from './session/session.js';
import { SessionManager } from './session/session-manager.js';
import { FrameQueue } from './transport/frame-queue.js';
import type { Advertisement, DiscoveryTransport, LinkTransport, PeerLink } from './transport/types.js';
import { shortId } from './utils.js';

/**
 * Everything a node needs: who it is, how it reaches the network, and the
 * external collaborators it reads from.
 */
export interface MeshServiceConfig extends Omit<MeshConfig, 'denylist'> {
  denylist?: string[];
  network: NetworkConfig;
  linkTransport: LinkTransport;
  discoveryTransport: DiscoveryTransport;
  relationships: RelationshipRegistry;
  contextProvider: ContextProvider;
  /** Dial peers found by discovery when this node would initiate (default: true) */
  autoConnect?: boolean;
  /**
   * Run discovery, heartbeats, context pushes and maintenance on timers
   * (default: true). With false, callers drive them through discover(),
   * broadcastContext() and sweep().
   */
  timers?: boolean;
  /** Pause between discovery cycles */
  scanIntervalMs?: number;
  now?: () => number;
  logger?: Logger;
}

/**
 * Events emitted by MeshService
 */
export interface MeshServiceEvents {
  'peer_discovered': (peer: Readonly<Peer>) => void;
  'peer_active': (peerId: string) => void;
  'peer_closed': (peerId: string, reason: SessionCloseReason) => void;
  'peer_rejected': (peerId: string, reason: string) => void;
  'context_received': (peerId: string, snapshot: Record<string, unknown>) => void;
  'mode_received': (peerId: string, mode: CompanionMode) => void;
  'policy_violation': (peerId: string, categories: string[]) => void;
  'error': (error: Error) => void;
}

/**
 * High-level mesh node: discovery, handshakes, sessions and context
 * exchange wired together, surfaced as events.
 */
export class MeshService extends EventEmitter {
  readonly identity: LocalIdentity;
  readonly peerStore: PeerStore;
  readonly sessions: SessionManager;

  private readonly config: MeshServiceConfig;
  private readonly network: NetworkConfig;
  private readonly protocol: HandshakeProtocol;
  private readonly discovery: DiscoveryService;
  private readonly publisher: ContextPublisher;
  private readonly relationshipCache: RelationshipCache;
  private readonly logger: Logger | null;
  private timers: NodeJS.Timeout[] = [];
  private running = false;

  constructor(config: MeshServiceConfig) {
    super();
    this.config = config;
    this.network = config.network;
    this.logger = config.logger ?? null;
    this.identity = createLocalIdentity(config.identity, config.ownerId, config.name);

    const now = config.now ?? Date.now;
    this.peerStore = new PeerStore({ now });
    this.relationshipCache = new RelationshipCache(config.relationships, {
      ttlMs: this.network.relationshipTtlMs,
      now,
      logger: config.logger,
    });

    this.protocol = new HandshakeProtocol({
      identity: this.identity,
      peerStore: this.peerStore,
      maxPeers: this.network.maxPeers,
      handshakeTimeoutMs: this.network.handshakeTimeoutMs,
      rejectCooldownMs: this.network.rejectCooldownMs,
      denylist: config.denylist,
      relationships: this.relationshipCache,
      now,
      logger: config.logger,
    });

    this.sessions = new SessionManager({
      localPeerId: this.identity.peerId,
      peerStore: this.peerStore,
      session: {
        heartbeatIntervalMs: this.network.heartbeatIntervalMs,
        degradedGraceMs: this.network.degradedGraceMs,
        timers: config.timers,
        now,
      },
      logger: config.logger,
    });

    this.discovery = new DiscoveryService({
      transport: config.discoveryTransport,
      peerStore: this.peerStore,
      advertisement: this.advertisement(),
      scanIntervalMs: config.scanIntervalMs,
      logger: config.logger,
    });

    this.publisher = new ContextPublisher({
      ownerId: config.ownerId,
      provider: config.contextProvider,
      relationships: this.relationshipCache,
      contextTimeoutMs: this.network.contextTimeoutMs,
      logger: config.logger,
    });

    this.wire();
  }

  override on<E extends keyof MeshServiceEvents>(event: E, listener: MeshServiceEvents[E]): this {
    return super.on(event, listener);
  }

  override once<E extends keyof MeshServiceEvents>(event: E, listener: MeshServiceEvents[E]): this {
    return super.once(event, listener);
  }

  override emit<E extends keyof MeshServiceEvents>(event: E, ...args: Parameters<MeshServiceEvents[E]>): boolean {
    return super.emit(event, ...args);
  }

  get peerId(): string {
    return this.identity.peerId;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Validate configuration, start accepting links and begin discovery.
   *
   * @throws FatalError when the configuration or identity is unusable
   */
  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    validateNetworkConfig(this.network);
    if (!validateKeyPair(this.config.identity)) {
      throw new FatalError('Identity keys do not form a valid ed25519 pair', 'IDENTITY_UNAVAILABLE');
    }
    if (this.config.ownerId.trim() === '') {
      throw new FatalError('ownerId must not be empty', 'INVALID_CONFIG');
    }

    await this.config.linkTransport.listen((link) => {
      this.acceptLink(link).catch((err: unknown) => this.reportError(err));
    });
    this.running = true;
    this.logger?.info(`Mesh node ${shortId(this.peerId)} started`);

    if (this.config.timers !== false) {
      this.discovery.start();
      this.timers.push(
        setInterval(() => {
          this.broadcastContext().catch((err: unknown) => this.reportError(err));
        }, this.network.contextIntervalMs),
        setInterval(() => this.sweep(), this.network.heartbeatIntervalMs),
      );
    }
  }

  /**
   * Close every session, stop discovery and release the transports.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    for (const timer of this.timers) {
      clearInterval(timer);
    }
    this.timers = [];

    await this.discovery.stop();
    this.sessions.closeAll('shutdown');
    await this.config.linkTransport.close();
    await this.config.discoveryTransport.close();
    this.logger?.info(`Mesh node ${shortId(this.peerId)} stopped`);
  }

  /**
   * Run one discovery cycle now. Failures are logged, never thrown.
   */
  async discover(): Promise<Sighting[]> {
    return this.discovery.runOnce();
  }

  /**
   * Dial a known peer and run the handshake as initiator.
   */
  async connect(peerId: string): Promise<HandshakeOutcome> {
    const peer = this.peerStore.getPeer(peerId);
    if (!peer) {
      return { ok: false, peerId, reason: 'unknown-peer' };
    }
    if (this.sessions.has(peerId) || this.protocol.isInFlight(peerId)) {
      return { ok: false, peerId, reason: 'busy' };
    }

    let link: PeerLink;
    try {
      link = await this.config.linkTransport.dial(peer.address);
    } catch (err) {
      this.logger?.warn(`Cannot reach ${shortId(peerId)} at ${peer.address}: ${describeError(err)}`);
      return { ok: false, peerId, reason: 'unreachable', error: err instanceof MeshError ? err : undefined };
    }

    const outcome = await this.protocol.initiate(link, peerId);
    this.settle(outcome, link);
    return outcome;
  }

  /**
   * Close the session with a peer.
   */
  disconnect(peerId: string): boolean {
    return this.sessions.close(peerId, 'local-close');
  }

  /**
   * Refuse a fingerprint from now on and drop any session it holds.
   */
  deny(fingerprint: string): void {
    this.protocol.deny(fingerprint);
    for (const session of this.sessions.all()) {
      if (this.protocol.isDenylisted(session.remote.publicKey)) {
        session.close('local-close');
      }
    }
  }

  /**
   * Push a filtered context update to every session.
   */
  async broadcastContext(): Promise<PublishResult[]> {
    return Promise.all(this.sessions.all().map((session) => this.publishTo(session)));
  }

  /**
   * Announce the companion's mode to every peer allowed to learn it.
   */
  async broadcastMode(mode: CompanionMode): Promise<PublishResult[]> {
    return Promise.all(
      this.sessions.all().map(async (session): Promise<PublishResult> => {
        try {
          return await this.publisher.publishMode(session, mode);
        } catch (err) {
          this.reportError(err);
          return { peerId: session.peerId, status: 'skipped', reason: describeError(err) };
        }
      }),
    );
  }

  getPeers(): Readonly<Peer>[] {
    return this.peerStore.allPeers();
  }

  getSession(peerId: string): Session | undefined {
    return this.sessions.get(peerId);
  }

  /**
   * Evict peers silent for longer than the silence period, and retry
   * peers this node should initiate to.
   *
   * @returns ids of evicted peers
   */
  sweep(): string[] {
    const evicted: string[] = [];
    for (const peer of this.peerStore.stalePeers(this.network.peerSilenceMs)) {
      if (peer.state === 'authenticating') {
        continue;
      }
      this.sessions.close(peer.peerId, 'evicted');
      this.peerStore.removePeer(peer.peerId);
      if (peer.ownerId !== undefined) {
        this.relationshipCache.invalidate(peer.ownerId);
      }
      evicted.push(peer.peerId);
      this.logger?.info(`Evicted silent peer ${shortId(peer.peerId)}`);
    }

    if (this.running && this.config.autoConnect !== false) {
      const now = (this.config.now ?? Date.now)();
      for (const peer of this.peerStore.peersInState('discovered', 'closed', 'rejected')) {
        if (peer.state === 'rejected' && (peer.rejectedUntil ?? 0) > now) {
          continue;
        }
        this.autoConnect(peer);
      }
    }
    return evicted;
  }

  private wire(): void {
    this.discovery.on('peer-discovered', (peer) => {
      this.emit('peer_discovered', peer);
      if (this.running && this.config.autoConnect !== false) {
        this.autoConnect(peer);
      }
    });

    this.sessions.on('session-opened', (session) => {
      this.emit('peer_active', session.peerId);
      this.publishTo(session).catch((err: unknown) => this.reportError(err));
    });

    this.sessions.on('session-closed', (peerId, reason) => {
      this.emit('peer_closed', peerId, reason);
    });

    this.sessions.on('context', (peerId, snapshot) => {
      this.emit('context_received', peerId, snapshot);
    });

    this.sessions.on('mode', (peerId, mode) => {
      this.emit('mode_received', peerId, mode);
    });
  }

  /**
   * Dial a peer without being asked to, unless this node is the responder,
   * the peer is denylisted, or the local side closed its last session.
   */
  private autoConnect(peer: Readonly<Peer>): void {
    if (resolveHandshakeRole(this.peerId, peer.peerId) !== 'initiator') {
      return;
    }
    if (this.protocol.isDenylisted(peer.publicKey)) {
      return;
    }
    if (peer.state === 'closed' && peer.reason === 'local-close') {
      return;
    }
    this.connect(peer.peerId).catch((err: unknown) => this.reportError(err));
  }

  private async acceptLink(link: PeerLink): Promise<void> {
    const frames = new FrameQueue(link);
    let frame: string;
    try {
      frame = await frames.next(this.network.handshakeTimeoutMs);
    } catch (err) {
      frames.release();
      link.close();
      this.logger?.debug(`Inbound link from ${link.address} gave up before a handshake: ${describeError(err)}`);
      return;
    }

    const decoded = decodeEnvelope(frame);
    if (!decoded.ok) {
      frames.release();
      link.close();
      this.logger?.debug(`Inbound link from ${link.address} sent a malformed first frame (${decoded.reason})`);
      return;
    }

    const outcome = await this.protocol.respond(link, frames, decoded.envelope);
    this.settle(outcome, link);
  }

  private settle(outcome: HandshakeOutcome, link: PeerLink): void {
    if (outcome.ok) {
      const buffered = outcome.frames.release();
      if (!this.running) {
        link.close();
        return;
      }
      try {
        this.sessions.open({
          peerId: outcome.peerId,
          role: outcome.role,
          remote: outcome.remote,
          sessionKey: outcome.sessionKey,
          link,
          buffered,
        });
      } catch (err) {
        link.close();
        this.reportError(err);
      }
      return;
    }

    if (outcome.peerId === undefined || outcome.reason === 'superseded') {
      return;
    }
    const peer = this.peerStore.getPeer(outcome.peerId);
    if (peer?.state === 'rejected') {
      this.emit('peer_rejected', outcome.peerId, outcome.reason);
    }
  }

  private async publishTo(session: Session): Promise<PublishResult> {
    try {
      const result = await this.publisher.publish(session);
      if (result.status === 'withheld' && result.categories && result.categories.length > 0) {
        this.emit('policy_violation', session.peerId, result.categories);
      }
      return result;
    } catch (err) {
      this.reportError(err);
      return { peerId: session.peerId, status: 'skipped', reason: describeError(err) };
    }
  }

  private advertisement(): Advertisement {
    return {
      peerId: this.identity.peerId,
      publicKey: this.identity.publicKey,
      ownerId: this.identity.ownerId,
      linkPort: this.network.linkPort,
      protocolVersion: PROTOCOL_VERSION,
      ...(this.identity.name !== undefined ? { name: this.identity.name } : {}),
    };
  }

  private reportError(err: unknown): void {
    const error = err instanceof Error ? err : new Error(String(err));
    this.logger?.error(describeError(error));
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
    }
  }
}
