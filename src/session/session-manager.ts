import { EventEmitter } from 'node:events';
import type { HandshakeRole, RemoteIdentity } from '../handshake/handshake.js';
import type { Logger } from '../logger.js';
import type { CompanionMode } from '../policy/modes.js';
import type { PeerStore } from '../registry/peer-store.js';
import { isAuthenticated } from '../registry/peer.js';
import type { PeerLink } from '../transport/types.js';
import { shortId } from '../utils.js';
import { Session, type SessionCloseReason, type SessionConfig } from './session.js';

/**
 * Session settings shared by every peer.
 */
export type SessionOptions = Pick<
  SessionConfig,
  | 'heartbeatIntervalMs'
  | 'pongTimeoutMs'
  | 'maxMissedHeartbeats'
  | 'degradedGraceMs'
  | 'maxQueueSize'
  | 'maxProtocolViolations'
  | 'timers'
  | 'now'
>;

export interface SessionManagerConfig {
  localPeerId: string;
  peerStore: PeerStore;
  session: SessionOptions;
  logger?: Logger;
}

/**
 * What a completed handshake hands over.
 */
export interface EstablishedLink {
  peerId: string;
  role: HandshakeRole;
  remote: RemoteIdentity;
  sessionKey: Buffer;
  link: PeerLink;
  /** Frames received after the handshake but before the session existed */
  buffered: readonly string[];
}

/**
 * Events emitted by SessionManager
 */
export interface SessionManagerEvents {
  'session-opened': (session: Session) => void;
  'session-closed': (peerId: string, reason: SessionCloseReason) => void;
  'context': (peerId: string, snapshot: Record<string, unknown>) => void;
  'mode': (peerId: string, mode: CompanionMode) => void;
  'violation': (peerId: string, reason: string) => void;
}

/**
 * Keeps exactly one session per authenticated peer and mirrors session
 * state into the peer store.
 */
export class SessionManager extends EventEmitter {
  private sessions = new Map<string, Session>();
  private readonly logger: Logger | null;

  constructor(private readonly config: SessionManagerConfig) {
    super();
    this.logger = config.logger ?? null;
  }

  override on<E extends keyof SessionManagerEvents>(event: E, listener: SessionManagerEvents[E]): this {
    return super.on(event, listener);
  }

  override emit<E extends keyof SessionManagerEvents>(
    event: E,
    ...args: Parameters<SessionManagerEvents[E]>
  ): boolean {
    return super.emit(event, ...args);
  }

  /**
   * Open a session over a freshly authenticated link. An existing session
   * with the same peer is closed as superseded first.
   */
  open(established: EstablishedLink): Session {
    const { peerId } = established;
    const store = this.config.peerStore;

    const previous = this.sessions.get(peerId);
    if (previous) {
      this.logger?.info(`New handshake with ${shortId(peerId)} supersedes the existing session`);
      previous.close('superseded');
    }

    // A superseded session leaves the peer closed; walk it back up.
    const peer = store.getPeer(peerId);
    if (peer?.state === 'closed') {
      store.transition(peerId, 'authenticating');
    }
    store.transition(peerId, 'active');

    const session = new Session({
      ...this.config.session,
      localPeerId: this.config.localPeerId,
      remote: established.remote,
      role: established.role,
      link: established.link,
      sessionKey: established.sessionKey,
      logger: this.config.logger,
    });
    this.sessions.set(peerId, session);
    this.attach(session);

    this.logger?.info(`Session with ${shortId(peerId)} active (${established.role})`);
    this.emit('session-opened', session);
    session.start(established.buffered);
    return session;
  }

  get(peerId: string): Session | undefined {
    return this.sessions.get(peerId);
  }

  has(peerId: string): boolean {
    return this.sessions.has(peerId);
  }

  all(): Session[] {
    return Array.from(this.sessions.values());
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Close one peer's session.
   * @returns false when there was no session
   */
  close(peerId: string, reason: SessionCloseReason = 'local-close'): boolean {
    const session = this.sessions.get(peerId);
    if (!session) {
      return false;
    }
    session.close(reason);
    return true;
  }

  closeAll(reason: SessionCloseReason = 'shutdown'): void {
    for (const session of this.all()) {
      session.close(reason);
    }
  }

  private attach(session: Session): void {
    const peerId = session.peerId;
    const store = this.config.peerStore;
    const current = (): boolean => this.sessions.get(peerId) === session;

    session.on('state', (state) => {
      if (!current() || state === 'closed') {
        return;
      }
      const peer = store.getPeer(peerId);
      if (peer && peer.state !== state) {
        store.transition(peerId, state);
      }
    });

    session.on('activity', () => {
      store.touch(peerId);
    });

    session.on('context', (snapshot) => {
      this.emit('context', peerId, snapshot);
    });

    session.on('mode', (mode) => {
      this.emit('mode', peerId, mode);
    });

    session.on('violation', (reason) => {
      this.emit('violation', peerId, reason);
    });

    session.once('closed', (reason) => {
      if (!current()) {
        return;
      }
      this.sessions.delete(peerId);
      const peer = store.getPeer(peerId);
      if (peer && isAuthenticated(peer.state)) {
        store.transition(peerId, 'closed', { reason });
      }
      this.emit('session-closed', peerId, reason);
    });
  }
}
