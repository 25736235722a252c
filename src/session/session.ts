import { EventEmitter } from 'node:events';
import { PolicyError } from '../errors.js';
import type { HandshakeRole, RemoteIdentity } from '../handshake/handshake.js';
import type { Logger } from '../logger.js';
import {
  createEnvelope,
  decodeEnvelope,
  encodeEnvelope,
  isMessageType,
  verifyAuthTag,
  type MessageType,
  type WireEnvelope,
} from '../message/envelope.js';
import {
  isClosePayload,
  isContextUpdatePayload,
  isModeBroadcastPayload,
  isPingPayload,
  isPongPayload,
  type ClosePayload,
  type ContextUpdatePayload,
  type ModeBroadcastPayload,
  type PingPayload,
  type PongPayload,
} from '../message/types/session.js';
import { FilteredContext } from '../policy/context-filter.js';
import type { CompanionMode } from '../policy/modes.js';
import type { PeerLink } from '../transport/types.js';
import { shortId } from '../utils.js';

export type SessionState = 'active' | 'degraded' | 'closed';

export type SessionCloseReason =
  | 'remote-close'
  | 'superseded'
  | 'heartbeat-timeout'
  | 'evicted'
  | 'shutdown'
  | 'protocol-violation'
  | 'link-lost'
  | 'local-close';

export type SendResult = 'sent' | 'queued' | 'dropped';

export type ReceiveResult = 'accepted' | 'duplicate' | 'dropped';

export interface SessionConfig {
  localPeerId: string;
  remote: RemoteIdentity;
  role: HandshakeRole;
  link: PeerLink;
  sessionKey: Buffer;
  /** Ping period */
  heartbeatIntervalMs: number;
  /** How long a ping may stay unanswered (default: 2x the interval) */
  pongTimeoutMs?: number;
  /** Consecutive unanswered pings before degrading (default: 3) */
  maxMissedHeartbeats?: number;
  /** How long a degraded session may wait for a pong before closing */
  degradedGraceMs: number;
  /** Outbound messages kept while degraded (default: 256) */
  maxQueueSize?: number;
  /** Protocol violations tolerated before closing (default: 3) */
  maxProtocolViolations?: number;
  /** Run the heartbeat on a timer (default: true); tests call heartbeat() instead */
  timers?: boolean;
  now?: () => number;
  logger?: Logger;
}

/**
 * Events emitted by Session
 */
export interface SessionEvents {
  /** Context update received; the payload is handed over unchanged */
  'context': (snapshot: Record<string, unknown>, generatedAt: number) => void;
  'mode': (mode: CompanionMode) => void;
  'state': (state: SessionState, previous: SessionState) => void;
  /** Any authenticated message arrived */
  'activity': () => void;
  'violation': (reason: string, count: number) => void;
  'closed': (reason: SessionCloseReason) => void;
}

interface QueuedMessage {
  type: MessageType;
  payload: unknown;
}

const DEFAULT_MAX_MISSED = 3;
const DEFAULT_MAX_QUEUE = 256;
const DEFAULT_MAX_VIOLATIONS = 3;

/**
 * An authenticated channel to one peer.
 *
 * Owns the sequence counters, heartbeat bookkeeping and the outbound queue
 * used while degraded. Every inbound frame passes, in order: shape, sender,
 * auth tag, sequence, type.
 */
export class Session extends EventEmitter {
  readonly peerId: string;
  readonly remote: RemoteIdentity;
  readonly role: HandshakeRole;
  readonly establishedAt: number;

  private _state: SessionState = 'active';
  private sentSequence = 0;
  private receivedSequence = 0;
  private outstandingPings = new Map<number, number>();
  private missedHeartbeats = 0;
  private violations = 0;
  private degradedSince: number | null = null;
  private lastPingSentAt: number | null = null;
  private lastPongAt: number | null = null;
  private queue: QueuedMessage[] = [];
  private timer: NodeJS.Timeout | null = null;
  private started = false;

  private readonly link: PeerLink;
  private readonly key: Buffer;
  private readonly now: () => number;
  private readonly pongTimeoutMs: number;
  private readonly maxMissed: number;
  private readonly maxQueue: number;
  private readonly maxViolations: number;
  private readonly logger: Logger | null;

  private readonly onMessage = (frame: string): void => {
    this.receive(frame);
  };

  private readonly onLinkClose = (): void => {
    this.close('link-lost', { notify: false });
  };

  constructor(private readonly config: SessionConfig) {
    super();
    this.peerId = config.remote.peerId;
    this.remote = config.remote;
    this.role = config.role;
    this.link = config.link;
    this.key = config.sessionKey;
    this.now = config.now ?? Date.now;
    this.pongTimeoutMs = config.pongTimeoutMs ?? config.heartbeatIntervalMs * 2;
    this.maxMissed = config.maxMissedHeartbeats ?? DEFAULT_MAX_MISSED;
    this.maxQueue = config.maxQueueSize ?? DEFAULT_MAX_QUEUE;
    this.maxViolations = config.maxProtocolViolations ?? DEFAULT_MAX_VIOLATIONS;
    this.logger = config.logger ?? null;
    this.establishedAt = this.now();
  }

  override on<E extends keyof SessionEvents>(event: E, listener: SessionEvents[E]): this {
    return super.on(event, listener);
  }

  override once<E extends keyof SessionEvents>(event: E, listener: SessionEvents[E]): this {
    return super.once(event, listener);
  }

  override emit<E extends keyof SessionEvents>(event: E, ...args: Parameters<SessionEvents[E]>): boolean {
    return super.emit(event, ...args);
  }

  get state(): SessionState {
    return this._state;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  get lastReceivedSequence(): number {
    return this.receivedSequence;
  }

  get lastSentSequence(): number {
    return this.sentSequence;
  }

  get missed(): number {
    return this.missedHeartbeats;
  }

  /** When the last ping went out and the last pong came back */
  get heartbeatTimes(): { pingSentAt: number | null; pongReceivedAt: number | null } {
    return { pingSentAt: this.lastPingSentAt, pongReceivedAt: this.lastPongAt };
  }

  /**
   * Attach to the link and start heartbeats. Frames that arrived during
   * the handshake are processed first.
   */
  start(buffered: readonly string[] = []): void {
    if (this.started || this._state === 'closed') {
      return;
    }
    this.started = true;
    this.link.on('message', this.onMessage);
    this.link.on('close', this.onLinkClose);

    for (const frame of buffered) {
      this.receive(frame);
    }

    if (this.state !== 'closed' && !this.link.isOpen()) {
      this.close('link-lost', { notify: false });
      return;
    }

    if (this.config.timers !== false && this.state !== 'closed') {
      this.timer = setInterval(() => this.heartbeat(), this.config.heartbeatIntervalMs);
    }
  }

  /**
   * Send a context update. Only filtered contexts are accepted.
   * @throws PolicyError if handed anything that did not pass the filter
   */
  sendContext(context: FilteredContext): SendResult {
    if (!(context instanceof FilteredContext)) {
      throw new PolicyError('Refusing to send an unfiltered context', 'POLICY_VIOLATION');
    }
    const payload: ContextUpdatePayload = { snapshot: { ...context.values }, generatedAt: this.now() };
    return this.send('context-update', payload);
  }

  sendMode(mode: CompanionMode): SendResult {
    const payload: ModeBroadcastPayload = { mode };
    return this.send('mode-broadcast', payload);
  }

  /**
   * One heartbeat tick: expire unanswered pings, update the state, then ping.
   */
  heartbeat(): void {
    if (this._state === 'closed') {
      return;
    }
    const now = this.now();

    for (const [sequence, sentAt] of this.outstandingPings) {
      if (now - sentAt >= this.pongTimeoutMs) {
        this.outstandingPings.delete(sequence);
        this.missedHeartbeats++;
      }
    }

    if (this._state === 'active' && this.missedHeartbeats >= this.maxMissed) {
      this.degradedSince = now;
      this.setState('degraded');
      this.logger?.warn(`Session with ${shortId(this.peerId)} degraded after ${this.missedHeartbeats} missed heartbeats`);
    }

    if (this._state === 'degraded' && this.degradedSince !== null && now - this.degradedSince >= this.config.degradedGraceMs) {
      this.close('heartbeat-timeout');
      return;
    }

    const ping: PingPayload = { sentAt: now };
    const sequence = this.write('ping', ping);
    if (sequence !== null) {
      this.outstandingPings.set(sequence, now);
      this.lastPingSentAt = now;
    }
  }

  /**
   * Validate and dispatch one inbound frame.
   */
  receive(frame: string): ReceiveResult {
    if (this._state === 'closed') {
      return 'dropped';
    }

    const decoded = decodeEnvelope(frame);
    if (!decoded.ok) {
      this.violation(`malformed frame (${decoded.reason})`);
      return 'dropped';
    }
    const envelope = decoded.envelope;

    if (envelope.sender !== this.peerId) {
      this.violation(`sender ${shortId(envelope.sender)} does not match session peer`);
      return 'dropped';
    }

    const auth = verifyAuthTag(envelope, this.key);
    if (!auth.valid) {
      this.violation(`bad auth tag (${auth.reason ?? 'unknown'})`);
      return 'dropped';
    }

    if (envelope.sequence <= this.receivedSequence) {
      this.logger?.debug(`Duplicate sequence ${envelope.sequence} from ${shortId(this.peerId)} dropped`);
      return 'duplicate';
    }
    this.receivedSequence = envelope.sequence;
    this.emit('activity');

    if (!isMessageType(envelope.type)) {
      this.logger?.info(`Unrecognized message type "${envelope.type}" from ${shortId(this.peerId)} dropped`);
      return 'dropped';
    }

    return this.dispatch(envelope.type, envelope) ? 'accepted' : 'dropped';
  }

  /**
   * Tear the session down. Idempotent. Timers and link listeners are gone
   * and the 'closed' event has fired by the time this returns.
   */
  close(reason: SessionCloseReason, options: { notify?: boolean } = {}): void {
    if (this._state === 'closed') {
      return;
    }

    if (options.notify !== false && this.link.isOpen()) {
      const payload: ClosePayload = { reason };
      this.write('close', payload);
    }

    const previous = this._state;
    this._state = 'closed';
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.link.off('message', this.onMessage);
    this.link.off('close', this.onLinkClose);
    this.link.close();

    if (this.queue.length > 0) {
      this.logger?.debug(`Discarding ${this.queue.length} queued messages for ${shortId(this.peerId)}`);
    }
    this.queue = [];
    this.outstandingPings.clear();

    this.logger?.info(`Session with ${shortId(this.peerId)} closed: ${reason}`);
    this.emit('state', 'closed', previous);
    this.emit('closed', reason);
  }

  private dispatch(type: MessageType, envelope: WireEnvelope): boolean {
    const payload = envelope.payload;

    switch (type) {
      case 'ping': {
        if (!isPingPayload(payload)) break;
        const pong: PongPayload = { pingSequence: envelope.sequence };
        this.write('pong', pong);
        return true;
      }
      case 'pong': {
        if (!isPongPayload(payload)) break;
        this.handlePong(payload.pingSequence);
        return true;
      }
      case 'context-update': {
        if (!isContextUpdatePayload(payload)) break;
        this.emit('context', payload.snapshot, payload.generatedAt);
        return true;
      }
      case 'mode-broadcast': {
        if (!isModeBroadcastPayload(payload)) break;
        this.emit('mode', payload.mode);
        return true;
      }
      case 'close': {
        if (!isClosePayload(payload)) break;
        this.logger?.debug(`${shortId(this.peerId)} closed the session: ${payload.reason}`);
        this.close('remote-close', { notify: false });
        return true;
      }
      case 'handshake-init':
      case 'handshake-response':
      case 'handshake-ack':
        this.violation(`unexpected ${type} on an established session`);
        return false;
    }

    this.violation(`invalid ${type} payload`);
    return false;
  }

  private handlePong(pingSequence: number): void {
    if (!this.outstandingPings.delete(pingSequence)) {
      // Late pong for a ping already counted as missed still proves liveness.
      this.logger?.debug(`Late pong for ping ${pingSequence} from ${shortId(this.peerId)}`);
    }
    this.missedHeartbeats = 0;
    this.lastPongAt = this.now();

    if (this._state === 'degraded') {
      this.degradedSince = null;
      this.setState('active');
      this.logger?.info(`Session with ${shortId(this.peerId)} recovered`);
      this.flush();
    }
  }

  private send(type: MessageType, payload: unknown): SendResult {
    if (this._state === 'closed') {
      return 'dropped';
    }
    if (this._state === 'degraded') {
      if (this.queue.length >= this.maxQueue) {
        const dropped = this.queue.shift();
        this.logger?.warn(
          `Outbound queue for ${shortId(this.peerId)} full; dropped oldest ${dropped?.type ?? 'message'}`,
        );
      }
      this.queue.push({ type, payload });
      return 'queued';
    }
    return this.write(type, payload) === null ? 'dropped' : 'sent';
  }

  private flush(): void {
    const pending = this.queue;
    this.queue = [];
    for (const message of pending) {
      this.write(message.type, message.payload);
    }
  }

  /**
   * Frame and write immediately. Sequence numbers are assigned here so
   * they stay increasing in wire order.
   */
  private write(type: MessageType, payload: unknown): number | null {
    if (!this.link.isOpen()) {
      return null;
    }
    const sequence = ++this.sentSequence;
    const envelope = createEnvelope(type, this.config.localPeerId, sequence, payload, this.key);
    this.link.send(encodeEnvelope(envelope));
    return sequence;
  }

  private setState(state: SessionState): void {
    const previous = this._state;
    if (previous === state) {
      return;
    }
    this._state = state;
    this.emit('state', state, previous);
  }

  private violation(reason: string): void {
    this.violations++;
    this.logger?.warn(`Protocol violation from ${shortId(this.peerId)}: ${reason}`);
    this.emit('violation', reason, this.violations);
    if (this.violations >= this.maxViolations) {
      this.close('protocol-violation');
    }
  }
}
