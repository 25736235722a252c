import { describe, it } from 'node:test';
import assert from 'node:assert';
import { Session, type SessionCloseReason, type SessionConfig } from '../src/session/session.js';
import {
  canonicalize,
  computeAuthTag,
  createEnvelope,
  decodeEnvelope,
  encodeEnvelope,
  type MessageType,
} from '../src/message/envelope.js';
import { filterContext } from '../src/policy/context-filter.js';
import { FakeLink } from './helpers/fake-link.js';

const KEY = Buffer.alloc(32, 7);
const REMOTE_ID = 'remote-peer';

function remoteFrame(type: MessageType, sequence: number, payload: unknown, sender = REMOTE_ID): string {
  return encodeEnvelope(createEnvelope(type, sender, sequence, payload, KEY));
}

function setup(overrides: Partial<SessionConfig> = {}): {
  session: Session;
  link: FakeLink;
  clock: { now: number };
  closed: SessionCloseReason[];
} {
  const link = new FakeLink();
  const clock = { now: 0 };
  const session = new Session({
    localPeerId: 'local-peer',
    remote: { peerId: REMOTE_ID, ownerId: 'bob', publicKey: 'aa' },
    role: 'initiator',
    link,
    sessionKey: KEY,
    heartbeatIntervalMs: 1000,
    degradedGraceMs: 60_000,
    timers: false,
    now: () => clock.now,
    ...overrides,
  });
  const closed: SessionCloseReason[] = [];
  session.on('closed', (reason) => closed.push(reason));
  session.start();
  return { session, link, clock, closed };
}

/** Tick once a second from `from` to `to` inclusive. */
function tick(session: Session, clock: { now: number }, from: number, to: number): void {
  for (let t = from; t <= to; t += 1000) {
    clock.now = t;
    session.heartbeat();
  }
}

describe('Session', () => {
  describe('receive', () => {
    it('should accept strictly increasing sequences and drop the rest', () => {
      const { session } = setup();
      const seen: unknown[] = [];
      session.on('context', (snapshot) => seen.push(snapshot.n));

      const results = [1, 2, 2, 5, 4, 6].map(seq =>
        session.receive(remoteFrame('context-update', seq, { snapshot: { n: seq }, generatedAt: 0 })),
      );

      assert.deepStrictEqual(results, ['accepted', 'accepted', 'duplicate', 'accepted', 'duplicate', 'accepted']);
      assert.deepStrictEqual(seen, [1, 2, 5, 6]);
      assert.strictEqual(session.lastReceivedSequence, 6);
    });

    it('should answer a ping with a pong naming its sequence', () => {
      const { session, link } = setup();

      session.receive(remoteFrame('ping', 4, { sentAt: 0 }));

      const [pong] = link.envelopes();
      assert.ok(pong);
      assert.strictEqual(pong.type, 'pong');
      assert.deepStrictEqual(pong.payload, { pingSequence: 4 });
      assert.strictEqual(pong.sender, 'local-peer');
      assert.strictEqual(pong.sequence, 1);
    });

    it('should relay mode broadcasts', () => {
      const { session } = setup();
      const modes: string[] = [];
      session.on('mode', (mode) => modes.push(mode));

      assert.strictEqual(session.receive(remoteFrame('mode-broadcast', 1, { mode: 'educational' })), 'accepted');
      assert.deepStrictEqual(modes, ['educational']);
    });

    it('should drop unrecognized types without counting a violation', () => {
      const { session } = setup();
      const violations: string[] = [];
      session.on('violation', (reason) => violations.push(reason));
      const frame = JSON.stringify({
        type: 'gossip',
        sender: REMOTE_ID,
        sequence: 1,
        payload: {},
        authTag: computeAuthTag(canonicalize('gossip', REMOTE_ID, 1, {}), KEY),
      });

      assert.strictEqual(session.receive(frame), 'dropped');
      assert.deepStrictEqual(violations, []);
      assert.strictEqual(session.lastReceivedSequence, 1);
    });

    it('should close after repeated protocol violations', () => {
      const { session, link, closed } = setup();
      const counts: number[] = [];
      session.on('violation', (_reason, count) => counts.push(count));
      const tampered = decodeEnvelope(remoteFrame('ping', 2, { sentAt: 0 }));
      assert.ok(tampered.ok);

      session.receive('not json');
      session.receive(remoteFrame('ping', 1, { sentAt: 0 }, 'someone-else'));
      session.receive(encodeEnvelope({ ...tampered.envelope, payload: { sentAt: 1 } }));

      assert.deepStrictEqual(counts, [1, 2, 3]);
      assert.deepStrictEqual(closed, ['protocol-violation']);
      assert.deepStrictEqual(link.types(), ['close']);
      assert.strictEqual(link.isOpen(), false);
    });

    it('should treat a handshake frame on a session as a violation', () => {
      const { session } = setup();
      const violations: string[] = [];
      session.on('violation', (reason) => violations.push(reason));

      assert.strictEqual(session.receive(remoteFrame('handshake-ack', 1, { signature: 'ab' })), 'dropped');
      assert.deepStrictEqual(violations, ['unexpected handshake-ack on an established session']);
    });

    it('should close quietly when the remote closes', () => {
      const { session, link, closed } = setup();

      session.receive(remoteFrame('close', 1, { reason: 'shutdown' }));

      assert.strictEqual(session.state, 'closed');
      assert.deepStrictEqual(closed, ['remote-close']);
      assert.deepStrictEqual(link.sent, []);
    });

    it('should process frames buffered during the handshake first', () => {
      const link = new FakeLink();
      const session = new Session({
        localPeerId: 'local-peer',
        remote: { peerId: REMOTE_ID, ownerId: 'bob', publicKey: 'aa' },
        role: 'responder',
        link,
        sessionKey: KEY,
        heartbeatIntervalMs: 1000,
        degradedGraceMs: 60_000,
        timers: false,
      });
      const modes: string[] = [];
      session.on('mode', (mode) => modes.push(mode));

      session.start([remoteFrame('mode-broadcast', 1, { mode: 'healthcare' })]);
      link.emit('message', remoteFrame('mode-broadcast', 2, { mode: 'default' }));

      assert.deepStrictEqual(modes, ['healthcare', 'default']);
    });
  });

  describe('heartbeat', () => {
    it('should degrade after three missed pongs and close when the grace runs out', () => {
      const { session, link, clock, closed } = setup();
      const states: string[] = [];
      session.on('state', (state) => states.push(state));

      tick(session, clock, 0, 3000);
      assert.strictEqual(session.state, 'active');
      assert.strictEqual(session.missed, 2);

      tick(session, clock, 4000, 4000);
      assert.strictEqual(session.state, 'degraded');

      tick(session, clock, 5000, 63_000);
      assert.strictEqual(session.state, 'degraded');

      tick(session, clock, 64_000, 64_000);
      assert.strictEqual(session.state, 'closed');
      assert.deepStrictEqual(closed, ['heartbeat-timeout']);
      assert.deepStrictEqual(states, ['degraded', 'closed']);
      assert.strictEqual(link.types().at(-1), 'close');
    });

    it('should stay active while pongs come back', () => {
      const { session, link, clock } = setup();

      for (let t = 0; t <= 10_000; t += 1000) {
        clock.now = t;
        session.heartbeat();
        const ping = link.envelopes().at(-1);
        assert.ok(ping);
        assert.strictEqual(ping.type, 'ping');
        session.receive(remoteFrame('pong', t / 1000 + 1, { pingSequence: ping.sequence }));
      }

      assert.strictEqual(session.state, 'active');
      assert.strictEqual(session.missed, 0);
      assert.deepStrictEqual(session.heartbeatTimes, { pingSentAt: 10_000, pongReceivedAt: 10_000 });
    });

    it('should queue while degraded and flush in order on recovery', () => {
      const { session, link, clock } = setup({ maxMissedHeartbeats: 1 });
      tick(session, clock, 0, 2000);
      assert.strictEqual(session.state, 'degraded');
      const pingsSent = link.sent.length;

      const context = filterContext({ general_mood: 'calm', health: 'private' }, { type: 'stranger' });
      assert.strictEqual(session.sendContext(context), 'queued');
      assert.strictEqual(session.sendMode('educational'), 'queued');
      assert.strictEqual(link.sent.length, pingsSent);

      session.receive(remoteFrame('pong', 1, { pingSequence: 1 }));

      assert.strictEqual(session.state, 'active');
      assert.strictEqual(session.queuedCount, 0);
      const flushed = link.envelopes().slice(pingsSent);
      assert.deepStrictEqual(flushed.map(e => e.type), ['context-update', 'mode-broadcast']);
      assert.deepStrictEqual(flushed[0]?.payload, { snapshot: { general_mood: 'calm' }, generatedAt: 2000 });
      assert.deepStrictEqual(flushed.map(e => e.sequence), [pingsSent + 1, pingsSent + 2]);
    });

    it('should drop the oldest queued message when the queue is full', () => {
      const { session, link, clock } = setup({ maxMissedHeartbeats: 1, maxQueueSize: 2 });
      tick(session, clock, 0, 2000);
      const pingsSent = link.sent.length;

      session.sendMode('default');
      session.sendMode('educational');
      session.sendMode('healthcare');
      assert.strictEqual(session.queuedCount, 2);

      session.receive(remoteFrame('pong', 1, { pingSequence: 1 }));

      const flushed = link.envelopes().slice(pingsSent);
      assert.deepStrictEqual(flushed.map(e => e.payload), [{ mode: 'educational' }, { mode: 'healthcare' }]);
    });
  });

  describe('close', () => {
    it('should notify the remote, close the link and fire once', () => {
      const { session, link, closed } = setup();

      session.close('local-close');
      session.close('shutdown');

      assert.deepStrictEqual(closed, ['local-close']);
      assert.deepStrictEqual(link.envelopes().map(e => e.payload), [{ reason: 'local-close' }]);
      assert.strictEqual(session.sendMode('default'), 'dropped');
      assert.strictEqual(session.receive(remoteFrame('ping', 1, { sentAt: 0 })), 'dropped');
    });

    it('should close when the link drops', () => {
      const { session, link, closed } = setup();

      link.close();

      assert.strictEqual(session.state, 'closed');
      assert.deepStrictEqual(closed, ['link-lost']);
    });
  });

  it('should number outbound messages from one', () => {
    const { session, link } = setup();

    session.sendMode('default');
    session.sendMode('kalki');

    assert.deepStrictEqual(link.envelopes().map(e => e.sequence), [1, 2]);
    assert.strictEqual(session.lastSentSequence, 2);
  });

  describe('serialized values', () => {
    it('should deliver context holding dates and toJSON values to the peer', () => {
      const { session: sender, link } = setup();
      const receiverLink = new FakeLink();
      const receiver = new Session({
        localPeerId: REMOTE_ID,
        remote: { peerId: 'local-peer', ownerId: 'alice', publicKey: 'bb' },
        role: 'responder',
        link: receiverLink,
        sessionKey: KEY,
        heartbeatIntervalMs: 1000,
        degradedGraceMs: 60_000,
        timers: false,
        now: () => 0,
      });
      receiver.start();
      const received: Record<string, unknown>[] = [];
      const violations: string[] = [];
      receiver.on('context', (snapshot) => received.push(snapshot));
      receiver.on('violation', (reason) => violations.push(reason));

      const context = filterContext(
        {
          general_mood: 'ok',
          activities: { since: new Date(0), streak: { toJSON: () => 'three days' } },
        },
        { type: 'friend' },
      );
      assert.strictEqual(sender.sendContext(context), 'sent');

      const frame = link.sent[link.sent.length - 1];
      assert.ok(frame);
      assert.strictEqual(receiver.receive(frame), 'accepted');
      assert.deepStrictEqual(violations, []);
      assert.deepStrictEqual(received, [
        { general_mood: 'ok', activities: { since: '1970-01-01T00:00:00.000Z', streak: 'three days' } },
      ]);
    });
  });
});
