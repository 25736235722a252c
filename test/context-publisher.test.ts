import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ContextPublisher, type ContextProvider } from '../src/session/context-publisher.js';
import { Session } from '../src/session/session.js';
import { RelationshipCache } from '../src/policy/relationship-cache.js';
import type { ContextSnapshot, Relationship } from '../src/policy/sharing-policy.js';
import { FakeLink } from './helpers/fake-link.js';

const KEY = Buffer.alloc(32, 3);

function sessionWith(link: FakeLink): Session {
  const session = new Session({
    localPeerId: 'local-peer',
    remote: { peerId: 'remote-peer', ownerId: 'bob', publicKey: 'aa' },
    role: 'initiator',
    link,
    sessionKey: KEY,
    heartbeatIntervalMs: 1000,
    degradedGraceMs: 60_000,
    timers: false,
    now: () => 500,
  });
  session.start();
  return session;
}

function publisherFor(
  relationship: Relationship | null,
  provider: ContextProvider,
  contextTimeoutMs = 1000,
): ContextPublisher {
  const registry = {
    getRelationship: async (local: string, remote: string) =>
      local === 'alice' && remote === 'bob' ? relationship : null,
  };
  return new ContextPublisher({
    ownerId: 'alice',
    provider,
    relationships: new RelationshipCache(registry, { ttlMs: 30_000 }),
    contextTimeoutMs,
  });
}

function fixed(snapshot: ContextSnapshot): ContextProvider {
  return { getSnapshot: async () => snapshot };
}

const SNAPSHOT = {
  general_mood: 'upbeat',
  activities: 'hiking',
  health: 'recovering',
  private_thoughts: 'nervous about the trip',
  shoe_size: 44,
};

describe('ContextPublisher', () => {
  it('should send only what the relationship allows', async () => {
    const link = new FakeLink();
    const result = await publisherFor({ type: 'friend' }, fixed(SNAPSHOT)).publish(sessionWith(link));

    assert.deepStrictEqual(result, { peerId: 'remote-peer', status: 'sent', categories: ['general_mood', 'activities'] });
    const [update] = link.envelopes();
    assert.ok(update);
    assert.strictEqual(update.type, 'context-update');
    assert.deepStrictEqual(update.payload, {
      snapshot: { general_mood: 'upbeat', activities: 'hiking' },
      generatedAt: 500,
    });
  });

  it('should treat an unknown relationship as stranger', async () => {
    const link = new FakeLink();
    const result = await publisherFor(null, fixed(SNAPSHOT)).publish(sessionWith(link));

    assert.deepStrictEqual(result, { peerId: 'remote-peer', status: 'sent', categories: ['general_mood'] });
  });

  it('should share private thoughts with family only when revealed', async () => {
    const link = new FakeLink();
    const relationship: Relationship = { type: 'family', revealedTopics: ['Private_Thoughts'] };
    const result = await publisherFor(relationship, fixed(SNAPSHOT)).publish(sessionWith(link));

    assert.ok(result.status === 'sent');
    assert.deepStrictEqual(result.categories, ['general_mood', 'activities', 'health', 'private_thoughts']);
  });

  it('should withhold everything from a blocked user', async () => {
    const link = new FakeLink();
    const result = await publisherFor({ type: 'blocked' }, fixed(SNAPSHOT)).publish(sessionWith(link));

    assert.deepStrictEqual(result, { peerId: 'remote-peer', status: 'withheld', reason: 'blocked' });
    assert.deepStrictEqual(link.sent, []);
  });

  it('should skip the cycle when the provider is too slow', async () => {
    const link = new FakeLink();
    const slow: ContextProvider = { getSnapshot: () => new Promise(() => {}) };
    const result = await publisherFor({ type: 'friend' }, slow, 20).publish(sessionWith(link));

    assert.deepStrictEqual(result, {
      peerId: 'remote-peer',
      status: 'skipped',
      reason: 'TransientError(CONTEXT_TIMEOUT): Context snapshot timed out after 20ms',
    });
    assert.deepStrictEqual(link.sent, []);
  });

  it('should skip the cycle when the provider fails', async () => {
    const failing: ContextProvider = { getSnapshot: async () => { throw new Error('store offline'); } };
    const result = await publisherFor({ type: 'friend' }, failing).publish(sessionWith(new FakeLink()));

    assert.deepStrictEqual(result, { peerId: 'remote-peer', status: 'skipped', reason: 'store offline' });
  });

  it('should skip when nothing is shareable', async () => {
    const link = new FakeLink();
    const result = await publisherFor({ type: 'stranger' }, fixed({ health: 'ok' })).publish(sessionWith(link));

    assert.deepStrictEqual(result, { peerId: 'remote-peer', status: 'skipped', reason: 'nothing shareable' });
    assert.deepStrictEqual(link.sent, []);
  });

  describe('publishMode', () => {
    it('should send a mode the relationship may see', async () => {
      const link = new FakeLink();
      const result = await publisherFor({ type: 'friend' }, fixed({})).publishMode(sessionWith(link), 'educational');

      assert.deepStrictEqual(result, { peerId: 'remote-peer', status: 'sent', categories: [] });
      assert.deepStrictEqual(link.envelopes().map(e => e.payload), [{ mode: 'educational' }]);
    });

    it('should withhold a mode that reveals too much', async () => {
      const link = new FakeLink();
      const result = await publisherFor({ type: 'friend' }, fixed({})).publishMode(sessionWith(link), 'healthcare');

      assert.deepStrictEqual(result, {
        peerId: 'remote-peer',
        status: 'withheld',
        reason: 'mode not shareable with friend',
      });
      assert.deepStrictEqual(link.sent, []);
    });
  });
});
