import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  canonicalize,
  computeAuthTag,
  createEnvelope,
  decodeEnvelope,
  encodeEnvelope,
  isMessageType,
  stableStringify,
  verifyAuthTag,
} from '../src/message/envelope.js';

const KEY = Buffer.alloc(32, 7);
const OTHER_KEY = Buffer.alloc(32, 9);

describe('Envelope', () => {
  describe('stableStringify', () => {
    it('should sort keys recursively', () => {
      assert.strictEqual(stableStringify({ b: 1, a: { d: 2, c: [3, { f: 4, e: 5 }] } }), '{"a":{"c":[3,{"e":5,"f":4}],"d":2},"b":1}');
    });

    it('should skip undefined properties', () => {
      assert.strictEqual(stableStringify({ a: 1, b: undefined }), '{"a":1}');
    });
  });

  describe('canonicalize', () => {
    it('should produce the same text regardless of payload key order', () => {
      const a = canonicalize('ping', 'abc', 1, { x: 1, y: 2 });
      const b = canonicalize('ping', 'abc', 1, { y: 2, x: 1 });
      assert.strictEqual(a, b);
    });

    it('should change with the sequence', () => {
      assert.notStrictEqual(canonicalize('ping', 'abc', 1, {}), canonicalize('ping', 'abc', 2, {}));
    });
  });

  describe('createEnvelope', () => {
    it('should leave the auth tag empty without a session key', () => {
      const env = createEnvelope('handshake-init', 'abc', 0, { nonce: '00' });
      assert.strictEqual(env.authTag, '');
    });

    it('should tag the canonical form with the session key', () => {
      const env = createEnvelope('ping', 'abc', 3, { sentAt: 1 }, KEY);
      assert.strictEqual(env.authTag, computeAuthTag(canonicalize('ping', 'abc', 3, { sentAt: 1 }), KEY));
    });
  });

  describe('verifyAuthTag', () => {
    it('should accept an untouched envelope', () => {
      const env = createEnvelope('pong', 'abc', 4, { pingSequence: 1 }, KEY);
      assert.deepStrictEqual(verifyAuthTag(env, KEY), { valid: true });
    });

    it('should reject a tampered payload', () => {
      const env = createEnvelope('pong', 'abc', 4, { pingSequence: 1 }, KEY);
      const tampered = { ...env, payload: { pingSequence: 2 } };
      assert.deepStrictEqual(verifyAuthTag(tampered, KEY), { valid: false, reason: 'auth_tag_invalid' });
    });

    it('should reject a tampered sequence', () => {
      const env = createEnvelope('pong', 'abc', 4, { pingSequence: 1 }, KEY);
      assert.strictEqual(verifyAuthTag({ ...env, sequence: 5 }, KEY).valid, false);
    });

    it('should reject a tag made under another key', () => {
      const env = createEnvelope('pong', 'abc', 4, { pingSequence: 1 }, OTHER_KEY);
      assert.deepStrictEqual(verifyAuthTag(env, KEY), { valid: false, reason: 'auth_tag_invalid' });
    });

    it('should accept a payload whose values serialize through toJSON', () => {
      const env = createEnvelope('context-update', 'abc', 2, { snapshot: { at: new Date(86_400_000) }, generatedAt: 0 }, KEY);
      const decoded = decodeEnvelope(encodeEnvelope(env));
      assert.ok(decoded.ok);
      assert.deepStrictEqual(decoded.envelope.payload, { snapshot: { at: '1970-01-02T00:00:00.000Z' }, generatedAt: 0 });
      assert.deepStrictEqual(verifyAuthTag(decoded.envelope, KEY), { valid: true });
    });

    it('should report a missing tag', () => {
      const env = createEnvelope('pong', 'abc', 4, { pingSequence: 1 });
      assert.deepStrictEqual(verifyAuthTag(env, KEY), { valid: false, reason: 'auth_tag_missing' });
    });
  });

  describe('decodeEnvelope', () => {
    it('should decode what encodeEnvelope produced', () => {
      const env = createEnvelope('context-update', 'abc', 9, { snapshot: { general_mood: 'calm' }, generatedAt: 1 }, KEY);
      const decoded = decodeEnvelope(encodeEnvelope(env));

      assert.deepStrictEqual(decoded, { ok: true, envelope: env });
    });

    it('should keep unknown types for the caller to judge', () => {
      const decoded = decodeEnvelope(JSON.stringify({ type: 'gossip', sender: 'abc', sequence: 1, payload: {}, authTag: '' }));

      assert.strictEqual(decoded.ok, true);
      assert.strictEqual(decoded.ok && decoded.envelope.type, 'gossip');
    });

    const cases: Array<[string, string]> = [
      ['not json', 'invalid_json'],
      ['[1,2]', 'not_an_object'],
      [JSON.stringify({ sender: 'a', sequence: 1, payload: {}, authTag: '' }), 'missing_type'],
      [JSON.stringify({ type: 'ping', sequence: 1, payload: {}, authTag: '' }), 'missing_sender'],
      [JSON.stringify({ type: 'ping', sender: 'a', sequence: -1, payload: {}, authTag: '' }), 'invalid_sequence'],
      [JSON.stringify({ type: 'ping', sender: 'a', sequence: 1.5, payload: {}, authTag: '' }), 'invalid_sequence'],
      [JSON.stringify({ type: 'ping', sender: 'a', sequence: 1, payload: {} }), 'missing_auth_tag'],
      [JSON.stringify({ type: 'ping', sender: 'a', sequence: 1, authTag: '' }), 'missing_payload'],
    ];

    for (const [frame, reason] of cases) {
      it(`should reject ${reason} (${frame.slice(0, 24)})`, () => {
        assert.deepStrictEqual(decodeEnvelope(frame), { ok: false, reason });
      });
    }
  });

  describe('isMessageType', () => {
    it('should recognize the eight message types only', () => {
      assert.strictEqual(isMessageType('mode-broadcast'), true);
      assert.strictEqual(isMessageType('close'), true);
      assert.strictEqual(isMessageType('announce'), false);
      assert.strictEqual(isMessageType(3), false);
    });
  });
});
