import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  CONTEXT_CATEGORIES,
  baselinePolicy,
  baselineTypeOf,
  normalizeTopic,
  resolveSharingPolicy,
  type Relationship,
} from '../src/policy/sharing-policy.js';

function allowed(relationship: Relationship): string[] {
  return [...resolveSharingPolicy(relationship).allowed].sort();
}

describe('SharingPolicy', () => {
  describe('baselinePolicy', () => {
    it('should allow strangers mood and status only', () => {
      assert.deepStrictEqual([...baselinePolicy('stranger').allowed].sort(), ['basic_status', 'general_mood']);
    });

    it('should allow friends the friend table', () => {
      assert.deepStrictEqual([...baselinePolicy('friend').allowed].sort(), [
        'activities',
        'basic_status',
        'general_life_updates',
        'general_mood',
        'interests',
        'work_status',
      ]);
    });

    it('should allow family everything but private thoughts', () => {
      const policy = baselinePolicy('family');
      assert.strictEqual(policy.allowed.size, CONTEXT_CATEGORIES.length - 1);
      assert.strictEqual(policy.allowed.has('private_thoughts'), false);
      assert.deepStrictEqual([...policy.denied], ['private_thoughts']);
    });

    it('should partition the known categories', () => {
      for (const type of ['stranger', 'friend', 'family'] as const) {
        const policy = baselinePolicy(type);
        assert.strictEqual(policy.allowed.size + policy.denied.size, CONTEXT_CATEGORIES.length);
      }
    });
  });

  describe('resolveSharingPolicy', () => {
    it('should deny everything to blocked users', () => {
      const policy = resolveSharingPolicy({ type: 'blocked' });
      assert.strictEqual(policy.allowed.size, 0);
      assert.strictEqual(policy.denied.size, CONTEXT_CATEGORIES.length);
    });

    it('should let family reveal private thoughts', () => {
      const policy = resolveSharingPolicy({ type: 'family', revealedTopics: ['  Private_Thoughts '] });
      assert.strictEqual(policy.allowed.has('private_thoughts'), true);
    });

    it('should ignore revealed topics outside family', () => {
      assert.deepStrictEqual(allowed({ type: 'friend', revealedTopics: ['private_thoughts', 'health'] }), allowed({ type: 'friend' }));
    });

    it('should only honor private thoughts as a revealed topic', () => {
      const policy = resolveSharingPolicy({ type: 'family', revealedTopics: ['made_up'] });
      assert.strictEqual(policy.allowed.size, CONTEXT_CATEGORIES.length - 1);
    });

    it('should narrow a custom relationship from its base type', () => {
      assert.deepStrictEqual(allowed({ type: 'custom', baseType: 'friend', hiddenTopics: ['Work_Status', 'interests '] }), [
        'activities',
        'basic_status',
        'general_life_updates',
        'general_mood',
      ]);
    });

    it('should treat a custom relationship without base as stranger', () => {
      assert.deepStrictEqual(allowed({ type: 'custom' }), ['basic_status', 'general_mood']);
    });

    it('should never widen a custom relationship', () => {
      assert.deepStrictEqual(allowed({ type: 'custom', baseType: 'stranger', revealedTopics: ['health'], hiddenTopics: ['unknown_tag'] }), [
        'basic_status',
        'general_mood',
      ]);
    });
  });

  describe('helpers', () => {
    it('should normalize topics by trimming and lowercasing', () => {
      assert.strictEqual(normalizeTopic('  Health\t'), 'health');
    });

    it('should resolve the baseline type', () => {
      assert.strictEqual(baselineTypeOf({ type: 'family' }), 'family');
      assert.strictEqual(baselineTypeOf({ type: 'custom', baseType: 'friend' }), 'friend');
      assert.strictEqual(baselineTypeOf({ type: 'blocked' }), 'stranger');
    });
  });
});
