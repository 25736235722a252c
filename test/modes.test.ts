import { describe, it } from 'node:test';
import assert from 'node:assert';
import { COMPANION_MODES, MODE_CATEGORIES, isCompanionMode, shareableMode } from '../src/policy/modes.js';

describe('modes', () => {
  it('should map every mode to a category', () => {
    for (const mode of COMPANION_MODES) {
      assert.ok(MODE_CATEGORIES[mode]);
    }
  });

  it('should recognize only the closed set of modes', () => {
    assert.strictEqual(isCompanionMode('healthcare'), true);
    assert.strictEqual(isCompanionMode('Healthcare'), false);
    assert.strictEqual(isCompanionMode(undefined), false);
  });

  it('should share the default mode with strangers', () => {
    assert.strictEqual(shareableMode('default', { type: 'stranger' }), 'default');
  });

  it('should share the educational mode with friends but not strangers', () => {
    assert.strictEqual(shareableMode('educational', { type: 'friend' }), 'educational');
    assert.strictEqual(shareableMode('educational', { type: 'stranger' }), null);
  });

  it('should share the healthcare mode with family only', () => {
    assert.strictEqual(shareableMode('healthcare', { type: 'family' }), 'healthcare');
    assert.strictEqual(shareableMode('healthcare', { type: 'friend' }), null);
  });

  it('should keep crisis modes private unless family revealed private thoughts', () => {
    assert.strictEqual(shareableMode('kalki', { type: 'family' }), null);
    assert.strictEqual(shareableMode('kalki', { type: 'family', revealedTopics: ['private_thoughts'] }), 'kalki');
    assert.strictEqual(shareableMode('jupiter', { type: 'friend' }), null);
  });

  it('should share nothing with blocked users', () => {
    assert.strictEqual(shareableMode('default', { type: 'blocked' }), null);
  });
});
