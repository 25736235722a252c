import { describe, it } from 'node:test';
import assert from 'node:assert';
import { formatDisplayName, shortId, withTimeout } from '../src/utils.js';
import { TransientError } from '../src/errors.js';

describe('shortId', () => {
  it('should shorten long ids to eight characters', () => {
    assert.strictEqual(shortId('3f8c2247aa0b1c2d'), '3f8c2247...');
  });

  it('should leave short ids alone', () => {
    assert.strictEqual(shortId('3f8c2247'), '3f8c2247');
  });
});

describe('formatDisplayName', () => {
  it('should append the short id to a name', () => {
    assert.strictEqual(formatDisplayName('stefan', '3f8c2247aa0b1c2d'), 'stefan (3f8c2247...)');
  });

  it('should use the short id alone for a blank name', () => {
    assert.strictEqual(formatDisplayName('  ', '3f8c2247aa0b1c2d'), '3f8c2247...');
    assert.strictEqual(formatDisplayName(undefined, '3f8c2247aa0b1c2d'), '3f8c2247...');
  });
});

describe('withTimeout', () => {
  it('should pass through a value that arrives in time', async () => {
    assert.strictEqual(await withTimeout(Promise.resolve(7), 50, 'Lookup'), 7);
  });

  it('should reject with a transient error carrying the code', async () => {
    await assert.rejects(
      withTimeout(new Promise(() => {}), 10, 'Lookup', 'CONTEXT_TIMEOUT'),
      (err: unknown) =>
        err instanceof TransientError &&
        err.code === 'CONTEXT_TIMEOUT' &&
        err.message === 'Lookup timed out after 10ms',
    );
  });

  it('should pass through the original rejection', async () => {
    await assert.rejects(withTimeout(Promise.reject(new Error('boom')), 50, 'Lookup'), /boom/);
  });
});
