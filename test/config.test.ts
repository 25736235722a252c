import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  defaultNetworkConfig,
  getDefaultConfigPath,
  initMeshConfig,
  loadMeshConfig,
  loadMeshConfigAsync,
  loadNetworkConfig,
  parseMeshConfig,
  validateNetworkConfig,
} from '../src/config.js';
import { FatalError } from '../src/errors.js';
import { generateKeyPair } from '../src/identity/keypair.js';

function fatal(code: string): (err: unknown) => boolean {
  return (err: unknown) => err instanceof FatalError && err.code === code;
}

describe('network config', () => {
  it('should use the documented defaults', () => {
    assert.deepStrictEqual(loadNetworkConfig({}), {
      discoveryPort: 8888,
      linkPort: 8889,
      maxPeers: 50,
      heartbeatIntervalMs: 30_000,
      handshakeTimeoutMs: 10_000,
      degradedGraceMs: 60_000,
      peerSilenceMs: 300_000,
      rejectCooldownMs: 30_000,
      contextIntervalMs: 60_000,
      contextTimeoutMs: 5_000,
      relationshipTtlMs: 30_000,
    });
  });

  it('should read overrides from the environment in seconds', () => {
    const config = loadNetworkConfig({ P2P_MAX_PEERS: '3', P2P_HEARTBEAT_INTERVAL: '0.5', P2P_LINK_PORT: ' 9000 ' });
    assert.strictEqual(config.maxPeers, 3);
    assert.strictEqual(config.heartbeatIntervalMs, 500);
    assert.strictEqual(config.linkPort, 9000);
  });

  it('should ignore empty variables', () => {
    assert.strictEqual(loadNetworkConfig({ P2P_MAX_PEERS: '' }).maxPeers, 50);
  });

  it('should refuse non-numeric values', () => {
    assert.throws(
      () => loadNetworkConfig({ P2P_MAX_PEERS: 'lots' }),
      (err: unknown) => fatal('INVALID_CONFIG')(err) && err instanceof Error && err.message === 'P2P_MAX_PEERS must be a number, got "lots"',
    );
  });

  it('should refuse zero and negative values', () => {
    assert.throws(() => loadNetworkConfig({ P2P_HANDSHAKE_TIMEOUT: '0' }), fatal('INVALID_CONFIG'));
    assert.throws(() => loadNetworkConfig({ P2P_DEGRADED_GRACE: '-1' }), fatal('INVALID_CONFIG'));
  });

  it('should refuse fractional ports and peer caps', () => {
    assert.throws(() => loadNetworkConfig({ P2P_MAX_PEERS: '2.5' }), /maxPeers must be a whole number/);
    assert.throws(() => validateNetworkConfig({ ...defaultNetworkConfig(), linkPort: 80.1 }), fatal('INVALID_CONFIG'));
  });

  it('should refuse durations longer than a timer can wait', () => {
    assert.throws(
      () => loadNetworkConfig({ P2P_HEARTBEAT_INTERVAL: '2147484' }),
      (err: unknown) =>
        fatal('INVALID_CONFIG')(err) &&
        err instanceof Error &&
        err.message === 'heartbeatIntervalMs must be at most 2147483647 ms, got 2147484000',
    );
    assert.throws(() => loadNetworkConfig({ P2P_CONTEXT_INTERVAL: '9999999' }), /contextIntervalMs must be at most/);
    assert.strictEqual(loadNetworkConfig({ P2P_HEARTBEAT_INTERVAL: '2147483' }).heartbeatIntervalMs, 2_147_483_000);
  });

  it('should refuse ports above 65535', () => {
    assert.throws(() => loadNetworkConfig({ P2P_DISCOVERY_PORT: '70000' }), /discoveryPort must be at most 65535/);
  });
});

describe('getDefaultConfigPath', () => {
  it('should honor KINMESH_CONFIG', () => {
    assert.strictEqual(getDefaultConfigPath({ KINMESH_CONFIG: '/etc/kinmesh.json' }), '/etc/kinmesh.json');
  });

  it('should fall back to the user config directory', () => {
    assert.ok(getDefaultConfigPath({}).endsWith(join('.config', 'kinmesh', 'config.json')));
  });
});

describe('parseMeshConfig', () => {
  it('should accept a complete config and lowercase the denylist', () => {
    const identity = generateKeyPair();
    const config = parseMeshConfig({ identity, ownerId: 'alice', name: 'Ally', denylist: ['ABCDEF', 42] });

    assert.strictEqual(config.ownerId, 'alice');
    assert.strictEqual(config.name, 'Ally');
    assert.deepStrictEqual(config.denylist, ['abcdef']);
  });

  it('should report a missing identity as unavailable', () => {
    assert.throws(() => parseMeshConfig({ ownerId: 'alice' }), fatal('IDENTITY_UNAVAILABLE'));
  });

  it('should report mismatched keys as unavailable', () => {
    const one = generateKeyPair();
    const two = generateKeyPair();
    assert.throws(
      () => parseMeshConfig({ identity: { publicKey: one.publicKey, privateKey: two.privateKey }, ownerId: 'alice' }),
      fatal('IDENTITY_UNAVAILABLE'),
    );
  });

  it('should require an owner', () => {
    assert.throws(() => parseMeshConfig({ identity: generateKeyPair(), ownerId: ' ' }), fatal('INVALID_CONFIG'));
  });

  it('should require the denylist to be an array', () => {
    assert.throws(
      () => parseMeshConfig({ identity: generateKeyPair(), ownerId: 'alice', denylist: 'abc' }),
      fatal('INVALID_CONFIG'),
    );
  });
});

describe('config files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'kinmesh-config-test-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should create a new identity on init and reuse it afterwards', () => {
    const path = join(dir, 'nested', 'config.json');

    const first = initMeshConfig(path, 'alice', 'Ally');
    const second = initMeshConfig(path, 'ignored');

    assert.strictEqual(first.created, true);
    assert.strictEqual(second.created, false);
    assert.strictEqual(second.config.ownerId, 'alice');
    assert.strictEqual(second.config.identity.publicKey, first.config.identity.publicKey);
    assert.deepStrictEqual(JSON.parse(readFileSync(path, 'utf-8')).denylist, []);
  });

  it('should report a missing file as identity unavailable', async () => {
    const path = join(dir, 'absent.json');
    assert.throws(() => loadMeshConfig(path), fatal('IDENTITY_UNAVAILABLE'));
    await assert.rejects(loadMeshConfigAsync(path), fatal('IDENTITY_UNAVAILABLE'));
  });

  it('should report broken JSON as invalid config', async () => {
    const path = join(dir, 'broken.json');
    writeFileSync(path, '{ not json');
    assert.throws(() => loadMeshConfig(path), fatal('INVALID_CONFIG'));
    await assert.rejects(loadMeshConfigAsync(path), fatal('INVALID_CONFIG'));
  });
});
