import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { homedir } from 'node:os';
import { FatalError } from './errors.js';
import { generateKeyPair, validateKeyPair } from './identity/keypair.js';

/**
 * Identity keypair as stored in the config file (hex DER).
 */
export interface MeshIdentity {
  publicKey: string;
  privateKey: string;
}

/**
 * Canonical kinmesh configuration file shape.
 * Use loadMeshConfig() to load from file.
 */
export interface MeshConfig {
  identity: MeshIdentity;
  /** The end user this companion acts for */
  ownerId: string;
  /** Human-readable alias announced to peers */
  name?: string;
  /** Identity fingerprints refused at handshake */
  denylist: string[];
}

/**
 * Network tuning read from the environment. Durations are in milliseconds.
 */
export interface NetworkConfig {
  discoveryPort: number;
  linkPort: number;
  maxPeers: number;
  heartbeatIntervalMs: number;
  handshakeTimeoutMs: number;
  degradedGraceMs: number;
  peerSilenceMs: number;
  rejectCooldownMs: number;
  contextIntervalMs: number;
  contextTimeoutMs: number;
  relationshipTtlMs: number;
}

interface EnvSetting {
  key: keyof NetworkConfig;
  variable: string;
  fallback: number;
  /** Multiplier from the variable's unit to the config's */
  scale: number;
}

const SECONDS = 1000;

const ENV_SETTINGS: readonly EnvSetting[] = [
  { key: 'discoveryPort', variable: 'P2P_DISCOVERY_PORT', fallback: 8888, scale: 1 },
  { key: 'linkPort', variable: 'P2P_LINK_PORT', fallback: 8889, scale: 1 },
  { key: 'maxPeers', variable: 'P2P_MAX_PEERS', fallback: 50, scale: 1 },
  { key: 'heartbeatIntervalMs', variable: 'P2P_HEARTBEAT_INTERVAL', fallback: 30, scale: SECONDS },
  { key: 'handshakeTimeoutMs', variable: 'P2P_HANDSHAKE_TIMEOUT', fallback: 10, scale: SECONDS },
  { key: 'degradedGraceMs', variable: 'P2P_DEGRADED_GRACE', fallback: 60, scale: SECONDS },
  { key: 'peerSilenceMs', variable: 'P2P_PEER_SILENCE', fallback: 300, scale: SECONDS },
  { key: 'rejectCooldownMs', variable: 'P2P_REJECT_COOLDOWN', fallback: 30, scale: SECONDS },
  { key: 'contextIntervalMs', variable: 'P2P_CONTEXT_INTERVAL', fallback: 60, scale: SECONDS },
  { key: 'contextTimeoutMs', variable: 'P2P_CONTEXT_TIMEOUT', fallback: 5, scale: SECONDS },
  { key: 'relationshipTtlMs', variable: 'P2P_RELATIONSHIP_TTL', fallback: 30, scale: SECONDS },
];

/** Settings that must be whole numbers */
const INTEGER_SETTINGS = new Set<keyof NetworkConfig>(['discoveryPort', 'linkPort', 'maxPeers']);

/** Longest delay Node timers honour; larger values fire after 1 ms. */
export const MAX_TIMER_MS = 2 ** 31 - 1;

const MAX_PORT = 65_535;

/**
 * Network defaults, before any environment overrides.
 */
export function defaultNetworkConfig(): NetworkConfig {
  const config: NetworkConfig = {
    discoveryPort: 0,
    linkPort: 0,
    maxPeers: 0,
    heartbeatIntervalMs: 0,
    handshakeTimeoutMs: 0,
    degradedGraceMs: 0,
    peerSilenceMs: 0,
    rejectCooldownMs: 0,
    contextIntervalMs: 0,
    contextTimeoutMs: 0,
    relationshipTtlMs: 0,
  };
  for (const setting of ENV_SETTINGS) {
    config[setting.key] = setting.fallback * setting.scale;
  }
  return config;
}

/**
 * Read network settings from environment variables.
 *
 * @throws FatalError (INVALID_CONFIG) on a non-numeric or non-positive value
 */
export function loadNetworkConfig(env: NodeJS.ProcessEnv = process.env): NetworkConfig {
  const config = defaultNetworkConfig();

  for (const setting of ENV_SETTINGS) {
    const raw = env[setting.variable];
    if (raw === undefined || raw.trim() === '') {
      continue;
    }
    const value = Number(raw.trim());
    if (!Number.isFinite(value)) {
      throw new FatalError(`${setting.variable} must be a number, got "${raw}"`, 'INVALID_CONFIG');
    }
    if (value <= 0) {
      throw new FatalError(`${setting.variable} must be positive, got ${raw}`, 'INVALID_CONFIG');
    }
    config[setting.key] = value * setting.scale;
  }

  return validateNetworkConfig(config);
}

/**
 * Check every setting is usable.
 *
 * @throws FatalError (INVALID_CONFIG) naming the first bad setting
 */
export function validateNetworkConfig(config: NetworkConfig): NetworkConfig {
  for (const setting of ENV_SETTINGS) {
    const value = config[setting.key];
    if (!(value > 0)) {
      throw new FatalError(`${setting.key} must be positive, got ${value}`, 'INVALID_CONFIG');
    }
    if (INTEGER_SETTINGS.has(setting.key) && !Number.isInteger(value)) {
      throw new FatalError(`${setting.key} must be a whole number, got ${value}`, 'INVALID_CONFIG');
    }
    if (setting.scale === SECONDS && value > MAX_TIMER_MS) {
      throw new FatalError(`${setting.key} must be at most ${MAX_TIMER_MS} ms, got ${value}`, 'INVALID_CONFIG');
    }
  }
  for (const key of ['discoveryPort', 'linkPort'] as const) {
    if (config[key] > MAX_PORT) {
      throw new FatalError(`${key} must be at most ${MAX_PORT}, got ${config[key]}`, 'INVALID_CONFIG');
    }
  }
  return config;
}

/**
 * Default config file path: KINMESH_CONFIG env or ~/.config/kinmesh/config.json
 */
export function getDefaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  if (env.KINMESH_CONFIG) {
    return resolve(env.KINMESH_CONFIG);
  }
  return resolve(homedir(), '.config', 'kinmesh', 'config.json');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse and validate config from a JSON value (shared by sync and async loaders).
 *
 * @throws FatalError (IDENTITY_UNAVAILABLE) when the identity is missing or
 *   its keys do not form a working pair; (INVALID_CONFIG) for other fields
 */
export function parseMeshConfig(config: unknown): MeshConfig {
  if (!isRecord(config)) {
    throw new FatalError('Invalid config: expected a JSON object', 'INVALID_CONFIG');
  }

  const rawIdentity = config.identity;
  if (
    !isRecord(rawIdentity) ||
    typeof rawIdentity.publicKey !== 'string' ||
    typeof rawIdentity.privateKey !== 'string' ||
    rawIdentity.publicKey === '' ||
    rawIdentity.privateKey === ''
  ) {
    throw new FatalError('Invalid config: missing identity.publicKey or identity.privateKey', 'IDENTITY_UNAVAILABLE');
  }
  const identity: MeshIdentity = { publicKey: rawIdentity.publicKey, privateKey: rawIdentity.privateKey };
  if (!validateKeyPair(identity)) {
    throw new FatalError('Invalid config: identity keys do not form a valid ed25519 pair', 'IDENTITY_UNAVAILABLE');
  }

  if (typeof config.ownerId !== 'string' || config.ownerId.trim() === '') {
    throw new FatalError('Invalid config: missing ownerId', 'INVALID_CONFIG');
  }

  const denylist: string[] = [];
  if (config.denylist !== undefined) {
    if (!Array.isArray(config.denylist)) {
      throw new FatalError('Invalid config: denylist must be an array of fingerprints', 'INVALID_CONFIG');
    }
    for (const entry of config.denylist) {
      if (typeof entry === 'string' && entry !== '') {
        denylist.push(entry.toLowerCase());
      }
    }
  }

  return {
    identity,
    ownerId: config.ownerId,
    ...(typeof config.name === 'string' && config.name !== '' ? { name: config.name } : {}),
    denylist,
  };
}

function parseJson(content: string, configPath: string): unknown {
  try {
    return JSON.parse(content);
  } catch {
    throw new FatalError(`Invalid JSON in config file: ${configPath}`, 'INVALID_CONFIG');
  }
}

/**
 * Load kinmesh configuration from a JSON file (sync).
 *
 * @param path - Config file path; defaults to getDefaultConfigPath()
 * @throws FatalError if the file doesn't exist or the config is invalid
 */
export function loadMeshConfig(path?: string): MeshConfig {
  const configPath = path ?? getDefaultConfigPath();

  if (!existsSync(configPath)) {
    throw new FatalError(`Config file not found at ${configPath}. Run 'kinmesh init' first.`, 'IDENTITY_UNAVAILABLE');
  }

  return parseMeshConfig(parseJson(readFileSync(configPath, 'utf-8'), configPath));
}

/**
 * Load kinmesh configuration from a JSON file (async).
 *
 * @param path - Config file path; defaults to getDefaultConfigPath()
 * @throws FatalError if the file doesn't exist or the config is invalid
 */
export async function loadMeshConfigAsync(path?: string): Promise<MeshConfig> {
  const configPath = path ?? getDefaultConfigPath();

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new FatalError(`Config file not found at ${configPath}. Run 'kinmesh init' first.`, 'IDENTITY_UNAVAILABLE');
    }
    throw err;
  }

  return parseMeshConfig(parseJson(content, configPath));
}

/**
 * Save configuration to a JSON file, creating its directory if needed.
 */
export function saveMeshConfig(path: string, config: MeshConfig): void {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  writeFileSync(path, JSON.stringify(config, null, 2), 'utf-8');
}

/**
 * Initialize configuration, generating a new identity if the file doesn't exist.
 * If the file exists, loads and returns it.
 *
 * @returns the configuration and whether it was created now
 */
export function initMeshConfig(path: string, ownerId: string, name?: string): { config: MeshConfig; created: boolean } {
  if (existsSync(path)) {
    return { config: loadMeshConfig(path), created: false };
  }

  const config: MeshConfig = {
    identity: generateKeyPair(),
    ownerId,
    ...(name ? { name } : {}),
    denylist: [],
  };
  saveMeshConfig(path, config);
  return { config, created: true };
}
