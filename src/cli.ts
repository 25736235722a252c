#!/usr/bin/env node

import { parseArgs } from 'node:util';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { getDefaultConfigPath, initMeshConfig, loadMeshConfig, loadNetworkConfig } from './config.js';
import { MeshError } from './errors.js';
import { fingerprint, derivePeerId } from './identity/keypair.js';
import { createConsoleLogger } from './logger.js';
import { JsonContextProvider, JsonRelationshipRegistry } from './providers/json-files.js';
import { MeshService } from './service.js';
import { UdpDiscoveryTransport } from './transport/udp-discovery.js';
import { WebSocketTransport } from './transport/websocket.js';

interface CliOptions {
  config?: string;
  pretty?: boolean;
  owner?: string;
  name?: string;
  relationships?: string;
  context?: string;
  verbose?: boolean;
}

/**
 * Get the config file path from CLI options, environment, or default.
 */
function getConfigPath(options: CliOptions): string {
  return options.config ? resolve(options.config) : getDefaultConfigPath();
}

/**
 * Output data as JSON or pretty format.
 */
function output(data: Record<string, unknown>, pretty: boolean): void {
  if (pretty) {
    for (const [key, value] of Object.entries(data)) {
      if (typeof value === 'object' && value !== null) {
        console.log(`${key}: ${JSON.stringify(value)}`);
      } else {
        console.log(`${key}: ${String(value)}`);
      }
    }
  } else {
    console.log(JSON.stringify(data, null, 2));
  }
}

/**
 * Handle the `kinmesh init` command.
 */
function handleInit(options: CliOptions): void {
  const configPath = getConfigPath(options);
  if (!options.owner && !existsSync(configPath)) {
    console.error('Error: --owner <user id> is required to initialize a new config.');
    process.exit(1);
  }

  const { config, created } = initMeshConfig(configPath, options.owner ?? '', options.name);
  output({
    status: created ? 'initialized' : 'already_initialized',
    peerId: derivePeerId(config.identity.publicKey),
    ownerId: config.ownerId,
    configPath,
  }, options.pretty ?? false);
}

/**
 * Handle the `kinmesh whoami` command.
 */
function handleWhoami(options: CliOptions): void {
  const config = loadMeshConfig(getConfigPath(options));
  output({
    peerId: derivePeerId(config.identity.publicKey),
    fingerprint: fingerprint(config.identity.publicKey),
    ownerId: config.ownerId,
    ...(config.name ? { name: config.name } : {}),
  }, options.pretty ?? false);
}

/**
 * Handle the `kinmesh start` command: run a node until interrupted,
 * printing one JSON line per event.
 */
async function handleStart(options: CliOptions): Promise<void> {
  if (!options.relationships || !options.context) {
    console.error('Error: start needs --relationships <file> and --context <file>.');
    process.exit(1);
  }

  const config = loadMeshConfig(getConfigPath(options));
  const network = loadNetworkConfig();
  const logger = createConsoleLogger({ verbose: options.verbose ?? false });

  const service = new MeshService({
    ...config,
    network,
    linkTransport: new WebSocketTransport({ port: network.linkPort, logger }),
    discoveryTransport: new UdpDiscoveryTransport({
      port: network.discoveryPort,
      defaultLinkPort: network.linkPort,
      logger,
    }),
    relationships: new JsonRelationshipRegistry(resolve(options.relationships)),
    contextProvider: new JsonContextProvider(resolve(options.context)),
    logger,
  });

  const emitLine = (event: string, data: Record<string, unknown>): void => {
    console.log(JSON.stringify({ event, at: new Date().toISOString(), ...data }));
  };

  service.on('peer_discovered', (peer) => emitLine('peer_discovered', { peerId: peer.peerId, address: peer.address }));
  service.on('peer_active', (peerId) => emitLine('peer_active', { peerId }));
  service.on('peer_closed', (peerId, reason) => emitLine('peer_closed', { peerId, reason }));
  service.on('peer_rejected', (peerId, reason) => emitLine('peer_rejected', { peerId, reason }));
  service.on('context_received', (peerId, snapshot) => emitLine('context_received', { peerId, snapshot }));
  service.on('mode_received', (peerId, mode) => emitLine('mode_received', { peerId, mode }));
  service.on('policy_violation', (peerId, categories) => emitLine('policy_violation', { peerId, categories }));
  service.on('error', (error) => emitLine('error', { message: error.message }));

  await service.start();
  emitLine('started', { peerId: service.peerId, linkPort: network.linkPort, discoveryPort: network.discoveryPort });

  const shutdown = (): void => {
    service.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('Error during shutdown:', err instanceof Error ? err.message : String(err));
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

async function main(): Promise<void> {
  const parsed = parseArgs({
    args: process.argv.slice(2),
    options: {
      config: { type: 'string' },
      pretty: { type: 'boolean' },
      owner: { type: 'string' },
      name: { type: 'string' },
      relationships: { type: 'string' },
      context: { type: 'string' },
      verbose: { type: 'boolean' },
    },
    allowPositionals: true,
  });

  const command = parsed.positionals[0];
  const options: CliOptions = parsed.values;

  try {
    switch (command) {
      case 'init':
        handleInit(options);
        break;
      case 'whoami':
        handleWhoami(options);
        break;
      case 'start':
        await handleStart(options);
        break;
      default:
        console.error(`Error: Unknown command '${command ?? ''}'. Use: init, whoami, start`);
        process.exit(1);
    }
  } catch (e) {
    const detail = e instanceof MeshError ? ` (${e.code})` : '';
    console.error(`Error${detail}:`, e instanceof Error ? e.message : String(e));
    process.exit(1);
  }
}

main().catch((e) => {
  console.error('Fatal error:', e instanceof Error ? e.message : String(e));
  process.exit(1);
});
