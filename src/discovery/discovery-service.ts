import { EventEmitter } from 'node:events';
import { describeError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { PeerStore } from '../registry/peer-store.js';
import type { Peer, Sighting } from '../registry/peer.js';
import type { Advertisement, DiscoveryTransport } from '../transport/types.js';
import { shortId } from '../utils.js';
import { backoffDelay } from './backoff.js';

/**
 * Configuration for DiscoveryService
 */
export interface DiscoveryServiceConfig {
  transport: DiscoveryTransport;
  peerStore: PeerStore;
  /** This node's advertisement, announced at the start of every cycle */
  advertisement: Advertisement;
  /** Pause between successful scan cycles (default: 5000) */
  scanIntervalMs?: number;
  /** Waits between cycles; resolves early when the signal aborts */
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
  logger?: Logger;
}

/**
 * Events emitted by DiscoveryService
 */
export interface DiscoveryServiceEvents {
  /** A peer id seen for the first time (or again after eviction) */
  'peer-discovered': (peer: Readonly<Peer>) => void;
  /** A scan cycle failed and will be retried after `retryInMs` */
  'scan-failed': (error: unknown, retryInMs: number) => void;
}

const DEFAULT_SCAN_INTERVAL_MS = 5000;

function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Finds candidate peers on the local network and records them in the
 * peer store. Failures stay inside the loop: a failed cycle is retried
 * with exponential backoff and never reaches the caller.
 */
export class DiscoveryService extends EventEmitter {
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(private readonly config: DiscoveryServiceConfig) {
    super();
    this.sleep = config.sleep ?? abortableSleep;
  }

  override on<E extends keyof DiscoveryServiceEvents>(event: E, listener: DiscoveryServiceEvents[E]): this {
    return super.on(event, listener);
  }

  override emit<E extends keyof DiscoveryServiceEvents>(
    event: E,
    ...args: Parameters<DiscoveryServiceEvents[E]>
  ): boolean {
    return super.emit(event, ...args);
  }

  /**
   * Scan until the signal aborts, yielding every sighting that was
   * accepted into the peer store. Restartable: each call runs its own loop.
   */
  async *scan(signal: AbortSignal): AsyncGenerator<Sighting> {
    let failures = 0;
    const interval = this.config.scanIntervalMs ?? DEFAULT_SCAN_INTERVAL_MS;

    while (!signal.aborted) {
      let sightings: Sighting[] = [];
      try {
        sightings = await this.runCycle(signal);
        failures = 0;
      } catch (err) {
        if (signal.aborted) {
          return;
        }
        const delay = backoffDelay(failures);
        failures++;
        this.config.logger?.warn(`Discovery scan failed: ${describeError(err)}; retrying in ${delay}ms`);
        this.emit('scan-failed', err, delay);
        await this.sleep(delay, signal);
        continue;
      }

      for (const sighting of sightings) {
        yield sighting;
      }
      await this.sleep(interval, signal);
    }
  }

  /**
   * Run the scan loop in the background until stop().
   */
  start(): void {
    if (this.loop) {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.loop = (async () => {
      for await (const sighting of this.scan(controller.signal)) {
        this.config.logger?.debug(`Sighted ${shortId(sighting.peerId)} at ${sighting.address}`);
      }
    })();
  }

  /**
   * Run a single announce-and-scan cycle outside the loop.
   * A failed cycle is logged and yields nothing.
   */
  async runOnce(signal: AbortSignal = new AbortController().signal): Promise<Sighting[]> {
    try {
      return await this.runCycle(signal);
    } catch (err) {
      this.config.logger?.warn(`Discovery scan failed: ${describeError(err)}`);
      this.emit('scan-failed', err, 0);
      return [];
    }
  }

  async stop(): Promise<void> {
    this.controller?.abort();
    const loop = this.loop;
    this.controller = null;
    this.loop = null;
    if (loop) {
      await loop;
    }
  }

  /**
   * Announce, then collect one cycle of sightings into the peer store.
   * Sightings are recorded as they arrive so an aborted cycle keeps
   * what it already saw.
   */
  private async runCycle(signal: AbortSignal): Promise<Sighting[]> {
    const { transport, advertisement } = this.config;
    await transport.announce(advertisement);

    const accepted: Sighting[] = [];
    for await (const sighting of transport.scan(signal)) {
      if (this.record(sighting)) {
        accepted.push(sighting);
      }
      if (signal.aborted) {
        break;
      }
    }
    return accepted;
  }

  private record(sighting: Sighting): boolean {
    if (sighting.peerId === this.config.advertisement.peerId) {
      return false;
    }

    const result = this.config.peerStore.recordSighting(sighting);
    if (!result) {
      this.config.logger?.debug(`Dropped sighting of ${shortId(sighting.peerId)}: peer id does not match key`);
      return false;
    }

    if (result.outcome === 'created') {
      this.config.logger?.info(`Discovered peer ${shortId(result.peer.peerId)} at ${result.peer.address}`);
      this.emit('peer-discovered', result.peer);
    }
    return true;
  }
}
