import { createSocket, type RemoteInfo, type Socket } from 'node:dgram';
import { on } from 'node:events';
import { TransientError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { Sighting } from '../registry/peer.js';
import { isAdvertisement, type Advertisement, type DiscoveryTransport } from './types.js';

export interface UdpDiscoveryConfig {
  /** Port every node listens and broadcasts on */
  port: number;
  /** Destination for announcements (default: 255.255.255.255) */
  broadcastAddress?: string;
  /** How long one scan cycle listens (default: 3000) */
  scanWindowMs?: number;
  /** Link port assumed when an advertisement carries none */
  defaultLinkPort: number;
  logger?: Logger;
}

/** Datagrams larger than this are not advertisements */
const MAX_DATAGRAM = 4096;

/**
 * Discovery over UDP broadcast on the local segment. Each node broadcasts a
 * JSON advertisement; a scan listens for one window and turns every valid
 * advertisement into a sighting addressed `source-ip:linkPort`.
 */
export class UdpDiscoveryTransport implements DiscoveryTransport {
  private socket: Socket | null = null;
  private binding: Promise<Socket> | null = null;

  constructor(private readonly config: UdpDiscoveryConfig) {}

  async announce(advertisement: Advertisement): Promise<void> {
    const socket = await this.bind();
    const data = Buffer.from(JSON.stringify(advertisement), 'utf-8');
    const target = this.config.broadcastAddress ?? '255.255.255.255';

    await new Promise<void>((resolve, reject) => {
      socket.send(data, this.config.port, target, (err) => {
        if (err) {
          reject(new TransientError(`Broadcast failed: ${err.message}`, 'SCAN_FAILED'));
        } else {
          resolve();
        }
      });
    });
  }

  async *scan(signal: AbortSignal): AsyncGenerator<Sighting> {
    const socket = await this.bind();
    const window = new AbortController();
    const timer = setTimeout(() => window.abort(), this.config.scanWindowMs ?? 3000);
    const onAbort = (): void => window.abort();
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      for await (const [message, rinfo] of on(socket, 'message', { signal: window.signal })) {
        if (!(message instanceof Buffer) || !isRemoteInfo(rinfo)) {
          continue;
        }
        const sighting = this.parse(message, rinfo);
        if (sighting) {
          yield sighting;
        }
      }
    } catch (err) {
      if (!window.signal.aborted) {
        throw new TransientError(`Scan failed: ${err instanceof Error ? err.message : String(err)}`, 'SCAN_FAILED');
      }
    } finally {
      clearTimeout(timer);
      signal.removeEventListener('abort', onAbort);
    }
  }

  async close(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    this.binding = null;
    if (socket) {
      await new Promise<void>((resolve) => socket.close(() => resolve()));
    }
  }

  private parse(message: Buffer, rinfo: RemoteInfo): Sighting | null {
    if (message.length > MAX_DATAGRAM) {
      return null;
    }
    let value: unknown;
    try {
      value = JSON.parse(message.toString('utf-8'));
    } catch {
      this.config.logger?.debug(`Ignoring non-JSON datagram from ${rinfo.address}`);
      return null;
    }
    if (!isAdvertisement(value)) {
      this.config.logger?.debug(`Ignoring malformed advertisement from ${rinfo.address}`);
      return null;
    }
    return {
      peerId: value.peerId,
      address: `${rinfo.address}:${value.linkPort ?? this.config.defaultLinkPort}`,
      publicKey: value.publicKey,
      ownerId: value.ownerId,
      name: value.name,
      protocolVersion: value.protocolVersion,
    };
  }

  private bind(): Promise<Socket> {
    if (!this.binding) {
      this.binding = new Promise((resolve, reject) => {
        const socket = createSocket({ type: 'udp4', reuseAddr: true });
        const onError = (err: Error): void => {
          this.binding = null;
          socket.close();
          reject(new TransientError(`Cannot bind discovery port ${this.config.port}: ${err.message}`, 'SCAN_FAILED'));
        };
        socket.once('error', onError);
        socket.bind(this.config.port, () => {
          socket.off('error', onError);
          socket.setBroadcast(true);
          socket.on('error', (err) => this.config.logger?.warn(`Discovery socket error: ${err.message}`));
          this.socket = socket;
          resolve(socket);
        });
      });
    }
    return this.binding;
  }
}

function isRemoteInfo(value: unknown): value is RemoteInfo {
  return (
    typeof value === 'object' &&
    value !== null &&
    'address' in value &&
    typeof value.address === 'string' &&
    'port' in value &&
    typeof value.port === 'number'
  );
}
