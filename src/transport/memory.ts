import { EventEmitter } from 'node:events';
import { TransientError } from '../errors.js';
import type { Sighting } from '../registry/peer.js';
import type { Advertisement, DiscoveryTransport, LinkTransport, PeerLink } from './types.js';

/**
 * In-process stand-in for the local network: every node gets an address on a
 * shared bus, links deliver frames on the microtask queue, and discovery
 * returns whatever the other nodes announced.
 */
export class InMemoryNetwork {
  private listeners = new Map<string, (link: MemoryLink) => void>();
  private adverts = new Map<string, Advertisement>();
  private partitions = new Set<string>();

  linkTransport(address: string): LinkTransport {
    return new MemoryLinkTransport(this, address);
  }

  discoveryTransport(address: string): DiscoveryTransport {
    return new MemoryDiscoveryTransport(this, address);
  }

  /**
   * Silently drop frames between two addresses (both directions) without
   * closing anything, like a peer walking out of radio range.
   */
  partition(a: string, b: string, partitioned = true): void {
    for (const key of [`${a}|${b}`, `${b}|${a}`]) {
      if (partitioned) {
        this.partitions.add(key);
      } else {
        this.partitions.delete(key);
      }
    }
  }

  /** @internal */
  isPartitioned(from: string, to: string): boolean {
    return this.partitions.has(`${from}|${to}`);
  }

  /** @internal */
  register(address: string, onLink: (link: MemoryLink) => void): void {
    if (this.listeners.has(address)) {
      throw new Error(`Address already in use: ${address}`);
    }
    this.listeners.set(address, onLink);
  }

  /** @internal */
  unregister(address: string): void {
    this.listeners.delete(address);
  }

  /** @internal */
  withdraw(address: string): void {
    this.adverts.delete(address);
  }

  /** @internal */
  connect(from: string, to: string): MemoryLink {
    const listener = this.listeners.get(to);
    if (!listener) {
      throw new TransientError(`Nothing listening at ${to}`, 'LINK_FAILED');
    }
    const [local, remote] = MemoryLink.pair(this, from, to);
    listener(remote);
    return local;
  }

  /** @internal */
  advertise(address: string, advertisement: Advertisement): void {
    this.adverts.set(address, advertisement);
  }

  /** @internal */
  advertisementsExcept(address: string): Array<[string, Advertisement]> {
    return Array.from(this.adverts.entries()).filter(([addr]) => addr !== address);
  }
}

/**
 * One end of an in-memory link.
 */
export class MemoryLink extends EventEmitter implements PeerLink {
  private remote: MemoryLink | null = null;
  private open = true;

  private constructor(
    private readonly network: InMemoryNetwork,
    private readonly localAddress: string,
    readonly address: string,
  ) {
    super();
  }

  static pair(network: InMemoryNetwork, a: string, b: string): [MemoryLink, MemoryLink] {
    const left = new MemoryLink(network, a, b);
    const right = new MemoryLink(network, b, a);
    left.remote = right;
    right.remote = left;
    return [left, right];
  }

  send(frame: string): void {
    const remote = this.remote;
    if (!this.open || !remote) {
      return;
    }
    if (this.network.isPartitioned(this.localAddress, this.address)) {
      return;
    }
    queueMicrotask(() => remote.deliver(frame));
  }

  close(): void {
    if (!this.open) {
      return;
    }
    this.open = false;
    const remote = this.remote;
    // Frames already in flight are delivered before the far end sees the close.
    queueMicrotask(() => {
      this.emit('close');
      remote?.close();
    });
  }

  isOpen(): boolean {
    return this.open;
  }

  private deliver(frame: string): void {
    if (this.open) {
      this.emit('message', frame);
    }
  }
}

class MemoryLinkTransport implements LinkTransport {
  private links = new Set<MemoryLink>();

  constructor(
    private readonly network: InMemoryNetwork,
    private readonly address: string,
  ) {}

  async listen(onLink: (link: PeerLink) => void): Promise<void> {
    this.network.register(this.address, (link) => {
      this.links.add(link);
      onLink(link);
    });
  }

  async dial(address: string): Promise<PeerLink> {
    const link = this.network.connect(this.address, address);
    this.links.add(link);
    return link;
  }

  async close(): Promise<void> {
    this.network.unregister(this.address);
    for (const link of this.links) {
      link.close();
    }
    this.links.clear();
  }
}

class MemoryDiscoveryTransport implements DiscoveryTransport {
  constructor(
    private readonly network: InMemoryNetwork,
    private readonly address: string,
  ) {}

  async announce(advertisement: Advertisement): Promise<void> {
    this.network.advertise(this.address, advertisement);
  }

  async *scan(signal: AbortSignal): AsyncGenerator<Sighting> {
    for (const [address, ad] of this.network.advertisementsExcept(this.address)) {
      if (signal.aborted) {
        return;
      }
      yield {
        peerId: ad.peerId,
        address,
        publicKey: ad.publicKey,
        ownerId: ad.ownerId,
        name: ad.name,
        protocolVersion: ad.protocolVersion,
      };
    }
  }

  async close(): Promise<void> {
    this.network.withdraw(this.address);
  }
}
