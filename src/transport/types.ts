import type { Sighting } from '../registry/peer.js';

/**
 * A point-to-point byte stream to one remote node, carrying text frames.
 * Links are anonymous until a handshake runs over them.
 */
export interface PeerLink {
  /** Remote address as the transport knows it */
  readonly address: string;
  send(frame: string): void;
  close(): void;
  isOpen(): boolean;
  on(event: 'message', handler: (frame: string) => void): void;
  on(event: 'close', handler: () => void): void;
  off(event: 'message', handler: (frame: string) => void): void;
  off(event: 'close', handler: () => void): void;
}

/**
 * Accepts inbound links and opens outbound ones.
 */
export interface LinkTransport {
  /** Start accepting links; resolves once the transport is ready */
  listen(onLink: (link: PeerLink) => void): Promise<void>;
  /** Open a link to a peer address */
  dial(address: string): Promise<PeerLink>;
  close(): Promise<void>;
}

/**
 * What a node broadcasts about itself on the local network.
 */
export interface Advertisement {
  peerId: string;
  publicKey: string;
  ownerId: string;
  /** Port the node accepts links on; the host comes from the datagram source */
  linkPort?: number;
  name?: string;
  protocolVersion: string;
}

/**
 * Local-network broadcast and scan primitive.
 */
export interface DiscoveryTransport {
  /** Broadcast this node's advertisement once */
  announce(advertisement: Advertisement): Promise<void>;
  /**
   * One scan cycle: yields sightings until the cycle ends or the signal aborts.
   * Throws when the medium is unavailable.
   */
  scan(signal: AbortSignal): AsyncIterable<Sighting>;
  close(): Promise<void>;
}

/**
 * Runtime shape check for advertisements received from the network.
 */
export function isAdvertisement(value: unknown): value is Advertisement {
  if (typeof value !== 'object' || value === null) return false;
  const ad = value as Record<string, unknown>;
  return (
    typeof ad.peerId === 'string' &&
    typeof ad.publicKey === 'string' &&
    typeof ad.ownerId === 'string' &&
    typeof ad.protocolVersion === 'string' &&
    (ad.linkPort === undefined || (typeof ad.linkPort === 'number' && Number.isInteger(ad.linkPort))) &&
    (ad.name === undefined || typeof ad.name === 'string')
  );
}
