import { EventEmitter } from 'node:events';
import { WebSocket, WebSocketServer, type RawData } from 'ws';
import { TransientError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { LinkTransport, PeerLink } from './types.js';

/**
 * A PeerLink over one WebSocket. Frames are text messages.
 */
export class WebSocketLink extends EventEmitter implements PeerLink {
  constructor(
    private readonly socket: WebSocket,
    readonly address: string,
    private readonly logger: Logger | null = null,
  ) {
    super();

    socket.on('message', (data: RawData, isBinary: boolean) => {
      if (isBinary) {
        // Frames are JSON text; binary data cannot be an envelope.
        this.logger?.debug(`Dropped binary frame from ${address}`);
        return;
      }
      this.emit('message', rawToString(data));
    });

    socket.on('close', () => {
      this.emit('close');
    });

    socket.on('error', (error) => {
      this.logger?.debug(`Link ${address} error: ${error.message}`);
    });
  }

  send(frame: string): void {
    if (this.socket.readyState !== WebSocket.OPEN) {
      return;
    }
    this.socket.send(frame, (err) => {
      if (err) {
        this.logger?.debug(`Send to ${this.address} failed: ${err.message}`);
      }
    });
  }

  close(): void {
    if (this.socket.readyState === WebSocket.OPEN || this.socket.readyState === WebSocket.CONNECTING) {
      this.socket.close();
    }
  }

  isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf-8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf-8');
  }
  return data.toString('utf-8');
}

export interface WebSocketTransportConfig {
  /** Port to accept links on */
  port: number;
  /** Interface to bind (default: all) */
  host?: string;
  /** How long a dial may take before failing (default: 5000) */
  connectTimeoutMs?: number;
  logger?: Logger;
}

/**
 * LinkTransport over WebSockets: a server for inbound links and a client
 * per dialed peer. Addresses are `host:port`.
 */
export class WebSocketTransport implements LinkTransport {
  private wss: WebSocketServer | null = null;
  private links = new Set<WebSocketLink>();
  private readonly logger: Logger | null;

  constructor(private readonly config: WebSocketTransportConfig) {
    this.logger = config.logger ?? null;
  }

  listen(onLink: (link: PeerLink) => void): Promise<void> {
    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({ port: this.config.port, host: this.config.host });
      let listening = false;

      wss.on('error', (error) => {
        if (!listening) {
          reject(new TransientError(`Cannot listen on port ${this.config.port}: ${error.message}`, 'LINK_FAILED'));
          return;
        }
        this.logger?.error(`Link server error: ${error.message}`);
      });

      wss.on('listening', () => {
        listening = true;
        this.wss = wss;
        resolve();
      });

      wss.on('connection', (socket, request) => {
        const remote = request.socket.remoteAddress ?? 'unknown';
        const link = this.track(new WebSocketLink(socket, `${remote}:${request.socket.remotePort ?? 0}`, this.logger));
        onLink(link);
      });
    });
  }

  dial(address: string): Promise<PeerLink> {
    const timeoutMs = this.config.connectTimeoutMs ?? 5000;

    return new Promise((resolve, reject) => {
      const socket = new WebSocket(`ws://${address}`, { handshakeTimeout: timeoutMs });

      const onOpen = (): void => {
        socket.off('error', onError);
        resolve(this.track(new WebSocketLink(socket, address, this.logger)));
      };
      const onError = (error: Error): void => {
        socket.off('open', onOpen);
        reject(new TransientError(`Dial ${address} failed: ${error.message}`, 'LINK_FAILED'));
      };

      socket.once('open', onOpen);
      socket.once('error', onError);
    });
  }

  close(): Promise<void> {
    for (const link of this.links) {
      link.close();
    }
    this.links.clear();

    return new Promise((resolve, reject) => {
      const wss = this.wss;
      if (!wss) {
        resolve();
        return;
      }
      this.wss = null;
      wss.close((err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  private track(link: WebSocketLink): WebSocketLink {
    this.links.add(link);
    link.on('close', () => this.links.delete(link));
    return link;
  }
}
