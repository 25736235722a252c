import { ProtocolError } from '../errors.js';
import type { PeerLink } from './types.js';

interface Waiter {
  resolve: (frame: string) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * Buffers frames from a link so a request/response exchange never misses a
 * frame that arrives between two awaits. Used for the handshake; once it is
 * done, `release()` detaches and hands over whatever is still buffered.
 */
export class FrameQueue {
  private buffered: string[] = [];
  private waiter: Waiter | null = null;
  private closed = false;
  private released = false;

  private readonly onMessage = (frame: string): void => {
    if (this.waiter) {
      const { resolve, timer } = this.waiter;
      this.waiter = null;
      clearTimeout(timer);
      resolve(frame);
    } else {
      this.buffered.push(frame);
    }
  };

  private readonly onClose = (): void => {
    this.closed = true;
    if (this.waiter) {
      const { reject, timer } = this.waiter;
      this.waiter = null;
      clearTimeout(timer);
      reject(new ProtocolError('Link closed', 'LINK_CLOSED'));
    }
  };

  constructor(private readonly link: PeerLink) {
    link.on('message', this.onMessage);
    link.on('close', this.onClose);
  }

  /**
   * Next frame, waiting at most `timeoutMs`.
   * @throws ProtocolError LINK_CLOSED or HANDSHAKE_TIMEOUT
   */
  next(timeoutMs: number): Promise<string> {
    const frame = this.buffered.shift();
    if (frame !== undefined) {
      return Promise.resolve(frame);
    }
    if (this.closed || this.released) {
      return Promise.reject(new ProtocolError('Link closed', 'LINK_CLOSED'));
    }
    if (this.waiter) {
      return Promise.reject(new Error('FrameQueue already has a pending reader'));
    }

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        reject(new ProtocolError(`No frame within ${timeoutMs}ms`, 'HANDSHAKE_TIMEOUT'));
      }, Math.max(0, timeoutMs));
      this.waiter = { resolve, reject, timer };
    });
  }

  /**
   * Stop listening and return frames that arrived but were not read.
   */
  release(): string[] {
    if (!this.released) {
      this.released = true;
      this.link.off('message', this.onMessage);
      this.link.off('close', this.onClose);
      if (this.waiter) {
        const { reject, timer } = this.waiter;
        this.waiter = null;
        clearTimeout(timer);
        reject(new ProtocolError('Frame reader released', 'LINK_CLOSED'));
      }
    }
    const rest = this.buffered;
    this.buffered = [];
    return rest;
  }
}
