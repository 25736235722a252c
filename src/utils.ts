import { TransientError, type TransientErrorCode } from './errors.js';

/**
 * Get a short display version of a peer id using the first 8 characters.
 * Peer ids are hash-derived, so any 8 characters distinguish them equally well.
 *
 * @param peerId - The full peer id
 * @returns The first 8 characters followed by "..."
 */
export function shortId(peerId: string): string {
  return peerId.length <= 8 ? peerId : peerId.slice(0, 8) + '...';
}

/**
 * Formats a display name with short ID postfix.
 * If name exists: "name (3f8c2247...)"
 * If no name: "3f8c2247..." (short ID only)
 *
 * @param name - Optional name to display
 * @param peerId - The peer id to use for the short ID
 * @returns Formatted display string
 */
export function formatDisplayName(name: string | undefined, peerId: string): string {
  const short = shortId(peerId);
  if (!name || name.trim() === '') {
    return short;
  }
  return `${name} (${short})`;
}

/**
 * Race a promise against a timer. The timer is always cleared.
 *
 * @throws TransientError with the given code when the timer wins
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  label: string,
  code: TransientErrorCode = 'TIMEOUT',
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TransientError(`${label} timed out after ${ms}ms`, code)), ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
