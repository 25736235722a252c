import { createHmac, timingSafeEqual } from 'node:crypto';

/**
 * Message types exchanged between peers.
 * Every frame on a link is an envelope of one of these types.
 */
export type MessageType =
  | 'handshake-init'      // Initiator opens an authentication attempt
  | 'handshake-response'  // Responder accepts (signed) or refuses the attempt
  | 'handshake-ack'       // Initiator's signed confirmation
  | 'context-update'      // Filtered context snapshot
  | 'mode-broadcast'      // Companion's current personality mode
  | 'ping'                // Heartbeat probe
  | 'pong'                // Heartbeat answer
  | 'close';              // Orderly teardown

export const MESSAGE_TYPES: readonly MessageType[] = [
  'handshake-init',
  'handshake-response',
  'handshake-ack',
  'context-update',
  'mode-broadcast',
  'ping',
  'pong',
  'close',
];

export function isMessageType(value: unknown): value is MessageType {
  return typeof value === 'string' && (MESSAGE_TYPES as readonly string[]).includes(value);
}

/**
 * An envelope as it arrives off the wire: structurally valid, type not yet
 * checked against the known set.
 */
export interface WireEnvelope {
  type: string;
  /** Sender's peer id */
  sender: string;
  /** Per-session sequence number; 0 for handshake frames */
  sequence: number;
  payload: unknown;
  /** HMAC-SHA256 over the canonical form under the session key (hex); empty before a session exists */
  authTag: string;
}

/**
 * An envelope whose type is known.
 */
export interface Envelope<T = unknown> extends WireEnvelope {
  type: MessageType;
  payload: T;
}

/**
 * Deterministic JSON serialization with recursively sorted keys.
 */
export function stableStringify(value: unknown): string {
  if (value === null || value === undefined) return JSON.stringify(value);
  if (typeof value !== 'object') return JSON.stringify(value);
  if (Array.isArray(value)) {
    return '[' + value.map(stableStringify).join(',') + ']';
  }
  const record = value as Record<string, unknown>;
  const keys = Object.keys(record).filter(k => record[k] !== undefined).sort();
  const pairs = keys.map(k => JSON.stringify(k) + ':' + stableStringify(record[k]));
  return '{' + pairs.join(',') + '}';
}

/**
 * The value a receiver parses back out of `JSON.stringify(value)`:
 * `toJSON` applied, functions and undefined properties dropped.
 */
function wireForm(value: unknown): unknown {
  const text: string | undefined = JSON.stringify(value);
  return text === undefined ? undefined : JSON.parse(text);
}

/**
 * Canonical form of an envelope for authentication.
 * Deterministic JSON serialization of the payload as it travels on the
 * wire: recursively sorted keys, no whitespace.
 */
export function canonicalize(type: string, sender: string, sequence: number, payload: unknown): string {
  return stableStringify({ payload: wireForm(payload), sender, sequence, type });
}

/**
 * Compute the authentication tag for a canonical envelope.
 */
export function computeAuthTag(canonical: string, sessionKey: Buffer): string {
  return createHmac('sha256', sessionKey).update(canonical).digest('hex');
}

/**
 * Create an envelope.
 * With a session key the envelope carries an HMAC tag; handshake frames are
 * sent without one and authenticate through signatures in their payloads.
 */
export function createEnvelope<T>(
  type: MessageType,
  sender: string,
  sequence: number,
  payload: T,
  sessionKey?: Buffer,
): Envelope<T> {
  const authTag = sessionKey
    ? computeAuthTag(canonicalize(type, sender, sequence, payload), sessionKey)
    : '';

  return { type, sender, sequence, payload, authTag };
}

/**
 * Verify an envelope's authentication tag against the session key.
 *
 * @returns Object with `valid` boolean and optional `reason` for failure
 */
export function verifyAuthTag(envelope: WireEnvelope, sessionKey: Buffer): { valid: boolean; reason?: string } {
  if (!/^[0-9a-f]{64}$/.test(envelope.authTag)) {
    return { valid: false, reason: 'auth_tag_missing' };
  }

  const expected = Buffer.from(
    computeAuthTag(canonicalize(envelope.type, envelope.sender, envelope.sequence, envelope.payload), sessionKey),
    'hex',
  );
  const actual = Buffer.from(envelope.authTag, 'hex');

  if (!timingSafeEqual(expected, actual)) {
    return { valid: false, reason: 'auth_tag_invalid' };
  }

  return { valid: true };
}

/**
 * Serialize an envelope to a wire frame.
 */
export function encodeEnvelope(envelope: WireEnvelope): string {
  return JSON.stringify(envelope);
}

export type DecodeResult =
  | { ok: true; envelope: WireEnvelope }
  | { ok: false; reason: string };

/**
 * Parse a wire frame into an envelope, checking its shape only.
 * Authentication, sequencing and type recognition are the caller's job.
 */
export function decodeEnvelope(frame: string): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(frame);
  } catch {
    return { ok: false, reason: 'invalid_json' };
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return { ok: false, reason: 'not_an_object' };
  }

  const raw = parsed as Record<string, unknown>;
  if (typeof raw.type !== 'string' || raw.type.length === 0) {
    return { ok: false, reason: 'missing_type' };
  }
  if (typeof raw.sender !== 'string' || raw.sender.length === 0) {
    return { ok: false, reason: 'missing_sender' };
  }
  if (typeof raw.sequence !== 'number' || !Number.isSafeInteger(raw.sequence) || raw.sequence < 0) {
    return { ok: false, reason: 'invalid_sequence' };
  }
  if (typeof raw.authTag !== 'string') {
    return { ok: false, reason: 'missing_auth_tag' };
  }
  if (!('payload' in raw)) {
    return { ok: false, reason: 'missing_payload' };
  }

  return {
    ok: true,
    envelope: {
      type: raw.type,
      sender: raw.sender,
      sequence: raw.sequence,
      payload: raw.payload,
      authTag: raw.authTag,
    },
  };
}
