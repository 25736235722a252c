/**
 * Payloads of the three handshake frames.
 */

export interface HandshakeInitPayload {
  peerId: string;
  ownerId: string;
  /** Identity public key (hex-encoded ed25519 SPKI) */
  publicKey: string;
  /** SHA-256 of the identity public key (hex) */
  fingerprint: string;
  nonce: string;
  /** Ephemeral X25519 public key (hex-encoded SPKI) */
  ephemeralKey: string;
  protocolVersion: string;
  name?: string;
}

export type HandshakeRejectReason =
  | 'capacity'
  | 'denylisted'
  | 'replay'
  | 'policy'
  | 'cooldown'
  | 'invalid'
  | 'role-conflict';

export const HANDSHAKE_REJECT_REASONS: readonly HandshakeRejectReason[] = [
  'capacity',
  'denylisted',
  'replay',
  'policy',
  'cooldown',
  'invalid',
  'role-conflict',
];

export interface HandshakeAcceptPayload {
  outcome: 'accepted';
  peerId: string;
  ownerId: string;
  publicKey: string;
  nonce: string;
  ephemeralKey: string;
  /** Responder's signature over the transcript */
  signature: string;
  name?: string;
}

export interface HandshakeRefusePayload {
  outcome: 'rejected';
  reason: HandshakeRejectReason;
  /** Hint for when a new attempt may succeed (ms) */
  retryAfterMs?: number;
}

export type HandshakeResponsePayload = HandshakeAcceptPayload | HandshakeRefusePayload;

export interface HandshakeAckPayload {
  /** Initiator's signature over the transcript */
  signature: string;
}

const HEX = /^[0-9a-f]+$/;

function isHex(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0 && value.length % 2 === 0 && HEX.test(value);
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === 'string';
}

function asRecord(value: unknown): Record<string, unknown> | null {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? (value as Record<string, unknown>)
    : null;
}

export function isHandshakeInitPayload(value: unknown): value is HandshakeInitPayload {
  const p = asRecord(value);
  return (
    p !== null &&
    typeof p.peerId === 'string' && p.peerId.length > 0 &&
    typeof p.ownerId === 'string' &&
    isHex(p.publicKey) &&
    isHex(p.fingerprint) &&
    isHex(p.nonce) &&
    isHex(p.ephemeralKey) &&
    typeof p.protocolVersion === 'string' &&
    isOptionalString(p.name)
  );
}

export function isHandshakeResponsePayload(value: unknown): value is HandshakeResponsePayload {
  const p = asRecord(value);
  if (p === null) return false;

  if (p.outcome === 'rejected') {
    return (
      typeof p.reason === 'string' &&
      (HANDSHAKE_REJECT_REASONS as readonly string[]).includes(p.reason) &&
      (p.retryAfterMs === undefined || typeof p.retryAfterMs === 'number')
    );
  }

  return (
    p.outcome === 'accepted' &&
    typeof p.peerId === 'string' && p.peerId.length > 0 &&
    typeof p.ownerId === 'string' &&
    isHex(p.publicKey) &&
    isHex(p.nonce) &&
    isHex(p.ephemeralKey) &&
    isHex(p.signature) &&
    isOptionalString(p.name)
  );
}

export function isHandshakeAckPayload(value: unknown): value is HandshakeAckPayload {
  const p = asRecord(value);
  return p !== null && isHex(p.signature);
}
