import { isCompanionMode, type CompanionMode } from '../../policy/modes.js';

/**
 * Payloads exchanged over an established session.
 */

export interface PingPayload {
  sentAt: number;
}

export interface PongPayload {
  /** Sequence number of the ping being answered */
  pingSequence: number;
}

export interface ContextUpdatePayload {
  /** Already filtered by the sender; opaque to the receiver */
  snapshot: Record<string, unknown>;
  generatedAt: number;
}

export interface ModeBroadcastPayload {
  mode: CompanionMode;
}

export interface ClosePayload {
  reason: string;
}

function asRecord(value: unknown): Record<string, unknown> | null {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? (value as Record<string, unknown>)
    : null;
}

export function isPingPayload(value: unknown): value is PingPayload {
  const p = asRecord(value);
  return p !== null && typeof p.sentAt === 'number';
}

export function isPongPayload(value: unknown): value is PongPayload {
  const p = asRecord(value);
  return p !== null && typeof p.pingSequence === 'number' && Number.isSafeInteger(p.pingSequence);
}

export function isContextUpdatePayload(value: unknown): value is ContextUpdatePayload {
  const p = asRecord(value);
  return p !== null && asRecord(p.snapshot) !== null && typeof p.generatedAt === 'number';
}

export function isModeBroadcastPayload(value: unknown): value is ModeBroadcastPayload {
  const p = asRecord(value);
  return p !== null && isCompanionMode(p.mode);
}

export function isClosePayload(value: unknown): value is ClosePayload {
  const p = asRecord(value);
  return p !== null && typeof p.reason === 'string';
}
