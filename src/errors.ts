/**
 * Failure taxonomy for the mesh.
 *
 * - transient: retried with backoff or skipped for one cycle
 * - protocol: the offending message or handshake attempt is rejected
 * - policy: the action is refused and surfaced as an event
 * - fatal: the node refuses to start
 */
export type MeshErrorKind = 'transient' | 'protocol' | 'policy' | 'fatal';

export class MeshError extends Error {
  constructor(
    message: string,
    public readonly kind: MeshErrorKind,
    public readonly code: string,
  ) {
    super(message);
    this.name = 'MeshError';
  }
}

export type TransientErrorCode =
  | 'SCAN_FAILED'
  | 'LINK_FAILED'
  | 'CONTEXT_TIMEOUT'
  | 'REGISTRY_TIMEOUT'
  | 'TIMEOUT';

export class TransientError extends MeshError {
  declare readonly code: TransientErrorCode;

  constructor(message: string, code: TransientErrorCode) {
    super(message, 'transient', code);
    this.name = 'TransientError';
  }
}

export type ProtocolErrorCode =
  | 'MALFORMED'
  | 'UNEXPECTED_MESSAGE'
  | 'BAD_SIGNATURE'
  | 'BAD_AUTH_TAG'
  | 'IDENTITY_MISMATCH'
  | 'REPLAY'
  | 'HANDSHAKE_TIMEOUT'
  | 'LINK_CLOSED';

export class ProtocolError extends MeshError {
  declare readonly code: ProtocolErrorCode;

  constructor(message: string, code: ProtocolErrorCode) {
    super(message, 'protocol', code);
    this.name = 'ProtocolError';
  }
}

export type PolicyErrorCode =
  | 'CAPACITY'
  | 'DENYLISTED'
  | 'BLOCKED'
  | 'COOLDOWN'
  | 'POLICY_VIOLATION';

export class PolicyError extends MeshError {
  declare readonly code: PolicyErrorCode;

  constructor(message: string, code: PolicyErrorCode) {
    super(message, 'policy', code);
    this.name = 'PolicyError';
  }
}

export class FatalError extends MeshError {
  declare readonly code: 'INVALID_CONFIG' | 'IDENTITY_UNAVAILABLE';

  constructor(message: string, code: 'INVALID_CONFIG' | 'IDENTITY_UNAVAILABLE') {
    super(message, 'fatal', code);
    this.name = 'FatalError';
  }
}

/**
 * Render any thrown value as a log-friendly string.
 */
export function describeError(err: unknown): string {
  if (err instanceof MeshError) {
    return `${err.name}(${err.code}): ${err.message}`;
  }
  return err instanceof Error ? err.message : String(err);
}
