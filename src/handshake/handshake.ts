import { ProtocolError } from '../errors.js';
import {
  createNonce,
  derivePeerId,
  deriveSessionKey,
  fingerprint,
  generateEphemeralKeyPair,
  signMessage,
  verifySignature,
  type KeyPair,
} from '../identity/keypair.js';
import { stableStringify } from '../message/envelope.js';
import type {
  HandshakeAcceptPayload,
  HandshakeAckPayload,
  HandshakeInitPayload,
} from '../message/types/handshake.js';

export const PROTOCOL_VERSION = '1.0';

/**
 * This node's identity as used by the handshake.
 */
export interface LocalIdentity {
  peerId: string;
  ownerId: string;
  publicKey: string;
  privateKey: string;
  fingerprint: string;
  name?: string;
}

/**
 * A remote identity proven by a completed handshake.
 */
export interface RemoteIdentity {
  peerId: string;
  ownerId: string;
  publicKey: string;
  name?: string;
}

export type HandshakeRole = 'initiator' | 'responder';

export function createLocalIdentity(keyPair: KeyPair, ownerId: string, name?: string): LocalIdentity {
  return {
    peerId: derivePeerId(keyPair.publicKey),
    ownerId,
    publicKey: keyPair.publicKey,
    privateKey: keyPair.privateKey,
    fingerprint: fingerprint(keyPair.publicKey),
    ...(name !== undefined ? { name } : {}),
  };
}

/**
 * Which side runs the handshake when both could.
 * The lexicographically smaller peer id initiates.
 */
export function resolveHandshakeRole(localPeerId: string, remotePeerId: string): HandshakeRole {
  return localPeerId < remotePeerId ? 'initiator' : 'responder';
}

interface Transcript {
  initiatorId: string;
  responderId: string;
  initiatorNonce: string;
  responderNonce: string;
  initiatorEphemeral: string;
  responderEphemeral: string;
}

/**
 * Bytes each side signs. The label keeps a response signature from being
 * replayed as an ack and vice versa.
 */
function transcriptMessage(label: 'response' | 'ack', transcript: Transcript): string {
  return stableStringify({ label: `kinmesh-handshake-${label}`, ...transcript });
}

function sessionKeyFor(transcript: Transcript, ephemeral: KeyPair, remoteEphemeral: string): Buffer {
  try {
    return deriveSessionKey({
      ephemeralPrivateKey: ephemeral.privateKey,
      remoteEphemeralKey: remoteEphemeral,
      initiatorNonce: transcript.initiatorNonce,
      responderNonce: transcript.responderNonce,
      initiatorId: transcript.initiatorId,
      responderId: transcript.responderId,
    });
  } catch (err) {
    throw new ProtocolError(
      `Key agreement failed: ${err instanceof Error ? err.message : String(err)}`,
      'MALFORMED',
    );
  }
}

/**
 * Initiator side: produces the init payload, checks the response and
 * produces the ack.
 */
export class InitiatorHandshake {
  readonly init: HandshakeInitPayload;
  private readonly ephemeral = generateEphemeralKeyPair();

  constructor(
    private readonly identity: LocalIdentity,
    private readonly expected: { peerId: string; publicKey?: string },
  ) {
    this.init = {
      peerId: identity.peerId,
      ownerId: identity.ownerId,
      publicKey: identity.publicKey,
      fingerprint: identity.fingerprint,
      nonce: createNonce(),
      ephemeralKey: this.ephemeral.publicKey,
      protocolVersion: PROTOCOL_VERSION,
      ...(identity.name !== undefined ? { name: identity.name } : {}),
    };
  }

  /**
   * Verify an accepting response and derive the session key.
   * @throws ProtocolError IDENTITY_MISMATCH, BAD_SIGNATURE or MALFORMED
   */
  handleResponse(response: HandshakeAcceptPayload): {
    ack: HandshakeAckPayload;
    sessionKey: Buffer;
    remote: RemoteIdentity;
  } {
    if (response.peerId !== this.expected.peerId || derivePeerId(response.publicKey) !== response.peerId) {
      throw new ProtocolError('Responder identity does not match the dialed peer', 'IDENTITY_MISMATCH');
    }
    if (this.expected.publicKey !== undefined && response.publicKey !== this.expected.publicKey) {
      throw new ProtocolError('Responder key differs from the advertised key', 'IDENTITY_MISMATCH');
    }

    const transcript: Transcript = {
      initiatorId: this.identity.peerId,
      responderId: response.peerId,
      initiatorNonce: this.init.nonce,
      responderNonce: response.nonce,
      initiatorEphemeral: this.ephemeral.publicKey,
      responderEphemeral: response.ephemeralKey,
    };

    if (!verifySignature(transcriptMessage('response', transcript), response.signature, response.publicKey)) {
      throw new ProtocolError('Responder signature invalid', 'BAD_SIGNATURE');
    }

    const sessionKey = sessionKeyFor(transcript, this.ephemeral, response.ephemeralKey);
    const ack: HandshakeAckPayload = {
      signature: signMessage(transcriptMessage('ack', transcript), this.identity.privateKey),
    };

    return {
      ack,
      sessionKey,
      remote: {
        peerId: response.peerId,
        ownerId: response.ownerId,
        publicKey: response.publicKey,
        ...(response.name !== undefined ? { name: response.name } : {}),
      },
    };
  }
}

/**
 * Responder side: accepts an init, produces the signed response and checks
 * the ack. Admission checks (denylist, replay, capacity) happen before this.
 */
export class ResponderHandshake {
  readonly response: HandshakeAcceptPayload;
  readonly remote: RemoteIdentity;
  private readonly transcript: Transcript;
  private readonly sessionKey: Buffer;

  private constructor(identity: LocalIdentity, init: HandshakeInitPayload) {
    const ephemeral = generateEphemeralKeyPair();
    const nonce = createNonce();

    this.transcript = {
      initiatorId: init.peerId,
      responderId: identity.peerId,
      initiatorNonce: init.nonce,
      responderNonce: nonce,
      initiatorEphemeral: init.ephemeralKey,
      responderEphemeral: ephemeral.publicKey,
    };
    this.sessionKey = sessionKeyFor(this.transcript, ephemeral, init.ephemeralKey);
    this.remote = {
      peerId: init.peerId,
      ownerId: init.ownerId,
      publicKey: init.publicKey,
      ...(init.name !== undefined ? { name: init.name } : {}),
    };
    this.response = {
      outcome: 'accepted',
      peerId: identity.peerId,
      ownerId: identity.ownerId,
      publicKey: identity.publicKey,
      nonce,
      ephemeralKey: ephemeral.publicKey,
      signature: signMessage(transcriptMessage('response', this.transcript), identity.privateKey),
      ...(identity.name !== undefined ? { name: identity.name } : {}),
    };
  }

  /**
   * Check that an init is self-consistent and answer it.
   * @throws ProtocolError IDENTITY_MISMATCH or MALFORMED
   */
  static accept(identity: LocalIdentity, init: HandshakeInitPayload): ResponderHandshake {
    assertInitIdentity(init);
    return new ResponderHandshake(identity, init);
  }

  /**
   * Verify the initiator's ack.
   * @returns the session key
   * @throws ProtocolError BAD_SIGNATURE
   */
  handleAck(ack: HandshakeAckPayload): Buffer {
    if (!verifySignature(transcriptMessage('ack', this.transcript), ack.signature, this.remote.publicKey)) {
      throw new ProtocolError('Initiator acknowledgment signature invalid', 'BAD_SIGNATURE');
    }
    return this.sessionKey;
  }
}

/**
 * The fingerprint and peer id in an init must both follow from its key.
 * @throws ProtocolError IDENTITY_MISMATCH
 */
export function assertInitIdentity(init: HandshakeInitPayload): void {
  if (fingerprint(init.publicKey) !== init.fingerprint) {
    throw new ProtocolError('Fingerprint does not match public key', 'IDENTITY_MISMATCH');
  }
  if (derivePeerId(init.publicKey) !== init.peerId) {
    throw new ProtocolError('Peer id does not match public key', 'IDENTITY_MISMATCH');
  }
}
