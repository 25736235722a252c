import {
  sign,
  verify,
  generateKeyPairSync,
  createHash,
  createPrivateKey,
  createPublicKey,
  diffieHellman,
  hkdfSync,
  randomBytes,
} from 'node:crypto';

/**
 * Represents an ed25519 key pair for peer identity
 */
export interface KeyPair {
  publicKey: string;  // hex-encoded
  privateKey: string; // hex-encoded
}

/** Length of a peer id in hex characters (128 bits of the fingerprint). */
export const PEER_ID_LENGTH = 32;

const SESSION_KEY_BYTES = 32;

/**
 * Generates a new ed25519 key pair
 * @returns KeyPair with hex-encoded public and private keys
 */
export function generateKeyPair(): KeyPair {
  const { publicKey, privateKey } = generateKeyPairSync('ed25519');

  return {
    publicKey: publicKey.export({ type: 'spki', format: 'der' }).toString('hex'),
    privateKey: privateKey.export({ type: 'pkcs8', format: 'der' }).toString('hex'),
  };
}

/**
 * Generates a one-off X25519 key pair for a single handshake.
 * The private half never leaves the handshake that created it.
 */
export function generateEphemeralKeyPair(): KeyPair {
  const { publicKey, privateKey } = generateKeyPairSync('x25519');

  return {
    publicKey: publicKey.export({ type: 'spki', format: 'der' }).toString('hex'),
    privateKey: privateKey.export({ type: 'pkcs8', format: 'der' }).toString('hex'),
  };
}

/**
 * Signs a message with the private key
 * @param message - The message to sign (string or Buffer)
 * @param privateKeyHex - The private key in hex format
 * @returns Signature as hex string
 */
export function signMessage(message: string | Buffer, privateKeyHex: string): string {
  const messageBuffer = typeof message === 'string' ? Buffer.from(message) : message;
  const privateKey = Buffer.from(privateKeyHex, 'hex');

  const signature = sign(null, messageBuffer, {
    key: privateKey,
    format: 'der',
    type: 'pkcs8',
  });

  return signature.toString('hex');
}

/**
 * Verifies a signature with the public key
 * @param message - The original message (string or Buffer)
 * @param signatureHex - The signature in hex format
 * @param publicKeyHex - The public key in hex format
 * @returns true if signature is valid, false otherwise
 */
export function verifySignature(
  message: string | Buffer,
  signatureHex: string,
  publicKeyHex: string
): boolean {
  const messageBuffer = typeof message === 'string' ? Buffer.from(message) : message;
  const signature = Buffer.from(signatureHex, 'hex');
  const publicKey = Buffer.from(publicKeyHex, 'hex');

  try {
    return verify(null, messageBuffer, {
      key: publicKey,
      format: 'der',
      type: 'spki',
    }, signature);
  } catch {
    return false;
  }
}

/**
 * Check that a private key belongs to a public key by signing a fixed probe.
 */
export function validateKeyPair(keyPair: KeyPair): boolean {
  try {
    const probe = 'kinmesh-keypair-validation';
    const sig = signMessage(probe, keyPair.privateKey);
    return verifySignature(probe, sig, keyPair.publicKey);
  } catch {
    return false;
  }
}

/**
 * SHA-256 fingerprint of a hex-encoded public key (hex digest).
 */
export function fingerprint(publicKeyHex: string): string {
  return createHash('sha256').update(Buffer.from(publicKeyHex, 'hex')).digest('hex');
}

/**
 * Stable peer id derived from the identity public key.
 */
export function derivePeerId(publicKeyHex: string): string {
  return fingerprint(publicKeyHex).slice(0, PEER_ID_LENGTH);
}

/**
 * Fresh random nonce, hex-encoded.
 */
export function createNonce(bytes = 16): string {
  return randomBytes(bytes).toString('hex');
}

/**
 * Derive the symmetric session key for a handshake.
 *
 * X25519 shared secret, expanded with HKDF-SHA256. The salt binds both
 * nonces and the info binds both peer ids in initiator/responder order, so
 * the two sides only agree when they agree on the whole exchange.
 */
export function deriveSessionKey(params: {
  ephemeralPrivateKey: string;
  remoteEphemeralKey: string;
  initiatorNonce: string;
  responderNonce: string;
  initiatorId: string;
  responderId: string;
}): Buffer {
  const sharedSecret = diffieHellman({
    privateKey: createPrivateKey({
      key: Buffer.from(params.ephemeralPrivateKey, 'hex'),
      format: 'der',
      type: 'pkcs8',
    }),
    publicKey: createPublicKey({
      key: Buffer.from(params.remoteEphemeralKey, 'hex'),
      format: 'der',
      type: 'spki',
    }),
  });

  const salt = Buffer.from(params.initiatorNonce + params.responderNonce, 'hex');
  const info = Buffer.from(`kinmesh-session-v1:${params.initiatorId}:${params.responderId}`);

  return Buffer.from(hkdfSync('sha256', sharedSecret, salt, info, SESSION_KEY_BYTES));
}
