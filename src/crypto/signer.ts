import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { sign, verify, generateKeyPairSync } from 'crypto';
import { join } from 'path';
import { sha256 } from './hasher.js';

export interface KeyPair {
  privateKey: string;
  publicKey: string;
}

const PRIVATE_KEY_FILE = 'audit-signing.key';
const PUBLIC_KEY_FILE = 'audit-signing.pub';

export function generateKeyPair(): KeyPair {
  const { privateKey, publicKey } = generateKeyPairSync('ed25519', {
    privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
    publicKeyEncoding: { type: 'spki', format: 'pem' }
  });

  return { privateKey, publicKey };
}

export function saveKeyPair(keyDir: string, keyPair: KeyPair): void {
  if (!existsSync(keyDir)) {
    mkdirSync(keyDir, { recursive: true, mode: 0o700 });
  }

  writeFileSync(join(keyDir, PRIVATE_KEY_FILE), keyPair.privateKey, { mode: 0o600 });
  writeFileSync(join(keyDir, PUBLIC_KEY_FILE), keyPair.publicKey, { mode: 0o644 });
}

export function loadKeyPair(keyDir: string): KeyPair | null {
  const privPath = join(keyDir, PRIVATE_KEY_FILE);
  const pubPath = join(keyDir, PUBLIC_KEY_FILE);

  if (!existsSync(privPath) || !existsSync(pubPath)) {
    return null;
  }

  const keyPair = {
    privateKey: readFileSync(privPath, 'utf-8'),
    publicKey: readFileSync(pubPath, 'utf-8')
  };

  // A swapped public key would make every entry fail verification later
  const check = `key-check||${keyDir}`;
  if (!verifySignature(check, signData(check, keyPair.privateKey), keyPair.publicKey)) {
    throw new Error(`${PUBLIC_KEY_FILE} in ${keyDir} does not belong to ${PRIVATE_KEY_FILE}`);
  }

  return keyPair;
}

/** Short, stable identifier of a public key for logs and health output. */
export function keyId(publicKey: string): string {
  return sha256(publicKey.trim()).slice(0, 16);
}

export function signData(data: string, privateKey: string): string {
  const signature = sign(null, Buffer.from(data), privateKey);
  return signature.toString('base64');
}

export function verifySignature(data: string, signature: string, publicKey: string): boolean {
  try {
    return verify(null, Buffer.from(data), publicKey, Buffer.from(signature, 'base64'));
  } catch {
    // malformed key or signature encoding
    return false;
  }
}

// Signature payload binds the entry's position to its chain hash
export function auditSignaturePayload(entry: { sequence: number; interaction_id: string; hash: string }): string {
  return [entry.sequence, entry.interaction_id, entry.hash].join('||');
}
