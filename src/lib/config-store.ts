/**
 * Encrypted Credential Storage
 *
 * Keeps an agent's sender id and secret in an encrypted file
 * (.sendrelay-agent.enc by default) using AES-256-GCM with scrypt key
 * derivation from a passphrase. Written with mode 0600.
 *
 * Format: JSON { iv, tag, salt, data } (all base64)
 */

import { scryptSync, randomBytes, createCipheriv, createDecipheriv } from 'crypto';
import { readFileSync, writeFileSync, existsSync, chmodSync } from 'fs';
import { join } from 'path';

export const CREDENTIALS_FILE = '.sendrelay-agent.enc';
const ALGORITHM = 'aes-256-gcm';
const SCRYPT_KEYLEN = 32;
const SCRYPT_PARAMS = { N: 16384, r: 8, p: 1 };

function deriveKey(secret: string, salt: Buffer): Buffer {
  return scryptSync(secret, salt, SCRYPT_KEYLEN, SCRYPT_PARAMS);
}

export function defaultCredentialsPath(): string {
  return join(process.cwd(), CREDENTIALS_FILE);
}

export interface AgentCredentials {
  serverUrl: string;
  senderId: string;
  secret: string;
}

interface EncryptedPayload {
  iv: string;
  tag: string;
  salt: string;
  data: string;
}

function isPayload(value: unknown): value is EncryptedPayload {
  if (typeof value !== 'object' || value === null) return false;
  return ['iv', 'tag', 'salt', 'data'].every(k => k in value && typeof Reflect.get(value, k) === 'string');
}

function isCredentials(value: unknown): value is AgentCredentials {
  if (typeof value !== 'object' || value === null) return false;
  return ['serverUrl', 'senderId', 'secret'].every(k => k in value && typeof Reflect.get(value, k) === 'string');
}

export async function saveCredentials(
  creds: AgentCredentials,
  passphrase: string,
  path: string = defaultCredentialsPath(),
): Promise<void> {
  const salt = randomBytes(16);
  const key = deriveKey(passphrase, salt);
  const iv = randomBytes(12);

  const cipher = createCipheriv(ALGORITHM, key, iv);
  const plaintext = JSON.stringify(creds);
  const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
  const tag = cipher.getAuthTag();

  const payload: EncryptedPayload = {
    iv: iv.toString('base64'),
    tag: tag.toString('base64'),
    salt: salt.toString('base64'),
    data: encrypted.toString('base64'),
  };

  writeFileSync(path, JSON.stringify(payload, null, 2), { encoding: 'utf-8', mode: 0o600 });
  // mode only applies on create
  chmodSync(path, 0o600);
}

/**
 * Returns null when no file exists. A file that exists but cannot be
 * decrypted (wrong passphrase, tampering) is an error, not a fresh start.
 */
export async function loadCredentials(
  passphrase: string,
  path: string = defaultCredentialsPath(),
): Promise<AgentCredentials | null> {
  if (!existsSync(path)) return null;

  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  if (!isPayload(raw)) throw new Error(`Credentials file ${path} is malformed`);

  const key = deriveKey(passphrase, Buffer.from(raw.salt, 'base64'));
  const decipher = createDecipheriv(ALGORITHM, key, Buffer.from(raw.iv, 'base64'));
  decipher.setAuthTag(Buffer.from(raw.tag, 'base64'));

  let decrypted: Buffer;
  try {
    decrypted = Buffer.concat([decipher.update(Buffer.from(raw.data, 'base64')), decipher.final()]);
  } catch {
    throw new Error(`Cannot decrypt ${path}: wrong passphrase or corrupted file`);
  }

  const creds: unknown = JSON.parse(decrypted.toString('utf-8'));
  if (!isCredentials(creds)) throw new Error(`Credentials file ${path} is malformed`);
  return creds;
}

export function credentialsFileExists(path: string = defaultCredentialsPath()): boolean {
  return existsSync(path);
}
