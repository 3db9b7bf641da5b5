/**
 * Where an agent keeps its sender credentials between runs.
 */

import { loadCredentials, saveCredentials, defaultCredentialsPath } from '../lib/config-store.js';
import type { CredentialStore, SenderCredentials } from './types.js';

/** AES-256-GCM file store, bound to one server URL. */
export class EncryptedCredentialStore implements CredentialStore {
  constructor(
    private readonly serverUrl: string,
    private readonly passphrase: string,
    private readonly path: string = defaultCredentialsPath(),
  ) {}

  async load(): Promise<SenderCredentials | null> {
    const stored = await loadCredentials(this.passphrase, this.path);
    if (!stored) return null;
    if (stored.serverUrl !== this.serverUrl) {
      throw new Error(`Stored credentials belong to ${stored.serverUrl}, not ${this.serverUrl}`);
    }
    return { senderId: stored.senderId, secret: stored.secret };
  }

  async save(creds: SenderCredentials): Promise<void> {
    await saveCredentials({ serverUrl: this.serverUrl, ...creds }, this.passphrase, this.path);
  }
}

export class MemoryCredentialStore implements CredentialStore {
  constructor(private creds: SenderCredentials | null = null) {}

  async load(): Promise<SenderCredentials | null> {
    return this.creds;
  }

  async save(creds: SenderCredentials): Promise<void> {
    this.creds = { ...creds };
  }
}
