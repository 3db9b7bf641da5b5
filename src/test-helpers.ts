/**
 * Shared fixtures for the test suites: an in-memory store, a clock the
 * test moves by hand and a one-call sender registration.
 */

import { createAdapter } from './db/factory.js';
import type { DatabaseAdapter, QueuedMessage, Role } from './db/adapter.js';
import { SenderRegistry, type SenderCredentials } from './engine/registry.js';
import { AuthorizationEngine } from './engine/authorization.js';
import { MessageQueue, type BatchItemResult, type QueuePolicy } from './engine/queue.js';

export const T0 = new Date('2026-01-05T09:00:00.000Z');

export class ManualClock {
  private current: number;

  constructor(start: Date = T0) {
    this.current = start.getTime();
  }

  readonly now = (): Date => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }
}

export async function openMemoryStore(): Promise<DatabaseAdapter> {
  const db = await createAdapter({ type: 'sqlite', connectionString: ':memory:' });
  await db.migrate();
  return db;
}

export interface Relay {
  db: DatabaseAdapter;
  clock: ManualClock;
  registry: SenderRegistry;
  authz: AuthorizationEngine;
  queue: MessageQueue;
}

export async function createRelay(policy: Partial<QueuePolicy> = {}): Promise<Relay> {
  const db = await openMemoryStore();
  const clock = new ManualClock();
  return {
    db,
    clock,
    registry: new SenderRegistry(db, { clock: clock.now, hashRounds: 4 }),
    authz: new AuthorizationEngine(db, { clock: clock.now }),
    queue: new MessageQueue(db, { policy, clock: clock.now }),
  };
}

export interface SenderFixture {
  principalId: string;
  role: Role;
  isLocal?: boolean;
  displayName?: string;
  destinationAddress?: string;
}

/** Issues a code and registers a sender with it in one go. */
export async function addSender(registry: SenderRegistry, fixture: SenderFixture): Promise<SenderCredentials> {
  const issued = await registry.issueRegistrationCode({
    principalId: fixture.principalId,
    maxRole: fixture.role,
    isLocal: fixture.isLocal,
    issuedBy: 'admin-1',
  });
  return registry.register({
    code: issued.code,
    displayName: fixture.displayName ?? `${fixture.principalId} phone`,
    destinationAddress: fixture.destinationAddress ?? '+15550100',
    requestedRole: fixture.role,
  });
}

export function expectQueued(result: BatchItemResult): QueuedMessage {
  if (result.status !== 'queued') throw new Error(`Expected a queued message, got ${result.status}`);
  return result.message;
}
