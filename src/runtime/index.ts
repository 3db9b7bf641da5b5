/**
 * Delivery agent runtime: the coordinator loop, queue clients,
 * executors and credential stores.
 */

export { DeliveryCoordinator } from './coordinator.js';
export type { CoordinatorOptions } from './coordinator.js';
export { HttpQueueClient, LocalQueueClient, RemoteError, isRetryableClientError } from './client.js';
export type { HttpQueueClientOptions } from './client.js';
export { CommandExecutor, EX_TEMPFAIL, runDelivery } from './executor.js';
export type { CommandExecutorOptions } from './executor.js';
export { EncryptedCredentialStore, MemoryCredentialStore } from './credentials.js';
export type * from './types.js';
