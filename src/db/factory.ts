/**
 * Database Adapter Factory
 *
 * Creates the right adapter based on config.
 * Adapters are lazy-loaded so a driver is only required when selected.
 */

import type { DatabaseAdapter, DatabaseConfig, DatabaseType } from './adapter.js';

const ADAPTER_MAP: Record<DatabaseType, () => Promise<new () => DatabaseAdapter>> = {
  sqlite: () => import('./sqlite.js').then(m => m.SqliteAdapter),
};

export async function createAdapter(config: DatabaseConfig): Promise<DatabaseAdapter> {
  const loader = ADAPTER_MAP[config.type];
  if (!loader) {
    throw new Error(
      `Unsupported database type: "${config.type}". ` +
      `Supported: ${Object.keys(ADAPTER_MAP).join(', ')}`
    );
  }

  const AdapterClass = await loader();
  const adapter = new AdapterClass();
  await adapter.connect(config);
  return adapter;
}
