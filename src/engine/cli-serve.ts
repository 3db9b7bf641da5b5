/**
 * CLI Command: serve
 *
 * Starts the requester and agent APIs. Settings come from SENDRELAY_*
 * environment variables; `--port` and `--db` override them.
 *
 * Usage:
 *   SENDRELAY_JWT_SECRET=... sendrelay serve
 *   sendrelay serve --port 9000 --db ./relay.db
 */

import type { ChalkInstance } from 'chalk';
import { getFlag, getIntFlag } from '../lib/cli-args.js';
import { loadServerConfig, type ServerSettings } from '../lib/config.js';
import { ValidationError } from '../lib/errors.js';

export async function runServe(args: string[]): Promise<void> {
  const { default: chalk } = await import('chalk');
  const { default: ora } = await import('ora');

  const settings = loadSettingsOrExit(chalk);

  const port = getIntFlag(args, '--port', settings.port);
  const dbPath = getFlag(args, '--db') ?? settings.dbPath;

  const spinner = ora(`Opening database ${dbPath}...`).start();
  const { createAdapter } = await import('../db/factory.js');
  const db = await createAdapter({ type: 'sqlite', connectionString: dbPath });
  await db.migrate();
  spinner.succeed(`Database ready (${dbPath})`);

  const { createServer } = await import('../server.js');
  const server = createServer({
    port,
    db,
    jwtSecret: settings.jwtSecret,
    queue: settings.queue,
    offlineThresholdMs: settings.offlineThresholdMs,
    rateLimit: settings.rateLimit,
    corsOrigins: settings.corsOrigins,
  });
  await server.start();
}

function loadSettingsOrExit(chalk: ChalkInstance): ServerSettings {
  try {
    return loadServerConfig();
  } catch (err) {
    if (!(err instanceof ValidationError)) throw err;
    console.error(chalk.red('  Invalid configuration:'));
    for (const [name, problem] of Object.entries(err.fields)) {
      console.error(chalk.red(`    ${name}: ${problem}`));
    }
    process.exit(1);
  }
}
