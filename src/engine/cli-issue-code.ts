/**
 * CLI Command: issue-code
 *
 * Issues a one-time sender registration code straight against the
 * database, for bootstrapping before any admin token exists.
 *
 * Usage:
 *   sendrelay issue-code --principal alice --max-role lead
 *   sendrelay issue-code --principal ops --max-role senior --local --ttl-hours 4 --db ./relay.db
 */

import { getFlag, getIntFlag, hasFlag } from '../lib/cli-args.js';
import { ROLES, isRole, type Role } from '../db/adapter.js';

export async function runIssueCode(args: string[]): Promise<void> {
  const { default: inquirer } = await import('inquirer');
  const { default: chalk } = await import('chalk');

  let principalId = getFlag(args, '--principal');
  let maxRole: Role | undefined;
  const roleFlag = getFlag(args, '--max-role');
  if (roleFlag !== undefined) {
    if (!isRole(roleFlag)) {
      console.error(chalk.red(`  --max-role must be one of: ${ROLES.join(', ')}`));
      process.exit(1);
    }
    maxRole = roleFlag;
  }

  if (!principalId || !maxRole) {
    const answers = await inquirer.prompt<{ principalId: string; maxRole: Role }>([
      {
        type: 'input',
        name: 'principalId',
        message: 'Principal the sender will belong to:',
        when: !principalId,
        validate: (v: string) => v.trim().length > 0 || 'Required',
      },
      {
        type: 'list',
        name: 'maxRole',
        message: 'Highest role the sender may claim:',
        choices: [...ROLES],
        when: !maxRole,
      },
    ]);
    principalId = principalId ?? answers.principalId.trim();
    maxRole = maxRole ?? answers.maxRole;
  }

  const ttlHours = getIntFlag(args, '--ttl-hours', 24, 1);
  const dbPath = getFlag(args, '--db') ?? process.env.SENDRELAY_DB_PATH ?? './sendrelay.db';

  const { createAdapter } = await import('../db/factory.js');
  const { SenderRegistry } = await import('./registry.js');
  const db = await createAdapter({ type: 'sqlite', connectionString: dbPath });
  try {
    await db.migrate();
    const registry = new SenderRegistry(db);
    const issued = await registry.issueRegistrationCode({
      principalId,
      maxRole,
      isLocal: hasFlag(args, '--local'),
      issuedBy: getFlag(args, '--issued-by') ?? 'cli',
      ttlMs: ttlHours * 3_600_000,
    });

    console.log('');
    console.log(`  ${chalk.bold('Code:')}     ${chalk.cyan(issued.code)}`);
    console.log(`  ${chalk.bold('Expires:')}  ${issued.expiresAt.toISOString()}`);
    console.log('');
    console.log(chalk.dim('  The code is shown once. Hand it to the sender operator.'));
    console.log('');
  } finally {
    await db.disconnect();
  }
}
