/**
 * CLI Command: token
 *
 * Mints a requester bearer token signed with SENDRELAY_JWT_SECRET and
 * prints it on stdout.
 *
 * Usage:
 *   sendrelay token --principal alice --role lead
 *   sendrelay token --principal root --role admin --ttl 1h
 */

import { getFlag } from '../lib/cli-args.js';
import { ROLES, isRole } from '../db/adapter.js';
import { signPrincipalToken } from './tokens.js';

export async function runToken(args: string[]): Promise<void> {
  const { default: chalk } = await import('chalk');

  const secret = process.env.SENDRELAY_JWT_SECRET;
  const principalId = getFlag(args, '--principal');
  const role = getFlag(args, '--role');

  if (!secret) {
    console.error(chalk.red('  SENDRELAY_JWT_SECRET is not set'));
    process.exit(1);
  }
  if (!principalId || !isRole(role)) {
    console.error(chalk.red(`  Usage: sendrelay token --principal <id> --role <${ROLES.join('|')}> [--ttl 24h]`));
    process.exit(1);
  }

  const token = await signPrincipalToken({ id: principalId, role }, secret, getFlag(args, '--ttl'));
  console.log(token);
}
