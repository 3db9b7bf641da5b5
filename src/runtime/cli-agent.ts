/**
 * CLI Command: agent
 *
 * Runs a delivery agent against a sendrelay server. Each leased message
 * is handed to `--command` with the destination and body as its last two
 * arguments. On first start the agent registers with a one-time code and
 * keeps the credentials in an encrypted file; the passphrase comes from
 * SENDRELAY_AGENT_PASSPHRASE or a prompt.
 *
 * Usage:
 *   sendrelay agent --server http://relay:8787 --command ./send.sh
 *   sendrelay agent --server http://relay:8787 --command ./send.sh \
 *     --code ABCD-EFGH-JKLM --name "Alice phone" --destination +15550100 --role lead
 */

import { getFlag, getIntFlag } from '../lib/cli-args.js';
import { ROLES, isRole, type Role } from '../db/adapter.js';
import { credentialsFileExists, defaultCredentialsPath } from '../lib/config-store.js';
import type { RegistrationRequest } from './types.js';

export async function runAgent(args: string[]): Promise<void> {
  const { default: inquirer } = await import('inquirer');
  const { default: chalk } = await import('chalk');
  const { default: ora } = await import('ora');

  const serverUrl = getFlag(args, '--server') ?? process.env.SENDRELAY_SERVER_URL;
  const command = getFlag(args, '--command');
  if (!serverUrl || !command) {
    console.error(chalk.red('  Usage: sendrelay agent --server <url> --command <program> [options]'));
    process.exit(1);
  }

  const credentialsPath = getFlag(args, '--credentials') ?? defaultCredentialsPath();

  let passphrase = process.env.SENDRELAY_AGENT_PASSPHRASE;
  if (!passphrase) {
    const answer = await inquirer.prompt<{ passphrase: string }>([{
      type: 'password',
      name: 'passphrase',
      message: 'Credentials passphrase:',
      mask: '*',
      validate: (v: string) => v.length >= 8 || 'Use at least 8 characters',
    }]);
    passphrase = answer.passphrase;
  }

  // ── Registration details, only needed the first time ──

  let registration: RegistrationRequest | undefined;
  if (!credentialsFileExists(credentialsPath)) {
    console.log(chalk.dim(`  No credentials at ${credentialsPath}; this agent will register.`));
    registration = await collectRegistration(args, inquirer);
  }

  // ── Run ────────────────────────────────────────────

  const { HttpQueueClient } = await import('./client.js');
  const { CommandExecutor } = await import('./executor.js');
  const { EncryptedCredentialStore } = await import('./credentials.js');
  const { DeliveryCoordinator } = await import('./coordinator.js');

  const deliveryTimeoutMs = getIntFlag(args, '--timeout-seconds', 30, 1) * 1000;
  const spinner = ora(`Connecting to ${serverUrl}...`).start();

  const coordinator = new DeliveryCoordinator({
    client: new HttpQueueClient(serverUrl),
    executor: new CommandExecutor({ command, timeoutMs: deliveryTimeoutMs + 5_000 }),
    credentials: new EncryptedCredentialStore(serverUrl, passphrase, credentialsPath),
    registration,
    pollIntervalMs: getIntFlag(args, '--poll-seconds', 5, 1) * 1000,
    maxBatch: getIntFlag(args, '--batch', 10, 1, 100),
    leaseSeconds: getIntFlag(args, '--lease-seconds', 60, 1, 3600),
    deliveryTimeoutMs,
    sendDelayMs: getIntFlag(args, '--send-delay-ms', 0),
    onStateChange: (state, previous) => {
      if (previous === 'starting' || previous === 'registering') {
        if (state === 'polling') spinner.succeed(`Connected to ${serverUrl}`);
      }
      if (state === 'stopped' && spinner.isSpinning) spinner.fail('Agent stopped');
    },
  });

  const shutdown = () => {
    console.log(chalk.dim('\n  Stopping after the message in flight...'));
    coordinator.stop().then(() => {
      const stats = coordinator.getStats();
      console.log(chalk.dim(`  Delivered ${stats.delivered}, failed ${stats.failed}, leases abandoned ${stats.leasesAbandoned}`));
      process.exit(0);
    }, (err: unknown) => {
      console.error(chalk.red(`  Stop failed: ${err instanceof Error ? err.message : String(err)}`));
      process.exit(1);
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await coordinator.run();
}

async function collectRegistration(
  args: string[],
  inquirer: typeof import('inquirer').default,
): Promise<RegistrationRequest> {
  const code = getFlag(args, '--code');
  const displayName = getFlag(args, '--name');
  const destinationAddress = getFlag(args, '--destination');
  const roleFlag = getFlag(args, '--role');
  const role: Role | undefined = isRole(roleFlag) ? roleFlag : undefined;

  const answers = await inquirer.prompt<{ code: string; displayName: string; destinationAddress: string; role: Role }>([
    {
      type: 'input',
      name: 'code',
      message: 'Registration code:',
      when: !code,
      validate: (v: string) => v.trim().length > 0 || 'Required',
    },
    {
      type: 'input',
      name: 'displayName',
      message: 'Display name for this sender:',
      when: !displayName,
      validate: (v: string) => v.trim().length > 0 || 'Required',
    },
    {
      type: 'input',
      name: 'destinationAddress',
      message: 'Address this sender sends from:',
      when: !destinationAddress,
      validate: (v: string) => v.trim().length > 0 || 'Required',
    },
    {
      type: 'list',
      name: 'role',
      message: 'Role to register with:',
      choices: [...ROLES],
      when: !role,
    },
  ]);

  return {
    code: code ?? answers.code,
    displayName: displayName ?? answers.displayName,
    destinationAddress: destinationAddress ?? answers.destinationAddress,
    role: role ?? answers.role,
  };
}
