/**
 * Delivery executors.
 *
 * `CommandExecutor` runs a configured program once per message with the
 * destination and body as its last two arguments (no shell involved):
 *
 *   exit 0            → success
 *   exit 75           → transient failure (EX_TEMPFAIL)
 *   killed / timeout  → transient failure
 *   anything else     → permanent failure
 */

import { execFile } from 'child_process';
import type { DeliveryExecutor, DeliveryResult } from './types.js';
import { TimeoutError, withTimeout } from '../lib/resilience.js';
import { errorMessage } from '../lib/errors.js';

export const EX_TEMPFAIL = 75;

export interface CommandExecutorOptions {
  command: string;
  /** Arguments placed before destination and body */
  args?: string[];
  /** Hard limit on one run; the coordinator's own timeout usually fires first */
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
}

export class CommandExecutor implements DeliveryExecutor {
  private readonly opts: CommandExecutorOptions;

  constructor(opts: CommandExecutorOptions) {
    this.opts = opts;
  }

  deliver(destination: string, body: string, signal: AbortSignal): Promise<DeliveryResult> {
    const args = [...(this.opts.args ?? []), destination, body];

    return new Promise((resolve) => {
      execFile(
        this.opts.command,
        args,
        { signal, timeout: this.opts.timeoutMs ?? 0, env: this.opts.env, maxBuffer: 1024 * 1024 },
        (err, _stdout, stderr) => {
          if (!err) {
            resolve({ status: 'success' });
            return;
          }
          const reason = stderr.trim() || err.message;
          if (err.killed || err.signal || err.name === 'AbortError') {
            resolve({ status: 'transient_failure', reason: `Delivery command was stopped: ${reason}` });
          } else if (err.code === EX_TEMPFAIL) {
            resolve({ status: 'transient_failure', reason });
          } else {
            resolve({ status: 'permanent_failure', reason });
          }
        },
      );
    });
  }
}

/**
 * Runs one delivery under a deadline. A timeout or a thrown error is a
 * transient failure: the message goes back on the queue.
 */
export async function runDelivery(
  executor: DeliveryExecutor,
  destination: string,
  body: string,
  timeoutMs: number,
): Promise<DeliveryResult> {
  const controller = new AbortController();
  try {
    return await withTimeout(executor.deliver(destination, body, controller.signal), timeoutMs);
  } catch (err) {
    if (err instanceof TimeoutError) {
      controller.abort();
      return { status: 'transient_failure', reason: `Delivery timed out after ${timeoutMs}ms` };
    }
    return { status: 'transient_failure', reason: errorMessage(err) };
  }
}
