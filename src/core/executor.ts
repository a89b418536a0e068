/**
 * Command Executor - runs one analyzer process
 *
 * This is a "dumb" executor: it starts the process, enforces the timeout
 * and cancellation, and reports what happened. Interpreting the outcome is
 * the runner's job.
 */

import { execa } from 'execa';
import { debugLog, errorMessage } from './utils.js';

export interface CommandOptions {
  cwd: string;
  timeoutMs: number;
  env?: Record<string, string>;
  /** Aborting kills the process (global run deadline) */
  signal?: AbortSignal;
}

export type CommandOutcome =
  | { kind: 'exited'; exitCode: number; stdout: string; stderr: string }
  | { kind: 'timeout' }
  | { kind: 'cancelled' }
  | { kind: 'crashed'; signal: string; message: string }
  | { kind: 'spawn-error'; message: string };

export interface CommandExecutor {
  run(command: string, args: readonly string[], options: CommandOptions): Promise<CommandOutcome>;
}

export class ExecaCommandExecutor implements CommandExecutor {
  async run(command: string, args: readonly string[], options: CommandOptions): Promise<CommandOutcome> {
    debugLog('Running', command, args.join(' '), 'in', options.cwd);

    try {
      const result = await execa(command, [...args], {
        cwd: options.cwd,
        timeout: options.timeoutMs,
        signal: options.signal,
        env: {
          ...process.env,
          ...options.env,
          NO_COLOR: '1',
        },
        reject: false,
        stdin: 'ignore', // Analyzers must never wait for input
      });

      if (result.timedOut) {
        return { kind: 'timeout' };
      }
      if (result.isCanceled) {
        return { kind: 'cancelled' };
      }
      if (result.signal) {
        return { kind: 'crashed', signal: result.signal, message: `${command} was killed with ${result.signal}` };
      }
      // No exit code means the process never started (ENOENT, EACCES)
      if (typeof result.exitCode !== 'number') {
        const message = 'message' in result && typeof result.message === 'string'
          ? result.message
          : `${command}: spawn failed`;
        return { kind: 'spawn-error', message };
      }

      return {
        kind: 'exited',
        exitCode: result.exitCode,
        stdout: result.stdout ?? '',
        stderr: result.stderr ?? '',
      };
    } catch (error) {
      if (options.signal?.aborted) {
        return { kind: 'cancelled' };
      }
      return { kind: 'spawn-error', message: errorMessage(error) };
    }
  }
}
