/**
 * Runner - executes analyzer invocations with bounded parallelism
 *
 * A fixed number of workers pull from a shared queue and append their
 * results to one collector, which is read once after every worker joined.
 * Each invocation gets its own temp directory and its own timeout; a global
 * deadline cancels whatever is still running and leaves the rest unstarted.
 */

import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Invocation, RepositoryContext } from '../types.js';
import { CommandExecutor, ExecaCommandExecutor } from './executor.js';
import { RegistryEntry, argsTemplateFor, resolveArgs } from './registry.js';
import { isToolAvailable } from './tool-check.js';
import { debugLog, errorMessage } from './utils.js';

export const DEADLINE_DETAIL = 'run deadline exceeded';

// ─────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────

/**
 * What happened to one invocation, before its output is interpreted.
 *
 * - exited: the process ran and exited with a code
 * - timeout: killed by its own timeout or by the run deadline
 * - crashed: killed by a signal; whatever it printed is discarded
 * - unavailable: the binary is missing or could not be spawned
 * - not-started: the run deadline passed while it was queued
 * - failed: the runner could not prepare the invocation
 */
export type ExecutionKind = 'exited' | 'timeout' | 'crashed' | 'unavailable' | 'not-started' | 'failed';

export interface InvocationResult {
  invocation: Invocation;
  kind: ExecutionKind;
  exitCode?: number;
  stdout: string;
  stderr: string;
  durationMs: number;
  detail?: string;
}

export interface PlanOptions {
  timeoutMs: number;
  isAvailable?: (command: string) => Promise<boolean>;
}

export interface PlanResult {
  invocations: Invocation[];
  /** Specs whose binary is not installed; never attempted */
  unavailable: InvocationResult[];
}

export interface RunOptions {
  concurrency: number;
  /** Global deadline in ms; 0 or undefined disables it */
  deadlineMs?: number;
  executor?: CommandExecutor;
  /** External cancellation, same effect as the deadline */
  signal?: AbortSignal;
  onResult?: (result: InvocationResult) => void;
}

// ─────────────────────────────────────────────────────────────
// Scheduling
// ─────────────────────────────────────────────────────────────

/**
 * Turn registry entries into invocations for this repository.
 * Entries whose binary is missing come back as unavailable results.
 */
export async function planInvocations(
  entries: readonly RegistryEntry[],
  context: RepositoryContext,
  options: PlanOptions
): Promise<PlanResult> {
  const isAvailable = options.isAvailable ?? isToolAvailable;

  const planned = await Promise.all(
    entries.map(async ({ spec, evidence }) => {
      const invocation: Invocation = {
        id: spec.id,
        spec,
        cwd: context.root,
        args: resolveArgs(argsTemplateFor(spec, evidence), { root: context.root, manifest: evidence }),
        files: [...context.changedFiles],
        timeoutMs: spec.timeoutMs ?? options.timeoutMs,
        ...(evidence !== undefined ? { manifest: evidence } : {}),
      };
      return { invocation, available: await isAvailable(spec.command) };
    })
  );

  const result: PlanResult = { invocations: [], unavailable: [] };
  for (const { invocation, available } of planned) {
    if (available) {
      result.invocations.push(invocation);
    } else {
      result.unavailable.push({
        invocation,
        kind: 'unavailable',
        stdout: '',
        stderr: '',
        durationMs: 0,
        detail: `${invocation.spec.command} not found on PATH`,
      });
    }
  }
  return result;
}

// ─────────────────────────────────────────────────────────────
// Execution
// ─────────────────────────────────────────────────────────────

async function execute(
  invocation: Invocation,
  executor: CommandExecutor,
  signal: AbortSignal
): Promise<InvocationResult> {
  const started = Date.now();
  const base = { invocation, stdout: '', stderr: '' };

  let tmpDir: string;
  try {
    tmpDir = await mkdtemp(join(tmpdir(), `genops-${invocation.spec.id}-`));
  } catch (error) {
    return { ...base, kind: 'failed', durationMs: Date.now() - started, detail: `temp dir: ${errorMessage(error)}` };
  }

  try {
    const args = invocation.args.map((arg) => arg.replaceAll('{tmp}', tmpDir));
    const outcome = await executor.run(invocation.spec.command, args, {
      cwd: invocation.cwd,
      timeoutMs: invocation.timeoutMs,
      env: { TMPDIR: tmpDir, TMP: tmpDir, TEMP: tmpDir },
      signal,
    });
    const durationMs = Date.now() - started;

    switch (outcome.kind) {
      case 'exited':
        return {
          invocation,
          kind: 'exited',
          exitCode: outcome.exitCode,
          stdout: outcome.stdout,
          stderr: outcome.stderr,
          durationMs,
        };
      case 'timeout':
        return { ...base, kind: 'timeout', durationMs, detail: `timed out after ${invocation.timeoutMs}ms` };
      case 'cancelled':
        return { ...base, kind: 'timeout', durationMs, detail: DEADLINE_DETAIL };
      case 'crashed':
        return { ...base, kind: 'crashed', durationMs, detail: outcome.message };
      case 'spawn-error':
        return { ...base, kind: 'unavailable', durationMs, detail: outcome.message };
    }
  } finally {
    await rm(tmpDir, { recursive: true, force: true }).catch((error: unknown) => {
      debugLog('Could not remove', tmpDir, errorMessage(error));
    });
  }
}

/**
 * Run every invocation; results come back in input order.
 */
export async function runInvocations(
  invocations: readonly Invocation[],
  options: RunOptions
): Promise<InvocationResult[]> {
  const executor = options.executor ?? new ExecaCommandExecutor();
  const concurrency = Math.max(1, Math.floor(options.concurrency));

  const controller = new AbortController();
  const abort = () => controller.abort();
  options.signal?.addEventListener('abort', abort, { once: true });
  if (options.signal?.aborted) {
    abort();
  }
  const deadline = options.deadlineMs && options.deadlineMs > 0
    ? setTimeout(() => {
        debugLog('Run deadline reached after', options.deadlineMs, 'ms');
        abort();
      }, options.deadlineMs)
    : undefined;

  // Append-only; each worker pushes, nobody reads until all joined
  const collected: Array<{ index: number; result: InvocationResult }> = [];
  const record = (index: number, result: InvocationResult) => {
    collected.push({ index, result });
    options.onResult?.(result);
  };

  let next = 0;
  const worker = async () => {
    while (next < invocations.length) {
      const index = next++;
      const invocation = invocations[index];
      if (controller.signal.aborted) {
        record(index, {
          invocation,
          kind: 'not-started',
          stdout: '',
          stderr: '',
          durationMs: 0,
          detail: DEADLINE_DETAIL,
        });
        continue;
      }
      record(index, await execute(invocation, executor, controller.signal));
    }
  };

  try {
    const workers = Array.from({ length: Math.min(concurrency, invocations.length) }, () => worker());
    await Promise.all(workers);
  } finally {
    if (deadline) {
      clearTimeout(deadline);
    }
    options.signal?.removeEventListener('abort', abort);
  }

  return collected.sort((a, b) => a.index - b.index).map(({ result }) => result);
}
