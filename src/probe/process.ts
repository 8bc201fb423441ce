import { spawn, type ChildProcessWithoutNullStreams } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import type { TargetSpec } from './config.js';
import { SpawnError, describeError } from './errors.js';
import { logger } from './log.js';

export interface ExitInfo {
  exit_code: number | null;
  exit_signal: NodeJS.Signals | null;
}

export interface TerminationResult extends ExitInfo {
  signal_sent: 'none' | 'SIGTERM' | 'SIGKILL';
}

export interface SpawnOptions {
  stderrTailLines?: number;
}

/**
 * One launched target. Owns the child handle; stdin and stdout belong to the
 * transport, stderr is kept as a bounded tail for diagnostics.
 */
export class TargetProcess {
  readonly exited: Promise<ExitInfo>;
  private exit: ExitInfo | null = null;
  private termination: Promise<TerminationResult> | null = null;
  private readonly tail: string[] = [];
  private partial = '';

  constructor(
    readonly child: ChildProcessWithoutNullStreams,
    readonly command: string,
    private readonly tailLimit: number,
  ) {
    this.exited = new Promise((resolve) => {
      child.once('exit', (code, signal) => {
        this.exit = { exit_code: code, exit_signal: signal };
        logger.debug(`${command} exited (code=${code}, signal=${signal})`);
        resolve(this.exit);
      });
    });

    child.stderr.setEncoding('utf8');
    child.stderr.on('data', (chunk: string) => this.captureStderr(chunk));
    child.on('error', (err) => logger.debug(`${command}: ${err.message}`));
    child.stdin.on('error', (err) => logger.debug(`${command} stdin: ${err.message}`));
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  exitInfo(): ExitInfo | null {
    return this.exit;
  }

  hasExited(): boolean {
    return this.exit !== null;
  }

  stderrTail(): string[] {
    if (this.tailLimit === 0) return [];
    const lines = this.partial ? [...this.tail, this.partial] : [...this.tail];
    return lines.slice(-this.tailLimit);
  }

  /** @internal memo used by terminateTarget */
  terminateOnce(run: () => Promise<TerminationResult>): Promise<TerminationResult> {
    if (!this.termination) {
      this.termination = run();
    }
    return this.termination;
  }

  private captureStderr(chunk: string): void {
    const parts = (this.partial + chunk).split(/\r?\n/);
    this.partial = parts.pop() ?? '';
    for (const line of parts) {
      logger.debug(`[target stderr] ${line}`);
      if (this.tailLimit === 0) continue;
      this.tail.push(line);
      if (this.tail.length > this.tailLimit) this.tail.shift();
    }
  }
}

export async function spawnTarget(spec: TargetSpec, options: SpawnOptions = {}): Promise<TargetProcess> {
  const cwd = path.resolve(spec.cwd);
  if (!isDirectory(cwd)) {
    throw new SpawnError(spec.command, new Error(`working directory does not exist: ${cwd}`));
  }

  let child: ChildProcessWithoutNullStreams;
  try {
    child = spawn(spec.command, spec.args, {
      cwd,
      env: { ...process.env, ...spec.env },
      shell: false,
    });
  } catch (e) {
    throw new SpawnError(spec.command, e);
  }

  await new Promise<void>((resolve, reject) => {
    const onSpawn = () => {
      child.off('error', onError);
      resolve();
    };
    const onError = (err: Error) => {
      child.off('spawn', onSpawn);
      reject(new SpawnError(spec.command, err));
    };
    child.once('spawn', onSpawn);
    child.once('error', onError);
  });

  logger.debug(`Spawned ${spec.command} ${spec.args.join(' ')} (pid ${child.pid}) in ${cwd}`);
  return new TargetProcess(child, spec.command, options.stderrTailLines ?? 20);
}

/**
 * SIGTERM, wait up to graceMs, then SIGKILL. Runs at most once per target and
 * never rejects.
 */
export function terminateTarget(target: TargetProcess, graceMs: number): Promise<TerminationResult> {
  return target.terminateOnce(async () => {
    try {
      const already = target.exitInfo();
      if (already) {
        return { signal_sent: 'none', ...already };
      }

      target.child.stdin.end();
      target.child.kill('SIGTERM');
      const graceful = await settleWithin(target.exited, graceMs);
      if (graceful) {
        return { signal_sent: 'SIGTERM', ...graceful };
      }

      logger.warn(`${target.command} ignored SIGTERM for ${graceMs}ms, sending SIGKILL`);
      target.child.kill('SIGKILL');
      const forced = await settleWithin(target.exited, graceMs);
      if (!forced) {
        logger.error(`${target.command} (pid ${target.pid}) did not exit after SIGKILL`);
      }
      return { signal_sent: 'SIGKILL', exit_code: forced?.exit_code ?? null, exit_signal: forced?.exit_signal ?? null };
    } catch (e) {
      logger.error(`Terminating ${target.command} failed: ${describeError(e)}`);
      return { signal_sent: 'none', exit_code: null, exit_signal: null };
    }
  });
}

export interface WithTargetOptions extends SpawnOptions {
  graceMs: number;
  onTerminated?: (result: TerminationResult) => void;
}

/**
 * Scoped target: body runs with a live process, and the process is reaped
 * whether body returns, throws or is interrupted.
 */
export async function withTarget<T>(
  spec: TargetSpec,
  options: WithTargetOptions,
  body: (target: TargetProcess) => Promise<T>,
): Promise<T> {
  const target = await spawnTarget(spec, options);
  try {
    return await body(target);
  } finally {
    const result = await terminateTarget(target, options.graceMs);
    options.onTerminated?.(result);
  }
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (e) {
    return e instanceof Error && 'code' in e && e.code === 'EPERM';
  }
}

function isDirectory(dir: string): boolean {
  try {
    return fs.statSync(dir).isDirectory();
  } catch {
    return false;
  }
}

async function settleWithin<T>(promise: Promise<T>, ms: number): Promise<T | null> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<null>((resolve) => {
    timer = setTimeout(() => resolve(null), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
