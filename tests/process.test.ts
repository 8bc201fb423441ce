import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { once } from 'events';
import * as os from 'os';
import * as path from 'path';
import {
  isProcessAlive,
  spawnTarget,
  terminateTarget,
  withTarget,
  type TargetProcess,
  type TerminationResult,
} from '../src/probe/process.js';
import type { TargetSpec } from '../src/probe/config.js';
import { SpawnError } from '../src/probe/errors.js';

function nodeTarget(script: string, env: Record<string, string> = {}): TargetSpec {
  return { command: process.execPath, args: ['-e', script], cwd: os.tmpdir(), env };
}

const STAYS_ALIVE = 'setInterval(() => {}, 1000);';
const IGNORES_SIGTERM =
  "process.on('SIGTERM', () => {}); process.stdin.resume(); process.stderr.write('ready\\n'); setInterval(() => {}, 1000);";

// 'exit' can fire before the stderr pipe has drained; 'close' cannot
function drained(target: TargetProcess): Promise<unknown> {
  return once(target.child, 'close');
}

async function waitForStderr(target: TargetProcess, line: string): Promise<void> {
  for (let i = 0; i < 100; i++) {
    if (target.stderrTail().includes(line)) return;
    await new Promise((r) => setTimeout(r, 20));
  }
  throw new Error(`target never wrote "${line}" to stderr`);
}

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('spawnTarget', () => {
  it('fails with SpawnError when the command does not exist', async () => {
    const spec: TargetSpec = { command: 'fetch-probe-no-such-binary', args: [], cwd: os.tmpdir(), env: {} };

    const error = await spawnTarget(spec).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SpawnError);
    expect(error instanceof SpawnError && error.message).toMatch(/^Failed to launch fetch-probe-no-such-binary: /);
  });

  it('fails with SpawnError when the working directory is missing', async () => {
    const missing = path.join(os.tmpdir(), 'fetch-probe-missing-dir-for-test');
    const spec: TargetSpec = { ...nodeTarget(STAYS_ALIVE), cwd: missing };

    await expect(spawnTarget(spec)).rejects.toThrow(
      `Failed to launch ${process.execPath}: working directory does not exist: ${missing}`,
    );
  });

  it('passes extra environment variables to the child', async () => {
    const target = await spawnTarget(
      nodeTarget("process.stderr.write(process.env.PROBE_MARKER + '\\n')", { PROBE_MARKER: 'marker-value' }),
    );

    await drained(target);

    expect(target.stderrTail()).toEqual(['marker-value']);
  });

  it('keeps only the last stderr lines', async () => {
    const target = await spawnTarget(
      nodeTarget("for (let i = 1; i <= 5; i++) process.stderr.write('line ' + i + '\\n'); process.stderr.write('partial')"),
      { stderrTailLines: 3 },
    );

    await drained(target);

    expect(target.stderrTail()).toEqual(['line 4', 'line 5', 'partial']);
  });

  it('keeps no stderr when the tail is disabled', async () => {
    const target = await spawnTarget(nodeTarget("process.stderr.write('noise\\n')"), { stderrTailLines: 0 });

    await drained(target);

    expect(target.stderrTail()).toEqual([]);
  });
});

describe('terminateTarget', () => {
  it('stops a cooperative child with SIGTERM', async () => {
    const target = await spawnTarget(nodeTarget(STAYS_ALIVE));
    const pid = target.pid;

    const result = await terminateTarget(target, 2000);

    expect(result).toEqual({ signal_sent: 'SIGTERM', exit_code: null, exit_signal: 'SIGTERM' });
    expect(pid !== undefined && isProcessAlive(pid)).toBe(false);
  });

  it('escalates to SIGKILL when the child ignores SIGTERM', async () => {
    const target = await spawnTarget(nodeTarget(IGNORES_SIGTERM));
    await waitForStderr(target, 'ready');

    const result = await terminateTarget(target, 200);

    expect(result).toEqual({ signal_sent: 'SIGKILL', exit_code: null, exit_signal: 'SIGKILL' });
    expect(console.warn).toHaveBeenCalledWith(
      `[fetch-probe] WARN ${process.execPath} ignored SIGTERM for 200ms, sending SIGKILL`,
    );
  });

  it('sends nothing to a child that has already exited', async () => {
    const target = await spawnTarget(nodeTarget('process.exit(3)'));
    await target.exited;

    const result = await terminateTarget(target, 2000);

    expect(result).toEqual({ signal_sent: 'none', exit_code: 3, exit_signal: null });
  });

  it('runs once however often it is called', async () => {
    const target = await spawnTarget(nodeTarget(STAYS_ALIVE));

    const [first, second] = await Promise.all([terminateTarget(target, 2000), terminateTarget(target, 2000)]);
    const third = await terminateTarget(target, 2000);

    expect(first).toBe(second);
    expect(third).toBe(first);
  });
});

describe('withTarget', () => {
  it('terminates the child after the body returns', async () => {
    const seen: TerminationResult[] = [];
    const pids: Array<number | undefined> = [];

    const value = await withTarget(
      nodeTarget(STAYS_ALIVE),
      { graceMs: 2000, onTerminated: (r) => seen.push(r) },
      async (target) => {
        pids.push(target.pid);
        return 'done';
      },
    );

    expect(value).toBe('done');
    expect(seen).toEqual([{ signal_sent: 'SIGTERM', exit_code: null, exit_signal: 'SIGTERM' }]);
    const [pid] = pids;
    expect(pid !== undefined && isProcessAlive(pid)).toBe(false);
  });

  it('terminates the child when the body throws, and rethrows', async () => {
    const targets: TargetProcess[] = [];

    await expect(
      withTarget(nodeTarget(STAYS_ALIVE), { graceMs: 2000 }, async (t) => {
        targets.push(t);
        throw new Error('scenario blew up');
      }),
    ).rejects.toThrow('scenario blew up');

    expect(targets.map((t) => t.hasExited())).toEqual([true]);
  });
});
