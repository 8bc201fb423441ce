#!/usr/bin/env node
/**
 * fetch-probe CLI: launch the fetch_web_content MCP server, run every
 * configured scenario once and report what came back.
 *
 * Usage:
 *   node dist/src/cli.js                               # ./fetch-probe.json or defaults
 *   FETCH_PROBE_CONFIG=probe.json node dist/src/cli.js
 *   FETCH_PROBE_LOG_LEVEL=debug node dist/src/cli.js   # show target stderr as it arrives
 *
 * Exit codes: 0 all scenarios answered, 1 a scenario failed or the run could
 * not start, 130 interrupted.
 */

import { loadConfig } from './probe/config.js';
import { exitCodeForFailure, run } from './probe/run.js';
import { abortOnSignals } from './probe/signals.js';

async function main(): Promise<number> {
  const config = loadConfig();
  const controller = new AbortController();
  const release = abortOnSignals(controller);

  try {
    const report = await run(config, { signal: controller.signal });
    return report.exit_code;
  } catch (e) {
    const code = exitCodeForFailure(e);
    if (code === null) throw e;
    return code;
  } finally {
    release();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e) => {
    console.error('fetch-probe failed:', e);
    process.exit(1);
  });
