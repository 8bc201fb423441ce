import type { ProbeConfig } from './config.js';
import { HandshakeError, InterruptedError, SpawnError } from './errors.js';
import { discoverTools, initialize, type HandshakeResult, type ToolDiscovery } from './handshake.js';
import { withTarget, type ExitInfo, type TerminationResult } from './process.js';
import { Reporter, type OutputSink } from './report.js';
import { runScenarios, summarize, type RunSummary, type ScenarioOutcome } from './runner.js';
import { RpcSession } from './session.js';
import { LineTransport } from './transport.js';

export interface RunOptions {
  output?: OutputSink;
  signal?: AbortSignal;
}

export interface RunReport {
  handshake: HandshakeResult;
  discovery: ToolDiscovery | null;
  outcomes: ScenarioOutcome[];
  summary: RunSummary;
  termination: TerminationResult | null;
  exit_code: number;
}

const NON_JSON_HINT = 'a target that logs to stdout needs "skip_non_json_lines": true';

function describeExit(info: ExitInfo | null): string | undefined {
  if (!info) return undefined;
  return info.exit_signal ? `killed by ${info.exit_signal}` : `exit code ${info.exit_code}`;
}

export const EXIT_INTERRUPTED = 130;

export function exitCodeFor(summary: RunSummary, failOnError: boolean): number {
  return failOnError && summary.api_errors + summary.transport_failures > 0 ? 1 : 0;
}

/** Exit code for an error that ended the run, or null for one nobody expected. */
export function exitCodeForFailure(e: unknown): number | null {
  if (e instanceof InterruptedError) return EXIT_INTERRUPTED;
  if (e instanceof SpawnError || e instanceof HandshakeError) return 1;
  return null;
}

/**
 * One complete run: launch, handshake, scenarios, report. Spawn and handshake
 * failures and interrupts reject after the target has been reaped.
 */
export async function run(config: ProbeConfig, options: RunOptions = {}): Promise<RunReport> {
  const reporter = new Reporter(options.output);
  const { signal } = options;
  const terminations: TerminationResult[] = [];

  reporter.banner(config);

  try {
    const body = await withTarget(
      config.target,
      {
        graceMs: config.timeouts.grace_ms,
        stderrTailLines: config.stderr_tail_lines,
        onTerminated: (result) => {
          terminations.push(result);
          reporter.termination(result);
        },
      },
      async (target) => {
        const transport = new LineTransport(target.child.stdin, target.child.stdout);
        const session = new RpcSession(transport, {
          skipNonJsonLines: config.skip_non_json_lines,
          describeClosure: () => describeExit(target.exitInfo()),
        });

        try {
          let handshake: HandshakeResult;
          try {
            handshake = await initialize(
              session,
              { protocolVersion: config.protocol_version, clientInfo: config.client },
              {
                timeoutMs: config.timeouts.handshake_ms,
                sendInitializedNotification: config.send_initialized_notification,
                signal,
              },
            );
          } catch (e) {
            if (e instanceof HandshakeError) {
              reporter.fatal('handshake', e, target.stderrTail());
              if (e.stage === 'malformed' && !config.skip_non_json_lines) {
                reporter.hint(NON_JSON_HINT);
              }
            }
            throw e;
          }
          reporter.handshake(handshake);

          let discovery: ToolDiscovery | null = null;
          if (config.discover_tools) {
            discovery = await discoverTools(session, config.timeouts.call_ms, signal);
            reporter.discovery(discovery, config.tool.name);
          }

          const outcomes: ScenarioOutcome[] = [];
          let stderrShown = false;
          const scenarioRun = runScenarios(session, config.scenarios, {
            tool: config.tool,
            callTimeoutMs: config.timeouts.call_ms,
            strictMetadata: config.strict_metadata,
            signal,
          });
          for await (const outcome of scenarioRun) {
            outcomes.push(outcome);
            const showStderr =
              !stderrShown && outcome.status === 'transport_failure' && outcome.failure === 'peer_closed';
            if (showStderr) stderrShown = true;
            reporter.emit(outcome, showStderr ? target.stderrTail() : undefined);
          }

          return { handshake, discovery, outcomes };
        } finally {
          transport.close();
        }
      },
    );

    const summary = summarize(body.outcomes);
    reporter.summary(summary);
    return {
      ...body,
      summary,
      termination: terminations[0] ?? null,
      exit_code: exitCodeFor(summary, config.fail_on_error),
    };
  } catch (e) {
    if (e instanceof SpawnError) {
      reporter.fatal('spawn', e);
    } else if (e instanceof InterruptedError) {
      reporter.interrupted();
    }
    throw e;
  }
}
