import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import type { ProbeConfig } from './config.js';
import type { HandshakeResult, ToolDiscovery } from './handshake.js';
import type { TerminationResult } from './process.js';
import type { RunSummary, ScenarioOutcome, TransportFailureKind } from './runner.js';
import type { JsonRpcErrorPayload } from './session.js';
import { describeError } from './errors.js';

export interface OutputSink {
  write(chunk: string): unknown;
}

export type FatalStage = 'spawn' | 'handshake';

const RULE = '='.repeat(50);

const FAILURE_LABELS: Record<TransportFailureKind, string> = {
  timeout: 'TIMEOUT',
  peer_closed: 'PEER CLOSED',
  protocol: 'MALFORMED RESPONSE',
  transport: 'TRANSPORT ERROR',
};

const STANDARD_ERROR_NAMES: Record<number, string> = {
  [ErrorCode.ParseError]: 'parse error',
  [ErrorCode.InvalidRequest]: 'invalid request',
  [ErrorCode.MethodNotFound]: 'method not found',
  [ErrorCode.InvalidParams]: 'invalid params',
  [ErrorCode.InternalError]: 'internal error',
};

function row(label: string, value: string): string {
  return `    ${`${label}:`.padEnd(12)}${value}`;
}

export function formatApiError(error: JsonRpcErrorPayload): string {
  const name = STANDARD_ERROR_NAMES[error.code];
  return `${error.code}${name ? ` (${name})` : ''} ${error.message}`;
}

/** Report lines for one scenario. Pure; emit() writes them. */
export function formatOutcome(outcome: ScenarioOutcome): string[] {
  const { scenario } = outcome;
  const lines = [
    `[${outcome.index}] ${scenario.name}`,
    row('URL', scenario.target),
    row('Expect', scenario.expected_behavior_note),
  ];

  switch (outcome.status) {
    case 'success': {
      lines.push(
        row('Result', `SUCCESS (${outcome.duration_ms}ms)`),
        row('Method', outcome.fetch_method),
        row('JavaScript', outcome.javascript_detected === null ? 'unknown' : String(outcome.javascript_detected)),
        row('Length', String(outcome.content_length)),
        row('Title', outcome.title ?? 'No title'),
      );
      const expected = scenario.expected_fetch_method;
      if (expected && outcome.expectation === 'met') {
        lines.push(row('Check', `matches expected ${expected} fetch`));
      } else if (expected && outcome.expectation === 'mismatch') {
        lines.push(row('Check', `MISMATCH: expected ${expected}, target reported ${outcome.fetch_method}`));
      }
      break;
    }
    case 'api_error':
      lines.push(
        row('Result', `API ERROR (${outcome.duration_ms}ms)`),
        row('Error', formatApiError(outcome.error)),
        row('Payload', JSON.stringify(outcome.error)),
      );
      break;
    case 'transport_failure':
      lines.push(
        row('Result', `${FAILURE_LABELS[outcome.failure]} (${outcome.duration_ms}ms)`),
        row('Detail', outcome.message),
      );
      break;
  }
  return lines;
}

export function formatSummary(summary: RunSummary): string {
  return (
    `Summary: ${summary.total} scenarios, ${summary.succeeded} succeeded, ` +
    `${summary.api_errors} API errors, ${summary.transport_failures} transport failures, ` +
    `${summary.expectation_mismatches} expectation mismatches`
  );
}

export function formatTermination(result: TerminationResult): string {
  const status =
    result.exit_signal !== null
      ? `signal ${result.exit_signal}`
      : result.exit_code !== null
        ? `exit code ${result.exit_code}`
        : 'exit status unknown';
  if (result.signal_sent === 'none') {
    return `Target had already exited (${status})`;
  }
  return `Target terminated with ${result.signal_sent} (${status})`;
}

/**
 * Human-readable progress for the operator. Observational only: nothing here
 * feeds back into the run.
 */
export class Reporter {
  constructor(private readonly out: OutputSink = process.stdout) {}

  private line(text = ''): void {
    this.out.write(text + '\n');
  }

  banner(config: ProbeConfig): void {
    const { command, args, cwd } = config.target;
    this.line('fetch-probe');
    this.line(RULE);
    this.line(`Target:     ${[command, ...args].join(' ')} (cwd ${cwd})`);
    this.line(`Scenarios:  ${config.scenarios.length}`);
  }

  handshake(result: HandshakeResult): void {
    const server = result.server_info
      ? `${result.server_info.name}${result.server_info.version ? ` ${result.server_info.version}` : ''}`
      : 'unnamed server';
    const protocol = result.protocol_version ? `, protocol ${result.protocol_version}` : '';
    this.line(`Handshake:  OK (${server}${protocol})`);
  }

  discovery(discovery: ToolDiscovery, toolName: string): void {
    if (!discovery.ok) {
      this.line(`Tools:      discovery failed: ${discovery.error ?? 'unknown error'}`);
    } else if (discovery.tools.includes(toolName)) {
      this.line(`Tools:      ${toolName} advertised (${discovery.tools.length} total)`);
    } else {
      const listed = discovery.tools.length > 0 ? discovery.tools.join(', ') : 'none';
      this.line(`Tools:      ${toolName} NOT advertised (listed: ${listed})`);
    }
  }

  emit(outcome: ScenarioOutcome, stderrTail?: string[]): void {
    this.line();
    for (const text of formatOutcome(outcome)) {
      this.line(text);
    }
    if (stderrTail && stderrTail.length > 0) {
      this.stderr(stderrTail);
    }
  }

  fatal(stage: FatalStage, error: unknown, stderrTail?: string[]): void {
    this.line();
    this.line(`FAILED at ${stage}: ${describeError(error)}`);
    if (stderrTail && stderrTail.length > 0) {
      this.stderr(stderrTail);
    }
  }

  hint(text: string): void {
    this.line(`    hint: ${text}`);
  }

  interrupted(): void {
    this.line();
    this.line('Interrupted by operator');
  }

  termination(result: TerminationResult): void {
    this.line();
    this.line(formatTermination(result));
  }

  summary(summary: RunSummary): void {
    this.line(RULE);
    this.line(formatSummary(summary));
  }

  private stderr(lines: string[]): void {
    this.line(`    target stderr (last ${lines.length} lines):`);
    for (const text of lines) {
      this.line(`      ${text}`);
    }
  }
}
