import type { Scenario, FetchPath } from './scenarios.js';
import { type JsonRpcErrorPayload, type ResponseEnvelope, type RpcCaller, isErrorResponse } from './session.js';
import { ProbeError, describeError } from './errors.js';

export const TOOL_TIMEOUT_MIN_SECONDS = 1;
export const TOOL_TIMEOUT_MAX_SECONDS = 300;
export const UNKNOWN_FETCH_METHOD = 'Unknown';

export type TransportFailureKind = 'timeout' | 'peer_closed' | 'protocol' | 'transport';
export type Expectation = 'met' | 'mismatch' | 'unchecked';

export interface SuccessClassification {
  status: 'success';
  fetch_method: string;
  javascript_detected: boolean | null;
  content_length: number;
  title: string | null;
  expectation: Expectation;
}

export interface ApiErrorClassification {
  status: 'api_error';
  error: JsonRpcErrorPayload;
}

export interface TransportFailureClassification {
  status: 'transport_failure';
  failure: TransportFailureKind;
  message: string;
}

export type Classification = SuccessClassification | ApiErrorClassification | TransportFailureClassification;

export interface OutcomeBase {
  /** 1-based position in the scenario list */
  index: number;
  scenario: Scenario;
  response_id: string | number | null;
  duration_ms: number;
}

export type ScenarioOutcome = OutcomeBase & Classification;

export interface ToolSettings {
  name: string;
  timeout_seconds: number;
}

export interface ClassifyOptions {
  strictMetadata?: boolean;
}

export interface RunScenariosOptions extends ClassifyOptions {
  tool: ToolSettings;
  callTimeoutMs: number;
  signal?: AbortSignal;
}

export interface ToolCallParams {
  [key: string]: unknown;
  name: string;
  arguments: {
    url: string;
    timeout_seconds: number;
  };
}

export function buildToolCallParams(scenario: Scenario, tool: ToolSettings): ToolCallParams {
  const seconds = Math.round(tool.timeout_seconds);
  return {
    name: tool.name,
    arguments: {
      url: scenario.target,
      timeout_seconds: Math.min(TOOL_TIMEOUT_MAX_SECONDS, Math.max(TOOL_TIMEOUT_MIN_SECONDS, seconds)),
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function field(value: unknown, key: string): unknown {
  return isRecord(value) ? value[key] : undefined;
}

export function compareFetchMethod(reported: string, expected: FetchPath | undefined): Expectation {
  if (!expected) return 'unchecked';
  return reported.toLowerCase() === expected ? 'met' : 'mismatch';
}

/**
 * Strict mode insists on content.text_content and content.metadata.fetch_method;
 * otherwise absent values read as 'Unknown' / null.
 */
export function classifyResponse(
  response: ResponseEnvelope,
  scenario: Scenario,
  options: ClassifyOptions = {},
): Classification {
  if (isErrorResponse(response)) {
    return { status: 'api_error', error: response.error };
  }

  const content = field(response.result, 'content');
  const metadata = field(content, 'metadata');
  const textContent = field(content, 'text_content');
  const fetchMethod = field(metadata, 'fetch_method');
  const jsDetected = field(metadata, 'javascript_detected');
  const title = field(content, 'title');

  if (options.strictMetadata) {
    const missing: string[] = [];
    if (!isRecord(content)) missing.push('content');
    if (typeof textContent !== 'string') missing.push('content.text_content');
    if (!isRecord(metadata)) missing.push('content.metadata');
    if (typeof fetchMethod !== 'string' || fetchMethod.length === 0) missing.push('content.metadata.fetch_method');
    if (missing.length > 0) {
      return {
        status: 'transport_failure',
        failure: 'protocol',
        message: `Result is missing ${missing.join(', ')}`,
      };
    }
  }

  const method = typeof fetchMethod === 'string' && fetchMethod.length > 0 ? fetchMethod : UNKNOWN_FETCH_METHOD;
  return {
    status: 'success',
    fetch_method: method,
    javascript_detected: typeof jsDetected === 'boolean' ? jsDetected : null,
    content_length: typeof textContent === 'string' ? Array.from(textContent).length : 0,
    title: typeof title === 'string' ? title : null,
    expectation: compareFetchMethod(method, scenario.expected_fetch_method),
  };
}

function failureKind(e: unknown): TransportFailureKind | null {
  if (!(e instanceof ProbeError)) return null;
  switch (e.kind) {
    case 'timeout':
    case 'peer_closed':
    case 'protocol':
    case 'transport':
      return e.kind;
    default:
      return null;
  }
}

/**
 * One tools/call per scenario, strictly in order. Per-scenario failures become
 * outcomes; only interrupts and driver bugs escape.
 */
export async function* runScenarios(
  session: RpcCaller,
  scenarios: readonly Scenario[],
  options: RunScenariosOptions,
): AsyncGenerator<ScenarioOutcome> {
  for (const [i, scenario] of scenarios.entries()) {
    const started = Date.now();
    let responseId: string | number | null = null;
    let classification: Classification;

    try {
      const response = await session.call(
        'tools/call',
        buildToolCallParams(scenario, options.tool),
        options.callTimeoutMs,
        options.signal,
      );
      responseId = response.id;
      classification = classifyResponse(response, scenario, options);
    } catch (e) {
      const failure = failureKind(e);
      if (!failure) throw e;
      classification = { status: 'transport_failure', failure, message: describeError(e) };
    }

    yield {
      index: i + 1,
      scenario,
      response_id: responseId,
      duration_ms: Date.now() - started,
      ...classification,
    };
  }
}

export interface RunSummary {
  total: number;
  succeeded: number;
  api_errors: number;
  transport_failures: number;
  expectation_mismatches: number;
}

export function summarize(outcomes: readonly ScenarioOutcome[]): RunSummary {
  const summary: RunSummary = {
    total: outcomes.length,
    succeeded: 0,
    api_errors: 0,
    transport_failures: 0,
    expectation_mismatches: 0,
  };
  for (const outcome of outcomes) {
    if (outcome.status === 'success') {
      summary.succeeded++;
      if (outcome.expectation === 'mismatch') summary.expectation_mismatches++;
    } else if (outcome.status === 'api_error') {
      summary.api_errors++;
    } else {
      summary.transport_failures++;
    }
  }
  return summary;
}
