import { z } from 'zod';
import type { Implementation } from '@modelcontextprotocol/sdk/types.js';
import { type ResponseEnvelope, type RpcSession, isErrorResponse } from './session.js';
import { HandshakeError, ProbeError, describeError, formatIssues, type HandshakeStage } from './errors.js';
import { logger } from './log.js';

export interface HandshakeRequest {
  protocolVersion: string;
  clientInfo: Implementation;
}

export interface HandshakeOptions {
  timeoutMs: number;
  sendInitializedNotification?: boolean;
  signal?: AbortSignal;
}

export interface HandshakeResult {
  protocol_version: string | null;
  server_info: { name: string; version: string | null } | null;
  capabilities: Record<string, unknown>;
  raw: unknown;
}

export interface ToolDiscovery {
  ok: boolean;
  tools: string[];
  error?: string;
}

const InitializeResultSchema = z
  .object({
    protocolVersion: z.string().optional(),
    capabilities: z.record(z.unknown()).optional(),
    serverInfo: z
      .object({
        name: z.string(),
        version: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

const ToolsListResultSchema = z
  .object({
    tools: z.array(z.object({ name: z.string() }).passthrough()),
  })
  .passthrough();

function stageFor(e: ProbeError): HandshakeStage {
  switch (e.kind) {
    case 'timeout':
      return 'timeout';
    case 'peer_closed':
      return 'peer_closed';
    case 'protocol':
      return 'malformed';
    default:
      return 'transport';
  }
}

/**
 * The one `initialize` exchange. Anything but a well-formed result is a
 * HandshakeError; operator interrupts pass through untouched.
 */
export async function initialize(
  session: RpcSession,
  request: HandshakeRequest,
  options: HandshakeOptions,
): Promise<HandshakeResult> {
  let response: ResponseEnvelope;
  try {
    response = await session.call(
      'initialize',
      {
        protocolVersion: request.protocolVersion,
        capabilities: {},
        clientInfo: { name: request.clientInfo.name, version: request.clientInfo.version },
      },
      options.timeoutMs,
      options.signal,
    );
  } catch (e) {
    if (e instanceof ProbeError && e.kind !== 'interrupted') {
      throw new HandshakeError(stageFor(e), e.message, e);
    }
    throw e;
  }

  if (isErrorResponse(response)) {
    throw new HandshakeError(
      'error_response',
      `server answered initialize with error ${response.error.code}: ${response.error.message}`,
    );
  }

  const { result } = response;
  if (result === null || typeof result !== 'object' || Array.isArray(result)) {
    throw new HandshakeError('malformed', 'initialize result is not an object');
  }
  const parsed = InitializeResultSchema.safeParse(result);
  if (!parsed.success) {
    throw new HandshakeError('malformed', `initialize result is malformed: ${formatIssues(parsed.error)}`);
  }

  session.markInitialized();

  if (options.sendInitializedNotification) {
    try {
      await session.notify('notifications/initialized');
    } catch (e) {
      throw new HandshakeError('transport', `could not send notifications/initialized: ${describeError(e)}`, e);
    }
  }

  const { protocolVersion, capabilities, serverInfo } = parsed.data;
  if (protocolVersion && protocolVersion !== request.protocolVersion) {
    logger.warn(`Server negotiated protocol ${protocolVersion} (requested ${request.protocolVersion})`);
  }

  return {
    protocol_version: protocolVersion ?? null,
    server_info: serverInfo ? { name: serverInfo.name, version: serverInfo.version ?? null } : null,
    capabilities: capabilities ?? {},
    raw: result,
  };
}

/** `tools/list`; failures are reported, never thrown (except interrupts). */
export async function discoverTools(session: RpcSession, timeoutMs: number, signal?: AbortSignal): Promise<ToolDiscovery> {
  try {
    const response = await session.call('tools/list', {}, timeoutMs, signal);
    if (isErrorResponse(response)) {
      return { ok: false, tools: [], error: `error ${response.error.code}: ${response.error.message}` };
    }
    const parsed = ToolsListResultSchema.safeParse(response.result);
    if (!parsed.success) {
      return { ok: false, tools: [], error: 'tools/list result has no tools array' };
    }
    return { ok: true, tools: parsed.data.tools.map((t) => t.name) };
  } catch (e) {
    if (e instanceof ProbeError && e.kind === 'interrupted') throw e;
    return { ok: false, tools: [], error: describeError(e) };
  }
}
