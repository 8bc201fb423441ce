import { z } from 'zod';
import { JSONRPC_VERSION } from '@modelcontextprotocol/sdk/types.js';
import type { LineTransport } from './transport.js';
import {
  InterruptedError,
  PeerClosedError,
  ProtocolError,
  TimeoutError,
  TransportError,
  describeError,
  formatIssues,
} from './errors.js';
import { logger } from './log.js';

export interface JsonRpcErrorPayload {
  code: number;
  message: string;
  data?: unknown;
  [key: string]: unknown;
}

export type ResponseEnvelope =
  | { jsonrpc: typeof JSONRPC_VERSION; id: string | number; result: unknown }
  | { jsonrpc: typeof JSONRPC_VERSION; id: string | number; error: JsonRpcErrorPayload };

export type RequestParams = Record<string, unknown>;

export interface JsonRpcRequest {
  jsonrpc: typeof JSONRPC_VERSION;
  id: string;
  method: string;
  params: RequestParams;
}

export interface JsonRpcNotification {
  jsonrpc: typeof JSONRPC_VERSION;
  method: string;
  params?: RequestParams;
}

/** The one operation scenarios need; lets the runner be driven without a process. */
export interface RpcCaller {
  call(method: string, params: RequestParams, timeoutMs: number, signal?: AbortSignal): Promise<ResponseEnvelope>;
}

export interface SessionOptions {
  idPrefix?: string;
  /** Skip lines that do not start with `{` instead of treating them as protocol violations. */
  skipNonJsonLines?: boolean;
  /** Extra detail for PeerClosedError, e.g. the target's exit status. */
  describeClosure?: () => string | undefined;
}

export interface SentMessage {
  id: string | null;
  method: string;
}

const JsonRpcErrorSchema = z
  .object({
    code: z.number().int(),
    message: z.string(),
    data: z.unknown().optional(),
  })
  .passthrough();

const IncomingSchema = z
  .object({
    jsonrpc: z.literal(JSONRPC_VERSION),
    id: z.union([z.string(), z.number()]).nullish(),
    method: z.string().optional(),
    result: z.unknown().optional(),
    error: z.unknown().optional(),
  })
  .passthrough();

const TIMED_OUT = Symbol('timed out');
const INTERRUPTED = Symbol('interrupted');

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null;
}

export function isErrorResponse(
  response: ResponseEnvelope,
): response is Extract<ResponseEnvelope, { error: JsonRpcErrorPayload }> {
  return 'error' in response;
}

/**
 * Request/response over a LineTransport with exactly one request in flight.
 * `initialize` must go first; everything else waits for markInitialized().
 */
export class RpcSession implements RpcCaller {
  readonly history: SentMessage[] = [];
  private seq = 0;
  private initializeSent = false;
  private initialized = false;
  private closed = false;
  private readonly abandoned = new Set<string>();
  private readonly idPrefix: string;

  constructor(
    private readonly transport: LineTransport,
    private readonly options: SessionOptions = {},
  ) {
    this.idPrefix = options.idPrefix ?? 'probe';
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  markInitialized(): void {
    if (!this.initializeSent) {
      throw new Error('markInitialized() called before initialize was sent');
    }
    this.initialized = true;
  }

  async call(method: string, params: RequestParams, timeoutMs: number, signal?: AbortSignal): Promise<ResponseEnvelope> {
    this.assertMaySend(method);
    if (signal?.aborted) throw new InterruptedError();
    this.assertPeerOpen(method);

    const id = `${this.idPrefix}-${++this.seq}`;
    const request: JsonRpcRequest = { jsonrpc: JSONRPC_VERSION, id, method, params };
    const started = Date.now();

    await this.write(request, method);
    this.history.push({ id, method });

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(TIMED_OUT), timeoutMs);
    const onInterrupt = () => controller.abort(INTERRUPTED);
    signal?.addEventListener('abort', onInterrupt, { once: true });
    // the signal may have fired while the write was pending
    if (signal?.aborted) onInterrupt();

    try {
      for (;;) {
        const line = await this.transport.readLine(controller.signal);
        if (line === null) throw this.peerClosed(method);

        const response = this.parseLine(line, method);
        if (!response) continue;
        if (response.id === id) return response;

        if (typeof response.id === 'string' && this.abandoned.delete(response.id)) {
          logger.warn(`Discarding late response ${response.id} while waiting for ${id} (${method})`);
          continue;
        }
        throw new ProtocolError(
          `Response id ${JSON.stringify(response.id)} does not match request ${id} (${method})`,
          line,
        );
      }
    } catch (e) {
      if (e === TIMED_OUT) {
        this.abandoned.add(id);
        throw new TimeoutError(method, Date.now() - started);
      }
      if (e === INTERRUPTED) {
        this.abandoned.add(id);
        throw new InterruptedError();
      }
      if (e instanceof ProtocolError) {
        this.abandoned.add(id);
      }
      throw e;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onInterrupt);
    }
  }

  /** Fire-and-forget message; no response is read. */
  async notify(method: string, params?: RequestParams): Promise<void> {
    this.assertMaySend(method);
    this.assertPeerOpen(method);

    const notification: JsonRpcNotification = { jsonrpc: JSONRPC_VERSION, method };
    if (params) notification.params = params;
    await this.write(notification, method);
    this.history.push({ id: null, method });
  }

  /** The target may exit between requests; its output ends before we write. */
  private assertPeerOpen(method: string): void {
    if (this.closed || this.transport.isEnded) throw this.peerClosed(method);
  }

  private async write(message: JsonRpcRequest | JsonRpcNotification, method: string): Promise<void> {
    try {
      await this.transport.writeMessage(message);
    } catch (e) {
      if (e instanceof TransportError && (e.inputClosed || this.transport.isEnded)) {
        throw this.peerClosed(method);
      }
      throw e;
    }
  }

  private peerClosed(method: string): PeerClosedError {
    this.closed = true;
    return new PeerClosedError(method, this.options.describeClosure?.());
  }

  private assertMaySend(method: string): void {
    if (method === 'initialize') {
      if (this.initializeSent) {
        throw new Error('initialize may only be sent once per session');
      }
      this.initializeSent = true;
      return;
    }
    if (!this.initialized) {
      throw new Error(`${method} sent before the handshake completed`);
    }
  }

  /** A response envelope, or null for lines that are not responses at all. */
  private parseLine(line: string, method: string): ResponseEnvelope | null {
    const trimmed = line.trim();
    if (!trimmed) return null;

    if (this.options.skipNonJsonLines && !trimmed.startsWith('{')) {
      logger.debug(`Skipping non-JSON output: ${trimmed.slice(0, 200)}`);
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (e) {
      throw new ProtocolError(`Malformed response to ${method}: ${describeError(e)}`, line);
    }

    const envelope = IncomingSchema.safeParse(parsed);
    if (!envelope.success) {
      throw new ProtocolError(`Malformed response to ${method}: ${formatIssues(envelope.error)}`, line);
    }

    const msg = envelope.data;
    if (msg.method !== undefined) {
      logger.debug(`Ignoring server-initiated ${msg.method}`);
      return null;
    }
    if (msg.id === undefined || msg.id === null) {
      throw new ProtocolError(`Response to ${method} carries no id`, line);
    }

    const hasResult = isPresent(msg.result);
    const hasError = isPresent(msg.error);
    if (hasResult && hasError) {
      throw new ProtocolError(`Response to ${method} carries both result and error`, line);
    }
    if (!hasResult && !hasError) {
      throw new ProtocolError(`Response to ${method} carries neither result nor error`, line);
    }

    if (hasError) {
      const error = JsonRpcErrorSchema.safeParse(msg.error);
      if (!error.success) {
        throw new ProtocolError(`Malformed error object in response to ${method}: ${formatIssues(error.error)}`, line);
      }
      return { jsonrpc: JSONRPC_VERSION, id: msg.id, error: error.data };
    }
    return { jsonrpc: JSONRPC_VERSION, id: msg.id, result: msg.result };
  }
}
