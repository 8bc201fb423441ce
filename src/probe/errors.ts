import type { ZodError } from 'zod';

export type ProbeErrorKind =
  | 'spawn'
  | 'transport'
  | 'protocol'
  | 'timeout'
  | 'peer_closed'
  | 'handshake'
  | 'interrupted';

export abstract class ProbeError extends Error {
  abstract readonly kind: ProbeErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The target could not be launched (missing binary, permission denied, bad cwd). */
export class SpawnError extends ProbeError {
  readonly kind = 'spawn';

  constructor(readonly command: string, cause: unknown) {
    super(`Failed to launch ${command}: ${describeError(cause)}`, { cause });
  }
}

/** The pipe to or from the target is unusable. */
export class TransportError extends ProbeError {
  readonly kind = 'transport';
  /** The target's end of the pipe is gone (EPIPE, destroyed or ended input). */
  readonly inputClosed: boolean;

  constructor(message: string, options: { cause?: unknown; inputClosed?: boolean } = {}) {
    super(message, { cause: options.cause });
    this.inputClosed = options.inputClosed ?? false;
  }
}

/** A line arrived that is not a well-formed response to the request in flight. */
export class ProtocolError extends ProbeError {
  readonly kind = 'protocol';

  constructor(message: string, readonly line?: string) {
    super(message);
  }
}

export class TimeoutError extends ProbeError {
  readonly kind = 'timeout';

  constructor(readonly method: string, readonly elapsedMs: number) {
    super(`No response to ${method} within ${elapsedMs}ms`);
  }
}

export class PeerClosedError extends ProbeError {
  readonly kind = 'peer_closed';

  constructor(readonly method: string, detail?: string) {
    super(`Target closed its output before answering ${method}${detail ? ` (${detail})` : ''}`);
  }
}

export type HandshakeStage = 'timeout' | 'peer_closed' | 'malformed' | 'error_response' | 'transport';

export class HandshakeError extends ProbeError {
  readonly kind = 'handshake';

  constructor(readonly stage: HandshakeStage, message: string, cause?: unknown) {
    super(`Handshake failed (${stage}): ${message}`, { cause });
  }
}

export class InterruptedError extends ProbeError {
  readonly kind = 'interrupted';

  constructor(message = 'Interrupted by operator') {
    super(message);
  }
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function formatIssues(error: ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}
