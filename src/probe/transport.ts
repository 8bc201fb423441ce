import * as readline from 'readline';
import type { Readable, Writable } from 'stream';
import { TransportError, describeError } from './errors.js';

const CLOSED_PIPE_CODES = new Set(['EPIPE', 'ECONNRESET', 'ERR_STREAM_DESTROYED', 'ERR_STREAM_WRITE_AFTER_END']);

function isClosedPipe(err: Error): boolean {
  return 'code' in err && typeof err.code === 'string' && CLOSED_PIPE_CODES.has(err.code);
}

interface Waiter {
  resolve: (line: string | null) => void;
  detach: () => void;
}

/**
 * Newline-delimited framing over a child's stdin/stdout. One JSON document per
 * line out; one raw line at a time in.
 */
export class LineTransport {
  private readonly rl: readline.Interface;
  private readonly queue: string[] = [];
  private readonly waiters: Waiter[] = [];
  private ended = false;
  private writeFailure: Error | null = null;

  constructor(private readonly input: Writable, output: Readable) {
    this.rl = readline.createInterface({ input: output, crlfDelay: Infinity });
    this.rl.on('line', (line) => this.push(line));
    this.rl.on('close', () => this.finish());
    input.on('error', (err) => {
      this.writeFailure = err;
    });
  }

  get isEnded(): boolean {
    return this.ended && this.queue.length === 0;
  }

  /** Serialize, write and wait until the bytes are handed to the pipe. */
  async writeMessage(document: object): Promise<void> {
    if (this.writeFailure) {
      throw new TransportError(`Target input is broken: ${this.writeFailure.message}`, {
        cause: this.writeFailure,
        inputClosed: isClosedPipe(this.writeFailure),
      });
    }
    if (this.input.destroyed || this.input.writableEnded) {
      throw new TransportError('Target input is closed', { inputClosed: true });
    }

    const line = JSON.stringify(document) + '\n';
    await new Promise<void>((resolve, reject) => {
      this.input.write(line, (err) => {
        if (err) {
          reject(
            new TransportError(`Write to target failed: ${describeError(err)}`, {
              cause: err,
              inputClosed: isClosedPipe(err),
            }),
          );
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Next line, or null once the target's output has ended. Aborting the
   * signal rejects with its reason and leaves any later line in the queue.
   */
  readLine(signal?: AbortSignal): Promise<string | null> {
    const queued = this.queue.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (this.ended) return Promise.resolve(null);
    if (signal?.aborted) return Promise.reject(signal.reason);

    return new Promise((resolve, reject) => {
      const onAbort = () => {
        const idx = this.waiters.indexOf(waiter);
        if (idx !== -1) this.waiters.splice(idx, 1);
        reject(signal?.reason);
      };
      const waiter: Waiter = {
        resolve,
        detach: () => signal?.removeEventListener('abort', onAbort),
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  close(): void {
    this.rl.close();
    this.finish();
  }

  private push(line: string): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.detach();
      waiter.resolve(line);
    } else {
      this.queue.push(line);
    }
  }

  private finish(): void {
    if (this.ended) return;
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.detach();
      waiter.resolve(null);
    }
  }
}
