import { logger } from './log.js';

type SignalListener = (signal: NodeJS.Signals) => void;

/** `process`, or any emitter standing in for it. */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: SignalListener): unknown;
  off(event: NodeJS.Signals, listener: SignalListener): unknown;
}

const FORWARDED: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Turn SIGINT/SIGTERM into an abort of `controller`. Returns the function that
 * removes the handlers again.
 */
export function abortOnSignals(controller: AbortController, source: SignalSource = process): () => void {
  const onSignal: SignalListener = (signal) => {
    if (controller.signal.aborted) return;
    logger.warn(`Received ${signal}, stopping the target`);
    controller.abort();
  };
  for (const signal of FORWARDED) source.on(signal, onSignal);
  return () => {
    for (const signal of FORWARDED) source.off(signal, onSignal);
  };
}
