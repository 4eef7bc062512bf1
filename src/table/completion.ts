import { toError } from '../errors';
import type { Logger } from '../logger';

export type CompletionCallback<T> = (error: Error | null, result: T | null) => void;

/**
 * Hands the outcome of an operation to a callback exactly once. Local and remote
 * failures travel the same way. A callback that throws is logged, not rethrown.
 */
export function deliver<T>(operation: Promise<T>, callback: CompletionCallback<T>, log: Logger): void {
  void operation.then(
    (result) => invoke(callback, null, result, log),
    (err: unknown) => invoke(callback, toError(err), null, log),
  );
}

function invoke<T>(callback: CompletionCallback<T>, error: Error | null, result: T | null, log: Logger): void {
  try {
    callback(error, result);
  } catch (err) {
    log.error({ err }, 'Completion callback threw');
  }
}
