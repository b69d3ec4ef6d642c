import { CollaboratorError, CollaboratorTimeout, TurnCancelled } from './errors';
import { DependencyName } from './types';

/**
 * Run `fn` with a hard deadline. The callee receives a signal that aborts on
 * timeout or when `outer` aborts, so SDK calls can stop early.
 *
 * Rejects with CollaboratorTimeout on deadline, TurnCancelled when the outer
 * signal fires, and CollaboratorError for anything `fn` throws.
 */
export function withTimeout<T>(
  dependency: DependencyName,
  operation: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
  outer?: AbortSignal,
): Promise<T> {
  if (outer?.aborted) {
    return Promise.reject(new TurnCancelled(`${dependency}.${operation}`));
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;
    const settle = (finish: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      outer?.removeEventListener('abort', onOuterAbort);
      finish();
    };

    const timer = setTimeout(() => {
      controller.abort();
      settle(() => reject(new CollaboratorTimeout(dependency, operation, timeoutMs)));
    }, timeoutMs);

    const onOuterAbort = (): void => {
      controller.abort();
      settle(() => reject(new TurnCancelled(`${dependency}.${operation}`)));
    };
    outer?.addEventListener('abort', onOuterAbort, { once: true });

    fn(controller.signal).then(
      (value) => settle(() => resolve(value)),
      (err: unknown) => settle(() => reject(
        err instanceof CollaboratorTimeout || err instanceof CollaboratorError || err instanceof TurnCancelled
          ? err
          : new CollaboratorError(dependency, operation, err),
      )),
    );
  });
}

/** Abortable delay used between retries */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new TurnCancelled('retry backoff'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
