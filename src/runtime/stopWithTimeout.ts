import { createLogger, type PlaybackLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';

export type StopResult =
  | { kind: 'stopped' }
  | { kind: 'timeout' }
  | { kind: 'error'; error: unknown };

/**
 * Runs a teardown step with a deadline. A step that overruns is left to
 * finish in the background; a late failure is still logged.
 */
export async function stopWithTimeout(
  name: string,
  stopFn: () => Promise<void>,
  timeoutMs: number,
  log: Pick<PlaybackLogger, 'debug' | 'warn' | 'error'> = createLogger('Runtime', 'Teardown'),
): Promise<StopResult> {
  let timer: NodeJS.Timeout | undefined;
  const settled = stopFn().then(
    (): StopResult => ({ kind: 'stopped' }),
    (error: unknown): StopResult => ({ kind: 'error', error }),
  );
  const deadline = new Promise<StopResult>((resolve) => {
    timer = setTimeout(() => resolve({ kind: 'timeout' }), timeoutMs);
  });

  const result = await Promise.race([settled, deadline]);
  clearTimeout(timer);

  switch (result.kind) {
    case 'stopped':
      log.debug(`${name} stopped`);
      break;
    case 'timeout':
      log.warn(`${name} stop timed out`, { timeoutMs });
      void settled.then((late) => {
        if (late.kind === 'error') {
          log.error(`failed to stop ${name}`, { message: errorMessage(late.error) });
        }
      });
      break;
    case 'error':
      log.error(`failed to stop ${name}`, { message: errorMessage(result.error) });
      break;
  }
  return result;
}
