import { RoutingError } from './errors.js';

/**
 * Race a venue call against a timer. The underlying promise keeps running
 * after a timeout; callers that care about a late answer hold on to it.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, venue: string, operation: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new RoutingError('TIMEOUT', venue, `${operation} on ${venue} timed out after ${ms}ms`));
    }, ms);
  });

  return Promise.race([promise, timeout]).finally(() => {
    clearTimeout(timer);
  });
}
