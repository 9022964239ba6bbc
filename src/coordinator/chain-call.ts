import { RetryPolicy } from '../config';
import { NetworkError, errorMessage, isLaunchpadError } from '../types/errors';
import { withRetry } from '../utils/retry';

/**
 * Runs one ChainClient call with the configured timeout and backoff. Errors from a transport
 * that are not LaunchpadErrors count as network failures and are retried.
 */
export function chainCall<T>(label: string, policy: RetryPolicy, call: () => Promise<T>): Promise<T> {
  return withRetry(
    async () => {
      try {
        return await call();
      } catch (error) {
        if (isLaunchpadError(error)) throw error;
        throw new NetworkError(`${label}: ${errorMessage(error)}`);
      }
    },
    { ...policy, label }
  );
}
