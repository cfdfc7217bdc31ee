export interface RetryOptions {
  attempts?: number;
  delayMs?: number;
  shouldRetry?: (error: unknown) => boolean;
}

export const retry = async <T>(
  fn: () => Promise<T>,
  { attempts = 3, delayMs = 250, shouldRetry = () => true }: RetryOptions = {},
): Promise<T> => {
  let lastError: unknown;
  for (let i = 0; i < attempts; i += 1) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (i === attempts - 1 || !shouldRetry(error)) {
        break;
      }
      await new Promise((resolve) => setTimeout(resolve, delayMs * (i + 1)));
    }
  }
  throw lastError;
};
