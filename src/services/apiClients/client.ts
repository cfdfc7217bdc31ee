import { API_CONFIG } from "../../config/api";
import { NetworkError, errorMessage, isAppError } from "../../core/errors";

const cache = new Map<string, { value: unknown; expiresAt: number }>();
let lastRequest = 0;

const settings = {
  requestIntervalMs: 200,
  retryAttempts: 3,
  retryDelayMs: 220,
  timeoutMs: API_CONFIG.requestTimeoutMs,
};

export const configureApiClient = (overrides: Partial<typeof settings>) => {
  Object.assign(settings, overrides);
};

export const resetApiClient = () => {
  cache.clear();
  lastRequest = 0;
};

const wait = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

const buildCacheKey = (url: string, init?: RequestInit) => {
  const headers = init?.headers ? new Headers(init.headers) : undefined;
  const headerEntries = headers ? Array.from(headers.entries()) : [];
  const headerKey = headerEntries.length
    ? JSON.stringify(headerEntries)
    : "no-headers";
  const method = init?.method ?? "GET";
  return `${method}:${url}:${headerKey}`;
};

const isRetryableStatus = (status: number) =>
  status === 408 || status === 425 || status === 429 || status >= 500;

const fetchWithTimeout = async (url: string, init?: RequestInit) => {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), settings.timeoutMs);
  try {
    return await fetch(url, {
      ...init,
      signal: init?.signal ?? controller.signal,
    });
  } finally {
    clearTimeout(timeoutId);
  }
};

/**
 * GET a JSON document with a TTL cache, a minimum spacing between requests
 * and retries on transport errors and 408/425/429/5xx. A stale cached value is
 * returned when every attempt fails.
 */
export const apiFetch = async <T>(
  url: string,
  { ttl = 60_000, init }: { ttl?: number; init?: RequestInit } = {},
): Promise<T> => {
  const cacheKey = buildCacheKey(url, init);
  const cached = cache.get(cacheKey);
  if (cached && cached.expiresAt > Date.now()) {
    return cached.value as T;
  }

  let lastError: unknown;

  for (let attempt = 0; attempt < settings.retryAttempts; attempt += 1) {
    const now = Date.now();
    if (now - lastRequest < settings.requestIntervalMs) {
      await wait(settings.requestIntervalMs - (now - lastRequest));
    }
    lastRequest = Date.now();

    try {
      const response = await fetchWithTimeout(url, init);
      if (!response.ok) {
        const failure = new NetworkError(`Error API ${response.status}`, url, response.status);
        if (!isRetryableStatus(response.status)) {
          throw failure;
        }
        lastError = failure;
        if (attempt < settings.retryAttempts - 1) {
          await wait(settings.retryDelayMs * (attempt + 1));
        }
        continue;
      }
      const data = (await response.json()) as T;
      cache.set(cacheKey, { value: data, expiresAt: Date.now() + ttl });
      return data;
    } catch (error) {
      if (isAppError(error)) {
        throw error;
      }
      lastError = error;
      if (attempt === settings.retryAttempts - 1) {
        break;
      }
      await wait(settings.retryDelayMs * (attempt + 1));
    }
  }

  if (cached) {
    return cached.value as T;
  }

  if (lastError instanceof NetworkError) {
    throw lastError;
  }
  throw new NetworkError(
    `No se pudo conectar con la API: ${errorMessage(lastError)}`,
    url,
    undefined,
    lastError,
  );
};
