import path from "node:path";

import { CONCURRENCY_LIMITS } from "../config/limits";
import { DownloadError, errorMessage } from "../core/errors";
import { retry } from "../utils/retry";
import { runBounded } from "../utils/runBounded";
import { downloadFile } from "./downloadService";
import { createLogger } from "./logService";

const logger = createLogger("downloads");

export interface DownloadRequest {
  url: string;
  destination: string;
  expectedSha1?: string;
}

export type FetchResult<R extends DownloadRequest = DownloadRequest> =
  | { ok: true; request: R; path: string }
  | { ok: false; request: R; error: unknown };

export interface FetchAllOptions {
  /** Extra attempts per item after the first failure. */
  retries?: number;
  retryDelayMs?: number;
}

/**
 * Downloads every request in sequential batches of `maxConcurrency`. Failures
 * never stop the run: each request yields exactly one result.
 */
export const fetchAll = async <R extends DownloadRequest>(
  requests: readonly R[],
  maxConcurrency: number = CONCURRENCY_LIMITS.downloads,
  { retries = 0, retryDelayMs = 300 }: FetchAllOptions = {},
): Promise<FetchResult<R>[]> => {
  const claimed = new Set<string>();
  const duplicates = new Set<number>();
  requests.forEach((request, index) => {
    const key = path.resolve(request.destination);
    if (claimed.has(key)) {
      duplicates.add(index);
    } else {
      claimed.add(key);
    }
  });

  const results = await runBounded(requests, maxConcurrency, async (request, index) => {
    if (duplicates.has(index)) {
      throw new DownloadError(`Destino duplicado en la misma tanda: ${request.destination}`, request.url);
    }
    return retry(() => downloadFile(request.url, request.destination, request.expectedSha1), {
      attempts: retries + 1,
      delayMs: retryDelayMs,
    });
  });

  return results.map((result): FetchResult<R> => {
    if (result.status === "fulfilled") {
      return { ok: true, request: result.item, path: result.value };
    }
    logger.warn(`Error en descarga de ${result.item.url}: ${errorMessage(result.reason)}`);
    return { ok: false, request: result.item, error: result.reason };
  });
};
