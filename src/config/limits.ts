import { positiveInt } from "./api";

export const CONCURRENCY_LIMITS = {
  fileDetails: 20,
  serverResolution: 20,
  dependencyVersions: 10,
  downloads: positiveInt(process.env.MAX_CONCURRENT_DOWNLOADS, 8),
} as const;

export const SERVER_PING_TIMEOUT_MS = 5_000;
export const DEFAULT_SERVER_PORT = 25565;
