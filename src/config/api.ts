import "dotenv/config";

const normalizeBase = (value: string | undefined, fallback: string) => {
  const candidate = (value ?? "").trim();
  if (!candidate) {
    return fallback;
  }
  return candidate.replace(/\/+$/, "");
};

const optionalEnv = (value: string | undefined) => {
  const candidate = (value ?? "").trim();
  return candidate.length > 0 ? candidate : undefined;
};

export const positiveInt = (value: string | undefined, fallback: number) => {
  const parsed = Number((value ?? "").trim());
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

const env = process.env;

export const API_CONFIG = {
  modrinthBase: normalizeBase(env.MODRINTH_API_BASE, "https://api.modrinth.com/v2"),
  curseforgeBase: normalizeBase(env.CURSEFORGE_API_BASE, "https://api.curseforge.com/v1"),
  curseforgeApiKey: optionalEnv(env.CURSEFORGE_API_KEY),
  curseforgeDownloadBase: normalizeBase(
    env.CURSEFORGE_DOWNLOAD_BASE,
    "https://edge.forgecdn.net/files",
  ),
  curseforgeGameId: 432,
  githubProxyUrl: (env.GITHUB_PROXY_URL ?? "https://gh-proxy.com").trim(),
  requestTimeoutMs: positiveInt(env.API_REQUEST_TIMEOUT_MS, 10_000),
  logDirectory: optionalEnv(env.LOG_DIR),
  logLevel: optionalEnv(env.LOG_LEVEL) ?? "info",
} as const;
