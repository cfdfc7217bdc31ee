import { API_CONFIG } from "../config/api";
import { featureFlags } from "../config/featureFlags";

const PROXIED_HOSTS = new Set(["github.com", "raw.githubusercontent.com"]);

export const normalizeProxyPrefix = (value: string) => {
  const trimmed = value.trim().replace(/\/+$/, "");
  return /^https?:\/\//i.test(trimmed) ? trimmed : null;
};

export const applyGithubProxy = (
  url: string,
  {
    enabled = featureFlags.githubProxy,
    proxyUrl = API_CONFIG.githubProxyUrl,
  }: { enabled?: boolean; proxyUrl?: string } = {},
) => {
  if (!enabled) {
    return url;
  }
  const prefix = normalizeProxyPrefix(proxyUrl);
  if (!prefix || url.startsWith(`${prefix}/`)) {
    return url;
  }
  let host: string;
  try {
    host = new URL(url).hostname.toLowerCase();
  } catch {
    return url;
  }
  return PROXIED_HOSTS.has(host) ? `${prefix}/${url}` : url;
};
