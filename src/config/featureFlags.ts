import "dotenv/config";

import type { FeatureFlags } from "../types/models";

const flag = (value: string | undefined, fallback: boolean) => {
  const candidate = (value ?? "").trim().toLowerCase();
  if (!candidate) {
    return fallback;
  }
  return !["0", "false", "no", "off"].includes(candidate);
};

export const featureFlags: FeatureFlags = {
  githubProxy: flag(process.env.FEATURE_GITHUB_PROXY, true),
};
