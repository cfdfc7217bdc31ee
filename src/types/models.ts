import type { ResourceType } from "../core/content/types";

export interface FeatureFlags {
  githubProxy: boolean;
}

/**
 * Target installation the pipeline resolves and installs against.
 * `profileRoot` is the per-instance game directory (the one holding `mods/`).
 */
export interface GameInfo {
  profileRoot: string;
  gameVersion: string;
  loader: string;
  resourceType?: ResourceType;
}

export type ResourceDirectoryResolver = (
  profileRoot: string,
  resourceType: ResourceType,
  fileName?: string,
) => string;
