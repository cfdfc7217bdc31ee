import type {
  ContentFile,
  ContentVersion,
  ModSource,
  ResourceType,
  VersionQuery,
} from "../core/content/types";

const RELEASE_VERSION = /^\d+(\.\d+)*$/;

export const isReleaseGameVersion = (version: string) => RELEASE_VERSION.test(version);

export const intersects = (left: readonly string[], right: readonly string[]) => {
  const wanted = new Set(left.map((value) => value.toLowerCase()));
  return right.some((value) => wanted.has(value.toLowerCase()));
};

export interface LoaderPolicy {
  /** Loader list sent upstream instead of the caller's selection. */
  loaders?: string[];
  skipLoaderMatch: boolean;
}

const CURSEFORGE_LOADERLESS = new Set<ResourceType>(["shader", "resourcepack", "datapack"]);

export const loaderPolicy = (
  resourceType: ResourceType,
  source: ModSource = "modrinth",
): LoaderPolicy => {
  if (source === "curseforge") {
    return { skipLoaderMatch: CURSEFORGE_LOADERLESS.has(resourceType) };
  }
  switch (resourceType) {
    case "datapack":
      return { loaders: ["datapack"], skipLoaderMatch: false };
    case "resourcepack":
      return { loaders: ["minecraft"], skipLoaderMatch: true };
    case "shader":
      return { skipLoaderMatch: true };
    case "mod":
      return { skipLoaderMatch: false };
  }
};

export const matchesVersionQuery = (
  version: Pick<ContentVersion, "gameVersions" | "loaders">,
  query: VersionQuery,
  source: ModSource = "modrinth",
) => {
  const gameVersionOk =
    query.gameVersions.length === 0 || intersects(query.gameVersions, version.gameVersions);
  if (!gameVersionOk) {
    return false;
  }
  const policy = loaderPolicy(query.resourceType, source);
  if (policy.skipLoaderMatch) {
    return true;
  }
  const loaders = policy.loaders ?? query.loaders;
  return loaders.length === 0 || intersects(loaders, version.loaders);
};

export const primaryFile = (version: Pick<ContentVersion, "files">): ContentFile | undefined =>
  version.files.find((file) => file.primary) ?? version.files[0];

const parse = (version: string) =>
  version
    .split(".")
    .map((part) => Number.parseInt(part.replace(/\D/g, ""), 10) || 0);

export const compareGameVersions = (a: string, b: string) => {
  const partsA = parse(a);
  const partsB = parse(b);
  for (let i = 0; i < Math.max(partsA.length, partsB.length); i += 1) {
    const diff = (partsA[i] ?? 0) - (partsB[i] ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  return 0;
};

export const sortGameVersionsDesc = (versions: string[]) =>
  [...versions].sort(compareGameVersions).reverse();
