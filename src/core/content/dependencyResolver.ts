import { CONCURRENCY_LIMITS } from "../../config/limits";
import type { ContentHashIndex } from "../../services/contentHashIndex";
import { resolveResourceDirectory } from "../../services/instanceWorkspaceService";
import { createLogger } from "../../services/logService";
import type { GameInfo, ResourceDirectoryResolver } from "../../types/models";
import { runBounded } from "../../utils/runBounded";
import { primaryFile } from "../../utils/versionHelpers";
import { ConfigurationError, errorMessage } from "../errors";
import type { ContentProviderRegistry } from "./registry";
import type { ContentVersion, ResolvedDependency, VersionQuery } from "./types";
import { resolveBestVersion } from "./versionResolver";

const logger = createLogger("dependencies");

export interface DependencyContext {
  registry: ContentProviderRegistry;
  hashIndex: ContentHashIndex;
  resolveDirectory?: ResourceDirectoryResolver;
  concurrency?: number;
}

export const requireGameInfo = (gameInfo?: GameInfo): GameInfo => {
  if (!gameInfo?.profileRoot || !gameInfo.gameVersion || !gameInfo.loader) {
    throw new ConfigurationError("Faltan datos del perfil de juego para resolver dependencias.");
  }
  return gameInfo;
};

export const queryFor = (gameInfo: GameInfo): VersionQuery => ({
  gameVersions: [gameInfo.gameVersion],
  loaders: [gameInfo.loader],
  resourceType: gameInfo.resourceType ?? "mod",
});

interface DependencyTarget {
  projectId: string;
  versionId?: string;
}

const requiredTargets = (version: ContentVersion): DependencyTarget[] => {
  const seen = new Set<string>();
  return version.dependencies.flatMap((dependency) => {
    const projectId = dependency.projectId?.trim();
    if (dependency.dependencyType !== "required" || !projectId || seen.has(projectId)) {
      return [];
    }
    seen.add(projectId);
    return [{ projectId, versionId: dependency.versionId?.trim() || undefined }];
  });
};

const resolveTarget = async (
  registry: ContentProviderRegistry,
  target: DependencyTarget,
  query: VersionQuery,
): Promise<ResolvedDependency | null> => {
  const version = target.versionId
    ? await registry.providerFor(target.versionId).getVersion(target.versionId, target.projectId)
    : await resolveBestVersion(registry, target.projectId, query);
  if (!version) {
    logger.info(`Sin versión compatible para la dependencia ${target.projectId}`);
    return null;
  }
  const project = await registry.providerFor(target.projectId).getProjectDetail(target.projectId);
  return { project, version };
};

const isMissing = async (
  resolved: ResolvedDependency,
  gameInfo: GameInfo,
  hashIndex: ContentHashIndex,
  resolveDirectory: ResourceDirectoryResolver,
) => {
  const file = primaryFile(resolved.version);
  const sha1 = file?.hashes.sha1;
  if (!file || !sha1) {
    return true;
  }
  const directory = resolveDirectory(
    gameInfo.profileRoot,
    gameInfo.resourceType ?? "mod",
    file.filename,
  );
  try {
    return !(await hashIndex.contains(directory, sha1));
  } catch (error) {
    logger.warn(
      `No se pudo consultar el índice de ${directory}; ${resolved.project.id} se considera ausente: ${errorMessage(error)}`,
    );
    return true;
  }
};

/**
 * Required dependencies of `rootVersion` that are not installed in the
 * profile. Only the direct dependencies are considered; those of the
 * returned versions are not followed.
 */
export const resolveMissingDependencies = async (
  rootProjectId: string,
  rootVersion: ContentVersion,
  gameInfo: GameInfo | undefined,
  {
    registry,
    hashIndex,
    resolveDirectory = resolveResourceDirectory,
    concurrency = CONCURRENCY_LIMITS.dependencyVersions,
  }: DependencyContext,
): Promise<ResolvedDependency[]> => {
  const profile = requireGameInfo(gameInfo);
  const query = queryFor(profile);
  const targets = requiredTargets(rootVersion).filter((target) => target.projectId !== rootProjectId);

  const results = await runBounded(targets, concurrency, (target) =>
    resolveTarget(registry, target, query),
  );

  const resolved: ResolvedDependency[] = [];
  for (const result of results) {
    if (result.status === "rejected") {
      logger.warn(
        `No se pudo resolver la dependencia ${result.item.projectId} de ${rootProjectId}: ${errorMessage(result.reason)}`,
      );
      continue;
    }
    if (result.value && (await isMissing(result.value, profile, hashIndex, resolveDirectory))) {
      resolved.push(result.value);
    }
  }
  return resolved;
};

/** Missing dependencies of the first version of `projectId` compatible with the profile. */
export const fetchProjectDependencies = async (
  projectId: string,
  gameInfo: GameInfo | undefined,
  context: DependencyContext,
): Promise<ResolvedDependency[]> => {
  const profile = requireGameInfo(gameInfo);
  const rootVersion = await resolveBestVersion(context.registry, projectId, queryFor(profile));
  if (!rootVersion) {
    return [];
  }
  return resolveMissingDependencies(projectId, rootVersion, profile, context);
};
