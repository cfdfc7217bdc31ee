import path from "node:path";

import { CONCURRENCY_LIMITS } from "../config/limits";
import { queryFor, requireGameInfo, resolveMissingDependencies } from "../core/content/dependencyResolver";
import { ContentProviderRegistry } from "../core/content/registry";
import type {
  ContentProject,
  ContentSearchFilters,
  ContentVersion,
  ModSource,
  ResolvedDependency,
} from "../core/content/types";
import { resolveBestVersion } from "../core/content/versionResolver";
import { ResourceError, ValidationError, errorMessage } from "../core/errors";
import type { GameInfo, ResourceDirectoryResolver } from "../types/models";
import { primaryFile } from "../utils/versionHelpers";
import { ContentHashIndex } from "./contentHashIndex";
import { fetchAll, type DownloadRequest } from "./downloadQueue";
import {
  RESOURCE_DIRECTORIES,
  resolveResourceDirectory,
  resourceDestination,
} from "./instanceWorkspaceService";
import { createLogger } from "./logService";

const logger = createLogger("downloads");

const defaultRegistry = new ContentProviderRegistry();
const defaultHashIndex = new ContentHashIndex();

export interface ModSearchOptions extends ContentSearchFilters {
  source?: "all" | ModSource;
}

export const searchMods = async (
  { source, ...filters }: ModSearchOptions,
  registry: ContentProviderRegistry = defaultRegistry,
) => {
  if (!source || source === "all") {
    return registry.searchAll(filters);
  }
  return (await registry.getProvider(source).search(filters)).hits;
};

export interface InstallOptions {
  registry?: ContentProviderRegistry;
  hashIndex?: ContentHashIndex;
  /** Installs this version instead of the best compatible one. */
  versionId?: string;
  resolveDirectory?: ResourceDirectoryResolver;
  concurrency?: number;
  retries?: number;
}

export interface InstallFailure {
  projectId: string;
  error: unknown;
}

export interface InstallResult {
  project: ContentProject;
  version: ContentVersion;
  installed: string[];
  failed: InstallFailure[];
  missingDependencies: ResolvedDependency[];
}

interface InstallRequest extends DownloadRequest {
  projectId: string;
}

export const installResource = async (
  projectId: string,
  gameInfo: GameInfo | undefined,
  {
    registry = defaultRegistry,
    hashIndex = defaultHashIndex,
    versionId,
    resolveDirectory = resolveResourceDirectory,
    concurrency = CONCURRENCY_LIMITS.downloads,
    retries = 1,
  }: InstallOptions = {},
): Promise<InstallResult> => {
  const profile = requireGameInfo(gameInfo);
  const resourceType = profile.resourceType ?? "mod";
  if (!Object.hasOwn(RESOURCE_DIRECTORIES, resourceType)) {
    throw new ValidationError(`Tipo de recurso no instalable: ${resourceType}`);
  }

  const version = versionId
    ? await registry.providerFor(versionId).getVersion(versionId, projectId)
    : await resolveBestVersion(registry, projectId, queryFor(profile));
  if (!version) {
    throw new ResourceError(`No hay versiones compatibles de ${projectId} para ${profile.gameVersion}`);
  }
  const project = await registry.providerFor(projectId).getProjectDetail(projectId);

  const missingDependencies = await resolveMissingDependencies(projectId, version, profile, {
    registry,
    hashIndex,
    resolveDirectory,
  });

  const failed: InstallFailure[] = [];
  const requests: InstallRequest[] = [];
  const targets = [{ projectId, version }, ...missingDependencies.map((dependency) => ({
    projectId: dependency.project.id,
    version: dependency.version,
  }))];
  for (const target of targets) {
    const file = primaryFile(target.version);
    if (!file?.url) {
      failed.push({
        projectId: target.projectId,
        error: new ResourceError(`La versión ${target.version.id} no tiene archivo descargable`),
      });
      continue;
    }
    requests.push({
      projectId: target.projectId,
      url: file.url,
      destination: resourceDestination(profile.profileRoot, resourceType, file.filename, resolveDirectory),
      expectedSha1: file.hashes.sha1,
    });
  }

  const results = await fetchAll(requests, concurrency, { retries });
  const installed: string[] = [];
  for (const result of results) {
    if (!result.ok) {
      failed.push({ projectId: result.request.projectId, error: result.error });
      continue;
    }
    await hashIndex.recordInstalled(path.dirname(result.path), result.path);
    installed.push(result.path);
  }

  const rootFailure = failed.find((failure) => failure.projectId === projectId);
  if (rootFailure) {
    throw rootFailure.error;
  }
  for (const failure of failed) {
    logger.warn(`Dependencia no instalada ${failure.projectId}: ${errorMessage(failure.error)}`);
  }
  logger.info(`Instalado ${projectId} (${version.id}) con ${installed.length - 1} dependencias`);
  return { project, version, installed, failed, missingDependencies };
};
