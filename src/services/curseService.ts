import { CONCURRENCY_LIMITS } from "../config/limits";
import {
  CURSEFORGE_CLASS_IDS,
  convertFile,
  convertProject,
  detailedFileFromDto,
  loaderIdFor,
  mergeFileDetail,
  synthesizeIndexedFiles,
  type CurseforgeFile,
  type CurseforgeIndexedFile,
} from "../core/content/curseforgeAdapter";
import { requireCurseforgeId } from "../core/content/projectRef";
import type {
  ContentProject,
  ContentSearchFilters,
  ContentSearchResult,
  ContentVersion,
  VersionQuery,
} from "../core/content/types";
import { ResourceError, errorMessage } from "../core/errors";
import { runBounded } from "../utils/runBounded";
import { intersects, loaderPolicy } from "../utils/versionHelpers";
import {
  fetchCurseforgeCategories,
  fetchCurseforgeFile,
  fetchCurseforgeFiles,
  fetchCurseforgeMinecraftVersions,
  fetchCurseforgeMod,
  fetchCurseforgeModDescription,
  searchCurseforgeMods,
  type CurseforgeRequestOptions,
} from "./apiClients/curseforge";
import { createLogger } from "./logService";

const logger = createLogger("registry");

// Up to this many selected game versions, one listing is requested per version.
const PER_VERSION_LISTING_MAX = 3;

export const searchCurseforge = async (
  filters: ContentSearchFilters,
  options?: CurseforgeRequestOptions,
): Promise<ContentSearchResult> => {
  const modLoaderTypes = (filters.loaders ?? []).flatMap((loader) => {
    const id = loaderIdFor(loader);
    return id === undefined ? [] : [id];
  });
  const categoryIds = (filters.categories ?? [])
    .map(Number)
    .filter((value) => Number.isInteger(value) && value > 0);
  const pageSize = filters.limit ?? 20;
  const response = await searchCurseforgeMods(
    {
      query: filters.query,
      classId: filters.projectType ? CURSEFORGE_CLASS_IDS[filters.projectType] : undefined,
      categoryIds,
      gameVersions: filters.gameVersions,
      modLoaderTypes,
      pageSize,
      index: filters.offset ?? 0,
    },
    options,
  );
  const hits = (response.data ?? []).map((mod) => convertProject(mod));
  return {
    hits,
    offset: response.pagination?.index ?? filters.offset ?? 0,
    limit: response.pagination?.pageSize ?? pageSize,
    totalHits: response.pagination?.totalCount ?? hits.length,
  };
};

export const fetchCurseforgeProject = async (
  projectId: string,
  options?: CurseforgeRequestOptions,
): Promise<ContentProject> => {
  const modId = requireCurseforgeId(projectId);
  const [mod, description] = await Promise.allSettled([
    fetchCurseforgeMod(modId, options),
    fetchCurseforgeModDescription(modId, options),
  ]);
  if (mod.status === "rejected") {
    throw mod.reason;
  }
  if (description.status === "rejected") {
    logger.warn(`Descripción no disponible para ${projectId}: ${errorMessage(description.reason)}`);
  }
  return convertProject(mod.value.data, description.status === "fulfilled" ? description.value.data : "");
};

export interface ProjectFileFilters extends CurseforgeRequestOptions {
  gameVersion?: string;
  /** CurseForge loader ids; a file matches when it shares at least one. */
  modLoaderTypes?: number[];
  detailConcurrency?: number;
}

const enrichIndexedFiles = async (
  files: CurseforgeIndexedFile[],
  concurrency: number,
  options: CurseforgeRequestOptions,
): Promise<CurseforgeFile[]> => {
  const results = await runBounded(files, concurrency, (file) =>
    fetchCurseforgeFile(file.projectId, file.id, options),
  );
  return results.map((result) => {
    if (result.status === "fulfilled") {
      return mergeFileDetail(result.item, result.value.data);
    }
    logger.warn(
      `No se pudo obtener el detalle del archivo ${result.item.id}: ${errorMessage(result.reason)}`,
    );
    return result.item;
  });
};

/**
 * Files of a project built from its `latestFilesIndexes`, falling back to the
 * full file listing when the index is empty. Indexed survivors of the filters
 * are backfilled with their file detail (hashes, dependencies).
 */
export const fetchProjectFiles = async (
  modId: number,
  {
    gameVersion,
    modLoaderTypes = [],
    detailConcurrency = CONCURRENCY_LIMITS.fileDetails,
    apiKey,
  }: ProjectFileFilters = {},
): Promise<CurseforgeFile[]> => {
  const options = { apiKey };
  const { data: mod } = await fetchCurseforgeMod(modId, options);
  const indexes = mod.latestFilesIndexes ?? [];

  let files: CurseforgeFile[];
  if (indexes.length > 0) {
    files = synthesizeIndexedFiles(modId, indexes);
  } else {
    const listing = await fetchCurseforgeFiles(modId, options);
    files = (listing.data ?? []).map((dto) => detailedFileFromDto(modId, dto));
  }

  const filtered = files.filter((file) => {
    if (gameVersion && !file.gameVersions.includes(gameVersion)) {
      return false;
    }
    return modLoaderTypes.length === 0 || file.modLoaders.some((id) => modLoaderTypes.includes(id));
  });

  const indexed = filtered.filter((file): file is CurseforgeIndexedFile => file.kind === "indexed");
  if (indexed.length === 0) {
    return filtered;
  }
  const enriched = new Map(
    (await enrichIndexedFiles(indexed, detailConcurrency, options)).map((file) => [file.id, file]),
  );
  return filtered.map((file) => enriched.get(file.id) ?? file);
};

const dedupeById = (files: CurseforgeFile[]) => {
  const seen = new Set<number>();
  return files.filter((file) => {
    if (seen.has(file.id)) {
      return false;
    }
    seen.add(file.id);
    return true;
  });
};

export interface ProjectVersionOptions extends CurseforgeRequestOptions {
  detailConcurrency?: number;
}

export const fetchProjectVersionsFiltered = async (
  projectId: string,
  query: VersionQuery,
  { detailConcurrency = CONCURRENCY_LIMITS.fileDetails, apiKey }: ProjectVersionOptions = {},
): Promise<ContentVersion[]> => {
  const modId = requireCurseforgeId(projectId);
  const { skipLoaderMatch } = loaderPolicy(query.resourceType, "curseforge");
  const modLoaderTypes = skipLoaderMatch
    ? []
    : query.loaders.flatMap((loader) => {
        const id = loaderIdFor(loader);
        return id === undefined ? [] : [id];
      });

  const selected = query.gameVersions;
  let files: CurseforgeFile[] = [];
  if (selected.length > 0 && selected.length <= PER_VERSION_LISTING_MAX) {
    for (const gameVersion of selected) {
      files.push(
        ...(await fetchProjectFiles(modId, {
          gameVersion,
          modLoaderTypes,
          detailConcurrency,
          apiKey,
        })),
      );
    }
  } else {
    files = await fetchProjectFiles(modId, { modLoaderTypes, detailConcurrency, apiKey });
  }

  return dedupeById(files)
    .filter((file) => selected.length === 0 || intersects(selected, file.gameVersions))
    .flatMap((file) => {
      const version = convertFile(file);
      return version ? [version] : [];
    });
};

export const fetchCurseforgeVersion = async (
  versionId: string,
  projectId: string,
  options?: CurseforgeRequestOptions,
): Promise<ContentVersion> => {
  const modId = requireCurseforgeId(projectId);
  const fileId = requireCurseforgeId(versionId);
  const { data } = await fetchCurseforgeFile(modId, fileId, options);
  const version = convertFile(detailedFileFromDto(modId, data));
  if (!version) {
    throw new ResourceError(`Archivo de CurseForge no convertible: ${versionId}`);
  }
  return version;
};

export const fetchCurseforgeCategoryList = async (options?: CurseforgeRequestOptions) => {
  const response = await fetchCurseforgeCategories(options);
  return (response.data ?? []).map((category) => ({
    id: category.id,
    name: category.name,
    slug: category.slug,
  }));
};

export const fetchCurseforgeGameVersionList = async (options?: CurseforgeRequestOptions) => {
  const response = await fetchCurseforgeMinecraftVersions(options);
  return (response.data ?? []).map((entry) => entry.versionString);
};
