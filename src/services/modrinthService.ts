import type {
  ContentFile,
  ContentProject,
  ContentSearchFilters,
  ContentSearchResult,
  ContentVersion,
  DependencyType,
  ProjectType,
  VersionDependency,
  VersionQuery,
} from "../core/content/types";
import { isReleaseGameVersion, matchesVersionQuery, sortGameVersionsDesc } from "../utils/versionHelpers";
import {
  fetchModrinthCategoryTags,
  fetchModrinthGameVersionTags,
  fetchModrinthLoaderTags,
  fetchModrinthProject,
  fetchModrinthVersion,
  fetchModrinthVersionByHash,
  fetchModrinthVersions,
  searchModrinthProjects,
  type ModrinthDependencyDto,
  type ModrinthFileDto,
  type ModrinthProjectDto,
  type ModrinthSearchHitDto,
  type ModrinthVersionDto,
} from "./apiClients/modrinth";

const PROJECT_TYPES: readonly ProjectType[] = ["mod", "datapack", "shader", "resourcepack", "modpack"];
const DEPENDENCY_TYPES: readonly DependencyType[] = ["required", "optional", "incompatible", "embedded"];

const toProjectType = (value?: string): ProjectType =>
  PROJECT_TYPES.find((type) => type === value) ?? "mod";

const toDependencyType = (value?: string): DependencyType =>
  DEPENDENCY_TYPES.find((type) => type === value) ?? "optional";

const toVersionType = (value?: string): ContentVersion["versionType"] =>
  value === "beta" || value === "alpha" ? value : "release";

const buildFacets = (filters: ContentSearchFilters) => {
  const facets: string[][] = [];
  if (filters.projectType) {
    facets.push([`project_type:${filters.projectType}`]);
  }
  if (filters.loaders?.length) {
    facets.push(filters.loaders.map((loader) => `categories:${loader}`));
  }
  if (filters.gameVersions?.length) {
    facets.push(filters.gameVersions.map((version) => `versions:${version}`));
  }
  if (filters.categories?.length) {
    facets.push(filters.categories.map((category) => `categories:${category}`));
  }
  return facets;
};

const mapSearchHit = (hit: ModrinthSearchHitDto): ContentProject => ({
  id: hit.project_id ?? "",
  slug: hit.slug ?? hit.project_id ?? "",
  title: hit.title ?? "",
  description: hit.description ?? "",
  projectType: toProjectType(hit.project_type),
  gameVersions: (hit.versions ?? []).filter(isReleaseGameVersion),
  loaders: [],
  authors: hit.author ? [hit.author] : [],
  categories: hit.categories ?? [],
  downloads: hit.downloads ?? 0,
  iconUrl: hit.icon_url ?? undefined,
});

export const mapModrinthProject = (project: ModrinthProjectDto): ContentProject => ({
  id: project.id ?? "",
  slug: project.slug ?? project.id ?? "",
  title: project.title ?? "",
  description: project.description ?? "",
  projectType: toProjectType(project.project_type),
  gameVersions: sortGameVersionsDesc((project.game_versions ?? []).filter(isReleaseGameVersion)),
  loaders: project.loaders ?? [],
  authors: project.team ? [project.team] : [],
  categories: project.categories ?? [],
  downloads: project.downloads ?? 0,
  iconUrl: project.icon_url ?? undefined,
});

const mapFile = (file: ModrinthFileDto): ContentFile => ({
  filename: file.filename ?? "",
  url: file.url ?? "",
  size: file.size,
  hashes: {
    sha1: file.hashes?.sha1?.toLowerCase(),
    sha512: file.hashes?.sha512?.toLowerCase(),
  },
  primary: file.primary ?? false,
});

const mapDependency = (dependency: ModrinthDependencyDto): VersionDependency => ({
  projectId: dependency.project_id ?? undefined,
  versionId: dependency.version_id ?? undefined,
  dependencyType: toDependencyType(dependency.dependency_type),
});

export const mapModrinthVersion = (version: ModrinthVersionDto): ContentVersion => ({
  id: version.id ?? "",
  projectId: version.project_id ?? "",
  name: version.name ?? version.version_number ?? "",
  versionNumber: version.version_number ?? "",
  gameVersions: version.game_versions ?? [],
  loaders: version.loaders ?? [],
  files: (version.files ?? []).map(mapFile),
  dependencies: (version.dependencies ?? []).map(mapDependency),
  versionType: toVersionType(version.version_type),
  changelog: version.changelog ?? undefined,
  datePublished: version.date_published,
});

export const searchModrinth = async (filters: ContentSearchFilters): Promise<ContentSearchResult> => {
  const limit = filters.limit ?? 20;
  const offset = filters.offset ?? 0;
  const result = await searchModrinthProjects({
    query: filters.query,
    facets: buildFacets(filters),
    limit,
    offset,
  });
  const hits = (result.hits ?? []).map(mapSearchHit);
  return {
    hits,
    offset: result.offset ?? offset,
    limit: result.limit ?? limit,
    totalHits: result.total_hits ?? hits.length,
  };
};

export const fetchModrinthProjectDetails = async (projectId: string) =>
  mapModrinthProject(await fetchModrinthProject(projectId));

export const fetchModrinthProjectVersions = async (projectId: string) =>
  (await fetchModrinthVersions(projectId)).map(mapModrinthVersion);

/** Versions of a project compatible with the query, in registry order. */
export const fetchModrinthVersionsFiltered = async (projectId: string, query: VersionQuery) =>
  (await fetchModrinthProjectVersions(projectId)).filter((version) =>
    matchesVersionQuery(version, query, "modrinth"),
  );

export const fetchModrinthVersionDetails = async (versionId: string) =>
  mapModrinthVersion(await fetchModrinthVersion(versionId));

export const fetchModrinthVersionForHash = async (sha1: string) =>
  mapModrinthVersion(await fetchModrinthVersionByHash(sha1.toLowerCase()));

export const fetchModrinthGameVersions = async ({ releasesOnly = true } = {}) => {
  const tags = await fetchModrinthGameVersionTags();
  return tags
    .filter((tag) => !releasesOnly || tag.version_type === "release")
    .flatMap((tag) => (tag.version ? [tag.version] : []));
};

export const fetchModrinthCategories = async (projectType?: ProjectType) => {
  const tags = await fetchModrinthCategoryTags();
  return tags
    .filter((tag) => !projectType || tag.project_type === projectType)
    .flatMap((tag) => (tag.name ? [tag.name] : []));
};

export const fetchModrinthLoaders = async (projectType?: ProjectType) => {
  const tags = await fetchModrinthLoaderTags();
  return tags
    .filter((tag) => !projectType || (tag.supported_project_types ?? []).includes(projectType))
    .flatMap((tag) => (tag.name ? [tag.name] : []));
};
