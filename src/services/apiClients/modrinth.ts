import { apiFetch } from "./client";
import { API_CONFIG } from "../../config/api";

export interface ModrinthSearchParams {
  query: string;
  facets?: string[][];
  limit?: number;
  offset?: number;
}

export interface ModrinthSearchHitDto {
  project_id?: string;
  slug?: string;
  title?: string;
  description?: string;
  project_type?: string;
  author?: string;
  categories?: string[];
  versions?: string[];
  downloads?: number;
  icon_url?: string | null;
}

export interface ModrinthSearchResponse {
  hits?: ModrinthSearchHitDto[];
  offset?: number;
  limit?: number;
  total_hits?: number;
}

export interface ModrinthProjectDto {
  id?: string;
  slug?: string;
  title?: string;
  description?: string;
  project_type?: string;
  team?: string;
  categories?: string[];
  game_versions?: string[];
  loaders?: string[];
  downloads?: number;
  icon_url?: string | null;
}

export interface ModrinthFileDto {
  filename?: string;
  url?: string;
  size?: number;
  primary?: boolean;
  hashes?: { sha1?: string; sha512?: string };
}

export interface ModrinthDependencyDto {
  project_id?: string | null;
  version_id?: string | null;
  dependency_type?: string;
}

export interface ModrinthVersionDto {
  id?: string;
  project_id?: string;
  name?: string;
  version_number?: string;
  version_type?: string;
  changelog?: string | null;
  date_published?: string;
  game_versions?: string[];
  loaders?: string[];
  files?: ModrinthFileDto[];
  dependencies?: ModrinthDependencyDto[];
}

export interface ModrinthGameVersionTagDto {
  version?: string;
  version_type?: string;
}

export interface ModrinthNamedTagDto {
  name?: string;
  project_type?: string;
  supported_project_types?: string[];
}

const base = () => API_CONFIG.modrinthBase;

const buildModrinthSearchUrl = ({ query, facets, limit, offset }: ModrinthSearchParams) => {
  const params = new URLSearchParams({ query });
  if (facets && facets.length > 0) {
    params.set("facets", JSON.stringify(facets));
  }
  if (limit !== undefined) {
    params.set("limit", String(limit));
  }
  if (offset !== undefined) {
    params.set("offset", String(offset));
  }
  return `${base()}/search?${params.toString()}`;
};

export const searchModrinthProjects = async (params: ModrinthSearchParams) =>
  apiFetch<ModrinthSearchResponse>(buildModrinthSearchUrl(params));

export const fetchModrinthProject = async (projectId: string) =>
  apiFetch<ModrinthProjectDto>(`${base()}/project/${encodeURIComponent(projectId)}`);

export const fetchModrinthVersions = async (projectId: string) =>
  apiFetch<ModrinthVersionDto[]>(`${base()}/project/${encodeURIComponent(projectId)}/version`);

export const fetchModrinthVersion = async (versionId: string) =>
  apiFetch<ModrinthVersionDto>(`${base()}/version/${encodeURIComponent(versionId)}`);

export const fetchModrinthVersionByHash = async (sha1: string) =>
  apiFetch<ModrinthVersionDto>(`${base()}/version_file/${sha1}?algorithm=sha1`);

export const fetchModrinthGameVersionTags = async () =>
  apiFetch<ModrinthGameVersionTagDto[]>(`${base()}/tag/game_version`, { ttl: 3_600_000 });

export const fetchModrinthCategoryTags = async () =>
  apiFetch<ModrinthNamedTagDto[]>(`${base()}/tag/category`, { ttl: 3_600_000 });

export const fetchModrinthLoaderTags = async () =>
  apiFetch<ModrinthNamedTagDto[]>(`${base()}/tag/loader`, { ttl: 3_600_000 });
