import { apiFetch } from "./client";
import { API_CONFIG } from "../../config/api";

/** Per-call request settings; `apiKey` falls back to `CURSEFORGE_API_KEY`. */
export interface CurseforgeRequestOptions {
  apiKey?: string;
}

const buildHeaders = (apiKey?: string) => {
  const key = apiKey?.trim() || API_CONFIG.curseforgeApiKey;
  return key ? { "x-api-key": key } : undefined;
};

const requestCurseforgeV1 = async <T>(
  path: string,
  { apiKey }: CurseforgeRequestOptions = {},
  query?: Record<string, string>,
  ttl?: number,
): Promise<T> => {
  const params = query ? `?${new URLSearchParams(query).toString()}` : "";
  const headers = buildHeaders(apiKey);
  return apiFetch<T>(`${API_CONFIG.curseforgeBase}${path}${params}`, {
    ttl,
    init: headers ? { headers } : undefined,
  });
};

export interface CurseforgeFileIndexDto {
  gameVersion: string;
  fileId: number;
  filename: string;
  releaseType: number;
  gameVersionTypeId?: number | null;
  modLoader?: number | null;
}

export interface CurseforgeHashDto {
  value: string;
  algo: number;
}

export interface CurseforgeFileDependencyDto {
  modId: number;
  relationType: number;
}

export interface CurseforgeFileDto {
  id: number;
  modId?: number;
  displayName?: string;
  fileName: string;
  downloadUrl?: string | null;
  fileDate?: string;
  releaseType?: number;
  fileLength?: number;
  gameVersions?: string[];
  hashes?: CurseforgeHashDto[];
  dependencies?: CurseforgeFileDependencyDto[];
}

export interface CurseforgeModDto {
  id: number;
  name: string;
  slug?: string;
  summary?: string;
  classId?: number;
  downloadCount?: number;
  authors?: Array<{ name: string }>;
  categories?: Array<{ slug: string }>;
  logo?: { url?: string; thumbnailUrl?: string } | null;
  latestFiles?: CurseforgeFileDto[];
  latestFilesIndexes?: CurseforgeFileIndexDto[];
}

export interface CurseforgePaginationDto {
  index?: number;
  pageSize?: number;
  resultCount?: number;
  totalCount?: number;
}

export interface CurseforgeCategoryDto {
  id: number;
  name: string;
  slug: string;
  classId?: number;
  isClass?: boolean;
}

export interface CurseforgeMinecraftVersionDto {
  versionString: string;
  approved?: boolean;
}

export interface CurseforgeSearchFilters {
  query?: string;
  classId?: number;
  categoryIds?: number[];
  gameVersions?: string[];
  modLoaderTypes?: number[];
  pageSize?: number;
  index?: number;
}

export const SEARCH_LIMITS = {
  categoryIds: 10,
  gameVersions: 4,
  modLoaderTypes: 5,
  pageSize: 50,
} as const;

const jsonArrayParam = (values: Array<string | number>, max: number) =>
  JSON.stringify(values.slice(0, max).map(String));

export const buildCurseforgeSearchQuery = (filters: CurseforgeSearchFilters) => {
  const query: Record<string, string> = {
    gameId: String(API_CONFIG.curseforgeGameId),
    index: String(filters.index ?? 0),
    pageSize: String(Math.min(filters.pageSize ?? 20, SEARCH_LIMITS.pageSize)),
    sortField: "6",
    sortOrder: "desc",
  };
  if (filters.classId !== undefined) {
    query.classId = String(filters.classId);
  }
  if (filters.categoryIds?.length) {
    query.categoryIds = jsonArrayParam(filters.categoryIds, SEARCH_LIMITS.categoryIds);
  }
  if (filters.gameVersions?.length) {
    // game versions travel as-is inside the JSON array
    query.gameVersions = JSON.stringify(filters.gameVersions.slice(0, SEARCH_LIMITS.gameVersions));
  }
  if (filters.modLoaderTypes?.length) {
    query.modLoaderTypes = jsonArrayParam(filters.modLoaderTypes, SEARCH_LIMITS.modLoaderTypes);
  }
  const searchFilter = filters.query?.trim().split(/\s+/).filter(Boolean).join("+");
  if (searchFilter) {
    query.searchFilter = searchFilter;
  }
  return query;
};

export const searchCurseforgeMods = async (
  filters: CurseforgeSearchFilters,
  options?: CurseforgeRequestOptions,
) =>
  requestCurseforgeV1<{ data?: CurseforgeModDto[]; pagination?: CurseforgePaginationDto }>(
    "/mods/search",
    options,
    buildCurseforgeSearchQuery(filters),
  );

export const fetchCurseforgeMod = async (modId: number, options?: CurseforgeRequestOptions) =>
  requestCurseforgeV1<{ data: CurseforgeModDto }>(`/mods/${modId}`, options);

export const fetchCurseforgeModDescription = async (
  modId: number,
  options?: CurseforgeRequestOptions,
) => requestCurseforgeV1<{ data: string }>(`/mods/${modId}/description`, options);

export const fetchCurseforgeFiles = async (modId: number, options?: CurseforgeRequestOptions) =>
  requestCurseforgeV1<{ data?: CurseforgeFileDto[] }>(`/mods/${modId}/files`, options);

export const fetchCurseforgeFile = async (
  modId: number,
  fileId: number,
  options?: CurseforgeRequestOptions,
) => requestCurseforgeV1<{ data: CurseforgeFileDto }>(`/mods/${modId}/files/${fileId}`, options);

export const fetchCurseforgeCategories = async (options?: CurseforgeRequestOptions) =>
  requestCurseforgeV1<{ data?: CurseforgeCategoryDto[] }>(
    "/categories",
    options,
    { gameId: String(API_CONFIG.curseforgeGameId) },
    3_600_000,
  );

export const fetchCurseforgeMinecraftVersions = async (options?: CurseforgeRequestOptions) =>
  requestCurseforgeV1<{ data?: CurseforgeMinecraftVersionDto[] }>(
    "/minecraft/version",
    options,
    undefined,
    3_600_000,
  );
