import { API_CONFIG } from "../../config/api";
import type {
  CurseforgeFileDto,
  CurseforgeFileIndexDto,
  CurseforgeModDto,
} from "../../services/apiClients/curseforge";
import { isReleaseGameVersion, sortGameVersionsDesc } from "../../utils/versionHelpers";
import { curseforgeId } from "./projectRef";
import type {
  ContentProject,
  ContentVersion,
  DependencyType,
  ProjectType,
  VersionDependency,
} from "./types";

export type CurseforgeLoaderName = "forge" | "fabric" | "quilt" | "neoforge";

export const CURSEFORGE_LOADER_IDS: Record<CurseforgeLoaderName, number> = {
  forge: 1,
  fabric: 4,
  quilt: 5,
  neoforge: 6,
};

export const CURSEFORGE_CLASS_IDS: Record<ProjectType, number> = {
  mod: 6,
  resourcepack: 12,
  shader: 6552,
  datapack: 6945,
  modpack: 4471,
};

const LOADER_NAMES_BY_ID = new Map<number, CurseforgeLoaderName>([
  [1, "forge"],
  [4, "fabric"],
  [5, "quilt"],
  [6, "neoforge"],
]);

const PROJECT_TYPES_BY_CLASS = new Map<number, ProjectType>([
  [6, "mod"],
  [12, "resourcepack"],
  [6552, "shader"],
  [6945, "datapack"],
  [4471, "modpack"],
]);

const SHA1_ALGO = 1;

const isLoaderName = (value: string): value is CurseforgeLoaderName =>
  value in CURSEFORGE_LOADER_IDS;

export const loaderIdFor = (loader: string): number | undefined => {
  const normalized = loader.trim().toLowerCase();
  return isLoaderName(normalized) ? CURSEFORGE_LOADER_IDS[normalized] : undefined;
};

export const loaderNameFor = (loaderId: number) => LOADER_NAMES_BY_ID.get(loaderId);

export const projectTypeForClass = (classId?: number): ProjectType =>
  (classId === undefined ? undefined : PROJECT_TYPES_BY_CLASS.get(classId)) ?? "mod";

export const dependencyTypeFor = (relationType: number): DependencyType => {
  switch (relationType) {
    case 3:
      return "required";
    case 5:
      return "incompatible";
    case 1:
      return "embedded";
    default:
      return "optional";
  }
};

export const fallbackDownloadUrl = (fileId: number, fileName: string) =>
  `${API_CONFIG.curseforgeDownloadBase}/${Math.floor(fileId / 1000)}/${fileId % 1000}/${encodeURIComponent(fileName)}`;

interface CurseforgeFileBase {
  id: number;
  projectId: number;
  displayName: string;
  fileName: string;
  downloadUrl: string;
  releaseType: number;
  gameVersions: string[];
  /** CurseForge loader ids, as reported by `latestFilesIndexes`. */
  modLoaders: number[];
}

/** Lightweight record synthesized from the project's file index. */
export interface CurseforgeIndexedFile extends CurseforgeFileBase {
  kind: "indexed";
}

export interface CurseforgeDetailedFile extends CurseforgeFileBase {
  kind: "detailed";
  fileDate?: string;
  fileLength?: number;
  sha1?: string;
  dependencies: Array<{ modId: number; relationType: number }>;
}

export type CurseforgeFile = CurseforgeIndexedFile | CurseforgeDetailedFile;

/**
 * Groups index entries by file id. The first entry of a group names the file;
 * every entry contributes its game version and loader.
 */
export const synthesizeIndexedFiles = (
  projectId: number,
  indexes: CurseforgeFileIndexDto[],
): CurseforgeIndexedFile[] => {
  const grouped = new Map<number, CurseforgeIndexedFile>();
  for (const entry of indexes) {
    const existing = grouped.get(entry.fileId);
    if (existing) {
      if (!existing.gameVersions.includes(entry.gameVersion)) {
        existing.gameVersions.push(entry.gameVersion);
      }
      if (typeof entry.modLoader === "number" && !existing.modLoaders.includes(entry.modLoader)) {
        existing.modLoaders.push(entry.modLoader);
      }
      continue;
    }
    grouped.set(entry.fileId, {
      kind: "indexed",
      id: entry.fileId,
      projectId,
      displayName: entry.filename,
      fileName: entry.filename,
      downloadUrl: fallbackDownloadUrl(entry.fileId, entry.filename),
      releaseType: entry.releaseType,
      gameVersions: [entry.gameVersion],
      modLoaders: typeof entry.modLoader === "number" ? [entry.modLoader] : [],
    });
  }
  return Array.from(grouped.values());
};

const sha1Of = (dto: CurseforgeFileDto) =>
  dto.hashes?.find((hash) => hash.algo === SHA1_ALGO)?.value.toLowerCase();

const loaderIdsFromGameVersions = (gameVersions: string[]) =>
  gameVersions.flatMap((value) => {
    const id = loaderIdFor(value);
    return id === undefined ? [] : [id];
  });

/** Full file listing entries carry loader names mixed into `gameVersions`. */
export const detailedFileFromDto = (projectId: number, dto: CurseforgeFileDto): CurseforgeDetailedFile => {
  const rawVersions = dto.gameVersions ?? [];
  return {
    kind: "detailed",
    id: dto.id,
    projectId,
    displayName: dto.displayName || dto.fileName,
    fileName: dto.fileName,
    downloadUrl: dto.downloadUrl || fallbackDownloadUrl(dto.id, dto.fileName),
    releaseType: dto.releaseType ?? 1,
    gameVersions: rawVersions.filter(isReleaseGameVersion),
    modLoaders: loaderIdsFromGameVersions(rawVersions),
    fileDate: dto.fileDate,
    fileLength: dto.fileLength,
    sha1: sha1Of(dto),
    dependencies: dto.dependencies ?? [],
  };
};

/** The index's game versions and loaders are kept; the detail fills the rest. */
export const mergeFileDetail = (
  indexed: CurseforgeIndexedFile,
  detail: CurseforgeFileDto,
): CurseforgeDetailedFile => ({
  ...indexed,
  kind: "detailed",
  gameVersions: [...indexed.gameVersions],
  modLoaders: [...indexed.modLoaders],
  downloadUrl: detail.downloadUrl || indexed.downloadUrl,
  fileDate: detail.fileDate,
  fileLength: detail.fileLength,
  sha1: sha1Of(detail),
  dependencies: detail.dependencies ?? [],
});

const versionTypeFor = (releaseType: number): ContentVersion["versionType"] => {
  if (releaseType === 2) {
    return "beta";
  }
  return releaseType === 3 ? "alpha" : "release";
};

const convertDependencies = (file: CurseforgeFile): VersionDependency[] =>
  file.kind === "detailed"
    ? file.dependencies.map((dependency) => ({
        projectId: curseforgeId(dependency.modId),
        dependencyType: dependencyTypeFor(dependency.relationType),
      }))
    : [];

export const convertFile = (file: CurseforgeFile): ContentVersion | null => {
  if (!file.fileName || !Number.isInteger(file.id)) {
    return null;
  }
  const loaders = file.modLoaders.flatMap((id) => {
    const name = loaderNameFor(id);
    return name ? [name] : [];
  });
  return {
    id: curseforgeId(file.id),
    projectId: curseforgeId(file.projectId),
    name: file.displayName,
    versionNumber: file.displayName,
    gameVersions: [...file.gameVersions],
    loaders,
    files: [
      {
        filename: file.fileName,
        url: file.downloadUrl,
        size: file.kind === "detailed" ? file.fileLength : undefined,
        hashes: file.kind === "detailed" && file.sha1 ? { sha1: file.sha1 } : {},
        primary: true,
      },
    ],
    dependencies: convertDependencies(file),
    versionType: versionTypeFor(file.releaseType),
    datePublished: file.kind === "detailed" && file.fileDate ? file.fileDate : undefined,
  };
};

export const htmlToPlainText = (html: string, maxLength = 200) => {
  const text = html
    .replace(/<[^>]+>/g, " ")
    .replace(/\s+/g, " ")
    .trim();
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
};

export const convertProject = (mod: CurseforgeModDto, description = ""): ContentProject => {
  const projectType = projectTypeForClass(mod.classId);
  const indexes = mod.latestFilesIndexes ?? [];
  const gameVersions = sortGameVersionsDesc(
    Array.from(new Set(indexes.map((entry) => entry.gameVersion))),
  );
  let loaders: string[] = Array.from(
    new Set(
      indexes.flatMap((entry) => {
        const name = typeof entry.modLoader === "number" ? loaderNameFor(entry.modLoader) : undefined;
        return name ? [name] : [];
      }),
    ),
  );
  if (loaders.length === 0 && projectType === "resourcepack") {
    loaders = ["minecraft"];
  } else if (loaders.length === 0 && projectType === "datapack") {
    loaders = ["datapack"];
  }
  const plainDescription = description ? htmlToPlainText(description) : "";
  return {
    id: curseforgeId(mod.id),
    slug: mod.slug ?? `curseforge-${mod.id}`,
    title: mod.name,
    description: plainDescription || (mod.summary ?? ""),
    projectType,
    gameVersions,
    loaders,
    authors: (mod.authors ?? []).map((author) => author.name),
    categories: (mod.categories ?? []).map((category) => category.slug),
    downloads: mod.downloadCount ?? 0,
    iconUrl: mod.logo?.url ?? mod.logo?.thumbnailUrl,
  };
};
