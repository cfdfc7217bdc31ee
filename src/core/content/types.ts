export type ModSource = "curseforge" | "modrinth";

export type ProjectType = "mod" | "datapack" | "shader" | "resourcepack" | "modpack";

export type ResourceType = Exclude<ProjectType, "modpack">;

export type DependencyType = "required" | "optional" | "incompatible" | "embedded";

export type ProjectRef =
  | { source: "modrinth"; id: string }
  | { source: "curseforge"; id: number };

export interface ContentProject {
  id: string;
  slug: string;
  title: string;
  description: string;
  projectType: ProjectType;
  gameVersions: string[];
  loaders: string[];
  authors: string[];
  categories: string[];
  downloads: number;
  iconUrl?: string;
}

export interface FileHashes {
  sha1?: string;
  sha512?: string;
}

export interface ContentFile {
  filename: string;
  url: string;
  size?: number;
  hashes: FileHashes;
  primary: boolean;
}

export interface VersionDependency {
  projectId?: string;
  versionId?: string;
  dependencyType: DependencyType;
}

export interface ContentVersion {
  id: string;
  projectId: string;
  name: string;
  versionNumber: string;
  gameVersions: string[];
  loaders: string[];
  files: ContentFile[];
  dependencies: VersionDependency[];
  versionType: "release" | "beta" | "alpha";
  changelog?: string;
  datePublished?: string;
}

export interface VersionQuery {
  gameVersions: string[];
  loaders: string[];
  resourceType: ResourceType;
}

export interface ContentSearchFilters {
  query: string;
  projectType?: ProjectType;
  gameVersions?: string[];
  loaders?: string[];
  categories?: string[];
  limit?: number;
  offset?: number;
}

export interface ContentSearchResult {
  hits: ContentProject[];
  offset: number;
  limit: number;
  totalHits: number;
}

export interface ContentSourceProvider {
  source: ModSource;
  search(filters: ContentSearchFilters): Promise<ContentSearchResult>;
  getProjectDetail(projectId: string): Promise<ContentProject>;
  listVersions(projectId: string, query: VersionQuery): Promise<ContentVersion[]>;
  getVersion(versionId: string, projectId?: string): Promise<ContentVersion>;
  getDependencies(projectId: string, query: VersionQuery): Promise<ContentProject[]>;
}

export interface ResolvedDependency {
  project: ContentProject;
  version: ContentVersion;
}
