export { API_CONFIG } from "./config/api";
export { featureFlags } from "./config/featureFlags";
export { CONCURRENCY_LIMITS, DEFAULT_SERVER_PORT, SERVER_PING_TIMEOUT_MS } from "./config/limits";

export * from "./core/errors";
export { describeError, presentationFor, type ErrorPresentation } from "./core/errorPresentation";

export type * from "./core/content/types";
export { formatProjectRef, parseProjectRef, parseVersionRef, sourceOf } from "./core/content/projectRef";
export { ContentProviderRegistry, type ContentRegistryOptions } from "./core/content/registry";
export { resolveBestVersion, resolveVersions } from "./core/content/versionResolver";
export {
  fetchProjectDependencies,
  resolveMissingDependencies,
  type DependencyContext,
} from "./core/content/dependencyResolver";
export {
  convertFile,
  convertProject,
  mergeFileDetail,
  type CurseforgeDetailedFile,
  type CurseforgeIndexedFile,
} from "./core/content/curseforgeAdapter";
export * from "./core/protocol/serverListPing";

export { configureApiClient, resetApiClient } from "./services/apiClients/client";
export type { CurseforgeRequestOptions } from "./services/apiClients/curseforge";
export { ContentHashIndex, type ContentHashIndexOptions } from "./services/contentHashIndex";
export { fetchCurseforgeCategoryList, fetchCurseforgeGameVersionList } from "./services/curseService";
export { downloadFile } from "./services/downloadService";
export { fetchAll, type DownloadRequest, type FetchResult } from "./services/downloadQueue";
export { resolveResourceDirectory } from "./services/instanceWorkspaceService";
export { configureLogging, createLogger, logMessage, type LogLevel, type LogScope } from "./services/logService";
export { installResource, searchMods, type InstallOptions, type InstallResult } from "./services/modService";
export {
  fetchModrinthCategories,
  fetchModrinthGameVersions,
  fetchModrinthLoaders,
  fetchModrinthVersionForHash,
} from "./services/modrinthService";
export {
  parseAddressInput,
  resolveServerAddress,
  resolveServerAddresses,
  type ResolvedServerAddress,
} from "./services/serverAddressService";
export {
  checkServerConnection,
  pingServer,
  type PingOptions,
  type PingState,
  type ServerConnectionResult,
} from "./services/serverPingService";

export type { FeatureFlags, GameInfo, ResourceDirectoryResolver } from "./types/models";
export { encodeVarInt, decodeVarInt } from "./utils/varint";
export { fulfilledValues, runBounded, type BoundedResult } from "./utils/runBounded";
export { applyGithubProxy } from "./utils/urlProxy";
export { matchesVersionQuery, primaryFile } from "./utils/versionHelpers";
