import type { ContentProviderRegistry } from "./registry";
import type { ContentVersion, ResourceType, VersionQuery } from "./types";

/**
 * Compatible versions of a project, in the order its registry returns them.
 * Element 0 is the one installs pick.
 */
export const resolveVersions = async (
  registry: ContentProviderRegistry,
  projectId: string,
  selectedGameVersions: string[],
  selectedLoaders: string[],
  resourceType: ResourceType,
): Promise<ContentVersion[]> => {
  const query: VersionQuery = {
    gameVersions: selectedGameVersions,
    loaders: selectedLoaders,
    resourceType,
  };
  return registry.providerFor(projectId).listVersions(projectId.trim(), query);
};

export const resolveBestVersion = async (
  registry: ContentProviderRegistry,
  projectId: string,
  query: VersionQuery,
): Promise<ContentVersion | undefined> => {
  const [best] = await resolveVersions(
    registry,
    projectId,
    query.gameVersions,
    query.loaders,
    query.resourceType,
  );
  return best;
};
