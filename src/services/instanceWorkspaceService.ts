import path from "node:path";

import type { ResourceType } from "../core/content/types";
import type { ResourceDirectoryResolver } from "../types/models";

export const RESOURCE_DIRECTORIES: Record<ResourceType, string> = {
  mod: "mods",
  datapack: "datapacks",
  shader: "shaderpacks",
  resourcepack: "resourcepacks",
};

const isJar = (fileName?: string) => Boolean(fileName?.toLowerCase().endsWith(".jar"));

/**
 * Directory of a profile that receives a resource. Datapacks and resource
 * packs shipped as `.jar` are loaded as mods.
 */
export const resolveResourceDirectory: ResourceDirectoryResolver = (
  profileRoot,
  resourceType,
  fileName,
) => {
  const folder =
    (resourceType === "datapack" || resourceType === "resourcepack") && isJar(fileName)
      ? RESOURCE_DIRECTORIES.mod
      : RESOURCE_DIRECTORIES[resourceType];
  return path.resolve(profileRoot, folder);
};

export const resourceDestination = (
  profileRoot: string,
  resourceType: ResourceType,
  fileName: string,
  resolveDirectory: ResourceDirectoryResolver = resolveResourceDirectory,
) => path.join(resolveDirectory(profileRoot, resourceType, fileName), path.basename(fileName));
