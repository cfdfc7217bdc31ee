import { CONCURRENCY_LIMITS } from "../../../config/limits";
import { errorMessage } from "../../errors";
import { createLogger } from "../../../services/logService";
import { runBounded } from "../../../utils/runBounded";
import type { ContentProject, ContentVersion } from "../types";

const logger = createLogger("registry");

/** Projects a version lists as required; lookups that fail are left out. */
export const requiredProjectsOf = async (
  version: ContentVersion | undefined,
  fetchProject: (projectId: string) => Promise<ContentProject>,
  limit: number = CONCURRENCY_LIMITS.dependencyVersions,
): Promise<ContentProject[]> => {
  if (!version) {
    return [];
  }
  const projectIds = Array.from(
    new Set(
      version.dependencies.flatMap((dependency) =>
        dependency.dependencyType === "required" && dependency.projectId
          ? [dependency.projectId]
          : [],
      ),
    ),
  );
  const results = await runBounded(projectIds, limit, fetchProject);
  return results.flatMap((result) => {
    if (result.status === "fulfilled") {
      return [result.value];
    }
    logger.warn(`Dependencia ${result.item} no disponible: ${errorMessage(result.reason)}`);
    return [];
  });
};
