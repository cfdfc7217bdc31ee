import {
  fetchCurseforgeProject,
  fetchCurseforgeVersion,
  fetchProjectVersionsFiltered,
  searchCurseforge,
} from "../../../services/curseService";
import { ValidationError } from "../../errors";
import type { ContentSourceProvider } from "../types";
import { requiredProjectsOf } from "./requiredProjects";

/** Without `apiKey` every request carries `CURSEFORGE_API_KEY`, when set. */
export const createCurseforgeProvider = (apiKey?: string): ContentSourceProvider => {
  const options = { apiKey };
  const fetchProject = (projectId: string) => fetchCurseforgeProject(projectId, options);
  return {
    source: "curseforge",
    search: (filters) => searchCurseforge(filters, options),
    getProjectDetail: fetchProject,
    listVersions: (projectId, query) => fetchProjectVersionsFiltered(projectId, query, options),
    async getVersion(versionId, projectId) {
      if (!projectId) {
        throw new ValidationError(
          `La versión ${versionId} de CurseForge requiere el identificador del proyecto.`,
        );
      }
      return fetchCurseforgeVersion(versionId, projectId, options);
    },
    async getDependencies(projectId, query) {
      const [version] = await fetchProjectVersionsFiltered(projectId, query, options);
      return requiredProjectsOf(version, fetchProject);
    },
  };
};
