import {
  fetchModrinthProjectDetails,
  fetchModrinthVersionDetails,
  fetchModrinthVersionsFiltered,
  searchModrinth,
} from "../../../services/modrinthService";
import type { ContentSourceProvider } from "../types";
import { requiredProjectsOf } from "./requiredProjects";

export const modrinthProvider: ContentSourceProvider = {
  source: "modrinth",
  search: (filters) => searchModrinth(filters),
  getProjectDetail: (projectId) => fetchModrinthProjectDetails(projectId),
  listVersions: (projectId, query) => fetchModrinthVersionsFiltered(projectId, query),
  getVersion: (versionId) => fetchModrinthVersionDetails(versionId),
  async getDependencies(projectId, query) {
    const [version] = await fetchModrinthVersionsFiltered(projectId, query);
    return requiredProjectsOf(version, fetchModrinthProjectDetails);
  },
};
