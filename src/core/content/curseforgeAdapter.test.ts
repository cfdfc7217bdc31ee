import { describe, expect, it } from "vitest";

import { API_CONFIG } from "../../config/api";
import {
  convertFile,
  convertProject,
  dependencyTypeFor,
  fallbackDownloadUrl,
  mergeFileDetail,
  projectTypeForClass,
  synthesizeIndexedFiles,
} from "./curseforgeAdapter";

describe("curseforgeAdapter", () => {
  it("agrupa entradas del índice con el mismo fileId en una sola versión", () => {
    const files = synthesizeIndexedFiles(12345, [
      { fileId: 42, filename: "mod-1.0.jar", gameVersion: "1.20", releaseType: 1, modLoader: 4 },
      { fileId: 42, filename: "mod-1.0.jar", gameVersion: "1.20.1", releaseType: 1, modLoader: 4 },
    ]);

    expect(files).toHaveLength(1);
    const version = convertFile(files[0]);
    expect(version?.id).toBe("cf-42");
    expect(version?.projectId).toBe("cf-12345");
    expect(version?.gameVersions).toEqual(["1.20", "1.20.1"]);
    expect(version?.loaders).toEqual(["fabric"]);
    expect(version?.files[0]?.url).toBe(`${API_CONFIG.curseforgeDownloadBase}/0/42/mod-1.0.jar`);
    expect(version?.files[0]?.hashes).toEqual({});
  });

  it("construye la URL de respaldo a partir del fileId", () => {
    expect(fallbackDownloadUrl(4567890, "my mod.jar")).toBe(
      `${API_CONFIG.curseforgeDownloadBase}/4567/890/my%20mod.jar`,
    );
  });

  it("completa el registro con el detalle sin perder versiones del índice", () => {
    const [indexed] = synthesizeIndexedFiles(7, [
      { fileId: 1001, filename: "a.jar", gameVersion: "1.20.1", releaseType: 2, modLoader: 6 },
    ]);
    const detailed = mergeFileDetail(indexed, {
      id: 1001,
      fileName: "a.jar",
      downloadUrl: "https://edge.example.com/a.jar",
      fileDate: "2024-05-01T10:00:00Z",
      fileLength: 2048,
      gameVersions: ["1.20.1", "1.20.2", "NeoForge"],
      hashes: [
        { algo: 2, value: "ffff" },
        { algo: 1, value: "ABCDEF" },
      ],
      dependencies: [
        { modId: 10, relationType: 3 },
        { modId: 11, relationType: 2 },
        { modId: 12, relationType: 5 },
        { modId: 13, relationType: 1 },
        { modId: 14, relationType: 4 },
      ],
    });

    expect(detailed.kind).toBe("detailed");
    expect(detailed.gameVersions).toEqual(["1.20.1"]);
    expect(convertFile(detailed)).toEqual({
      id: "cf-1001",
      projectId: "cf-7",
      name: "a.jar",
      versionNumber: "a.jar",
      gameVersions: ["1.20.1"],
      loaders: ["neoforge"],
      files: [
        {
          filename: "a.jar",
          url: "https://edge.example.com/a.jar",
          size: 2048,
          hashes: { sha1: "abcdef" },
          primary: true,
        },
      ],
      dependencies: [
        { projectId: "cf-10", dependencyType: "required" },
        { projectId: "cf-11", dependencyType: "optional" },
        { projectId: "cf-12", dependencyType: "incompatible" },
        { projectId: "cf-13", dependencyType: "embedded" },
        { projectId: "cf-14", dependencyType: "optional" },
      ],
      versionType: "beta",
      datePublished: "2024-05-01T10:00:00Z",
    });
  });

  it("traduce clases y tipos de relación", () => {
    expect(projectTypeForClass(6552)).toBe("shader");
    expect(projectTypeForClass(6945)).toBe("datapack");
    expect(projectTypeForClass(999)).toBe("mod");
    expect(dependencyTypeFor(3)).toBe("required");
  });

  it("convierte un proyecto y deduce el loader según el tipo", () => {
    const project = convertProject(
      {
        id: 55,
        name: "Texturas",
        summary: "Resumen",
        classId: 12,
        downloadCount: 10,
        latestFilesIndexes: [
          { fileId: 1, filename: "a.zip", gameVersion: "1.19.4", releaseType: 1 },
          { fileId: 2, filename: "b.zip", gameVersion: "1.20.1", releaseType: 1 },
        ],
      },
      "<p>Texto <b>largo</b></p>",
    );

    expect(project).toMatchObject({
      id: "cf-55",
      slug: "curseforge-55",
      projectType: "resourcepack",
      description: "Texto largo",
      gameVersions: ["1.20.1", "1.19.4"],
      loaders: ["minecraft"],
      downloads: 10,
    });
  });
});
