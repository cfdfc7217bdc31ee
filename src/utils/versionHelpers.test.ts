import { describe, expect, it } from "vitest";

import type { VersionQuery } from "../core/content/types";
import { buildVersion } from "../test/fakeProviders";
import { loaderPolicy, matchesVersionQuery, primaryFile, sortGameVersionsDesc } from "./versionHelpers";

const query = (overrides: Partial<VersionQuery> = {}): VersionQuery => ({
  gameVersions: ["1.20.1"],
  loaders: ["fabric"],
  resourceType: "mod",
  ...overrides,
});

describe("matchesVersionQuery", () => {
  it("exige versión de juego y loader para mods", () => {
    expect(matchesVersionQuery({ gameVersions: ["1.20.1"], loaders: ["fabric"] }, query())).toBe(true);
    expect(matchesVersionQuery({ gameVersions: ["1.20.1"], loaders: ["forge"] }, query())).toBe(false);
    expect(matchesVersionQuery({ gameVersions: ["1.19.4"], loaders: ["fabric"] }, query())).toBe(false);
  });

  it("acepta todo cuando no hay selección", () => {
    expect(
      matchesVersionQuery({ gameVersions: ["1.8.9"], loaders: ["forge"] }, query({ gameVersions: [], loaders: [] })),
    ).toBe(true);
  });

  it("usa el loader datapack para datapacks en Modrinth", () => {
    const datapack = query({ resourceType: "datapack" });
    expect(matchesVersionQuery({ gameVersions: ["1.20.1"], loaders: ["datapack"] }, datapack)).toBe(true);
    expect(matchesVersionQuery({ gameVersions: ["1.20.1"], loaders: ["fabric"] }, datapack)).toBe(false);
  });

  it("ignora el loader en shaders y resource packs", () => {
    expect(
      matchesVersionQuery({ gameVersions: ["1.20.1"], loaders: ["iris"] }, query({ resourceType: "shader" })),
    ).toBe(true);
    expect(
      matchesVersionQuery({ gameVersions: ["1.20.1"], loaders: [] }, query({ resourceType: "resourcepack" })),
    ).toBe(true);
  });

  it("en CurseForge tampoco filtra loader para datapacks", () => {
    expect(loaderPolicy("datapack", "curseforge")).toEqual({ skipLoaderMatch: true });
    expect(
      matchesVersionQuery({ gameVersions: ["1.20.1"], loaders: [] }, query({ resourceType: "datapack" }), "curseforge"),
    ).toBe(true);
  });
});

describe("primaryFile", () => {
  const file = (filename: string, primary: boolean) => ({
    filename,
    url: `https://cdn.example.com/${filename}`,
    hashes: {},
    primary,
  });

  it("prefiere el archivo marcado como primario", () => {
    const version = buildVersion("v1", "p1", { files: [file("a.jar", false), file("b.jar", true)] });
    expect(primaryFile(version)?.filename).toBe("b.jar");
  });

  it("usa el primero si ninguno es primario y undefined si no hay archivos", () => {
    expect(primaryFile(buildVersion("v1", "p1", { files: [file("a.jar", false)] }))?.filename).toBe("a.jar");
    expect(primaryFile(buildVersion("v2", "p1"))).toBeUndefined();
  });
});

describe("sortGameVersionsDesc", () => {
  it("ordena numéricamente", () => {
    expect(sortGameVersionsDesc(["1.9", "1.20.1", "1.20", "1.8.9"])).toEqual(["1.20.1", "1.20", "1.9", "1.8.9"]);
  });
});
