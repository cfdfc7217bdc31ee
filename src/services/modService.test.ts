import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ContentProviderRegistry } from "../core/content/registry";
import type { ContentVersion } from "../core/content/types";
import { DownloadError, ResourceError } from "../core/errors";
import { buildProject, buildVersion, fakeProvider } from "../test/fakeProviders";
import { mockFetch, text } from "../test/mockFetch";
import type { GameInfo } from "../types/models";
import { sha1OfBuffer } from "../utils/sha1";
import { ContentHashIndex } from "./contentHashIndex";
import { installResource, searchMods } from "./modService";

const cdn = "https://cdn.example.com";

const jarVersion = (projectId: string, dependencies: ContentVersion["dependencies"] = []) =>
  buildVersion(`${projectId}-v1`, projectId, {
    dependencies,
    files: [
      {
        filename: `${projectId}.jar`,
        url: `${cdn}/${projectId}.jar`,
        hashes: { sha1: sha1OfBuffer(Buffer.from(`${projectId}-bytes`)) },
        primary: true,
      },
    ],
  });

const registry = new ContentProviderRegistry({
  providers: [
    fakeProvider("modrinth", {
      search: async () => ({ hits: [buildProject("sodium")], offset: 0, limit: 20, totalHits: 1 }),
      listVersions: async (projectId) => {
        if (projectId === "vacio") {
          return [];
        }
        return [
          jarVersion(
            projectId,
            projectId === "sodium"
              ? [
                  { projectId: "fabric-api", dependencyType: "required" },
                  { projectId: "roto", dependencyType: "required" },
                ]
              : [],
          ),
        ];
      },
    }),
  ],
});

describe("modService", () => {
  let profileRoot: string;
  let gameInfo: GameInfo;

  beforeEach(async () => {
    profileRoot = await mkdtemp(path.join(tmpdir(), "install-"));
    gameInfo = { profileRoot, gameVersion: "1.20.1", loader: "fabric" };
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "info").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await rm(profileRoot, { recursive: true, force: true });
  });

  it("instala el recurso con sus dependencias y registra los hashes", async () => {
    mockFetch({
      [`${cdn}/sodium.jar`]: text("sodium-bytes"),
      [`${cdn}/fabric-api.jar`]: text("fabric-api-bytes"),
    });
    const hashIndex = new ContentHashIndex();
    const mods = path.join(profileRoot, "mods");

    const result = await installResource("sodium", gameInfo, { registry, hashIndex, retries: 0 });

    expect(result.version.id).toBe("sodium-v1");
    expect(result.missingDependencies.map((entry) => entry.project.id)).toEqual(["fabric-api", "roto"]);
    expect(result.installed).toEqual([path.join(mods, "sodium.jar"), path.join(mods, "fabric-api.jar")]);
    expect(result.failed.map((failure) => failure.projectId)).toEqual(["roto"]);
    expect(result.failed[0]?.error).toBeInstanceOf(DownloadError);
    expect(await readFile(path.join(mods, "fabric-api.jar"), "utf8")).toBe("fabric-api-bytes");
    expect(await hashIndex.contains(mods, sha1OfBuffer(Buffer.from("sodium-bytes")))).toBe(true);
  });

  it("falla si no se puede descargar el recurso principal", async () => {
    mockFetch({ [`${cdn}/fabric-api.jar`]: text("fabric-api-bytes") });

    await expect(
      installResource("sodium", gameInfo, {
        registry,
        hashIndex: new ContentHashIndex(),
        retries: 0,
      }),
    ).rejects.toBeInstanceOf(DownloadError);
  });

  it("falla si no hay versión compatible", async () => {
    await expect(
      installResource("vacio", gameInfo, { registry, hashIndex: new ContentHashIndex() }),
    ).rejects.toBeInstanceOf(ResourceError);
  });

  it("instala paquetes de recursos .jar en mods", async () => {
    mockFetch({ [`${cdn}/texturas.jar`]: text("texturas-bytes") });

    const result = await installResource(
      "texturas",
      { ...gameInfo, resourceType: "resourcepack" },
      { registry, hashIndex: new ContentHashIndex(), retries: 0 },
    );

    expect(result.installed).toEqual([path.join(profileRoot, "mods", "texturas.jar")]);
  });

  it("busca en la fuente indicada", async () => {
    const hits = await searchMods({ query: "sodium", source: "modrinth" }, registry);

    expect(hits.map((hit) => hit.id)).toEqual(["sodium"]);
  });
});
