import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { sha1OfBuffer } from "../utils/sha1";
import { ContentHashIndex } from "./contentHashIndex";

const alpha = Buffer.from("alpha");
const beta = Buffer.from("beta");
const gamma = Buffer.from("gamma");

describe("ContentHashIndex", () => {
  let directory: string;

  beforeEach(async () => {
    directory = path.join(await mkdtemp(path.join(tmpdir(), "hash-index-")), "mods");
    await mkdir(directory);
  });

  afterEach(async () => {
    await rm(path.dirname(directory), { recursive: true, force: true });
  });

  it("indexa archivos .jar, .zip y .disable", async () => {
    await writeFile(path.join(directory, "a.jar"), alpha);
    await writeFile(path.join(directory, "b.txt"), beta);
    await writeFile(path.join(directory, "c.jar.disable"), gamma);
    const index = new ContentHashIndex();

    expect(await index.hashes(directory)).toEqual(new Set([sha1OfBuffer(alpha), sha1OfBuffer(gamma)]));
    expect(await index.contains(directory, sha1OfBuffer(alpha).toUpperCase())).toBe(true);
    expect(await index.contains(directory, sha1OfBuffer(gamma))).toBe(true);
    expect(await index.contains(directory, sha1OfBuffer(beta))).toBe(false);
  });

  it("trata un directorio inexistente como vacío", async () => {
    const index = new ContentHashIndex();

    expect(await index.hashes(path.join(directory, "no-existe"))).toEqual(new Set());
  });

  it("mantiene el hash mientras quede alguna copia", async () => {
    const index = new ContentHashIndex();
    const hash = sha1OfBuffer(alpha);
    const first = path.join(directory, "a.jar");
    const copy = path.join(directory, "a-copia.jar");

    await index.add(directory, first, hash);
    await index.add(directory, copy, hash);
    await index.remove(directory, first);
    expect(await index.contains(directory, hash)).toBe(true);

    await index.remove(directory, copy);
    expect(await index.contains(directory, hash)).toBe(false);
  });

  it("registra instalaciones y borrados de archivos", async () => {
    const index = new ContentHashIndex();
    expect(await index.hashes(directory)).toEqual(new Set());

    const filePath = path.join(directory, "a.jar");
    await writeFile(filePath, alpha);
    expect(await index.recordInstalled(directory, filePath)).toBe(sha1OfBuffer(alpha));
    expect(await index.contains(directory, sha1OfBuffer(alpha))).toBe(true);

    await index.deleteFile(directory, filePath);
    expect(await index.contains(directory, sha1OfBuffer(alpha))).toBe(false);
  });

  it("no duplica un archivo registrado antes de construir el índice", async () => {
    const index = new ContentHashIndex();
    const filePath = path.join(directory, "a.jar");
    await writeFile(filePath, alpha);

    await index.recordInstalled(directory, filePath);
    await index.deleteFile(directory, filePath);

    expect(await index.contains(directory, sha1OfBuffer(alpha))).toBe(false);
  });

  it("no duplica un archivo reinstalado sobre sí mismo", async () => {
    const filePath = path.join(directory, "a.jar");
    await writeFile(filePath, alpha);
    const index = new ContentHashIndex();
    expect(await index.contains(directory, sha1OfBuffer(alpha))).toBe(true);

    await index.recordInstalled(directory, filePath);
    await index.recordInstalled(directory, filePath);
    await index.deleteFile(directory, filePath);

    expect(await index.contains(directory, sha1OfBuffer(alpha))).toBe(false);
  });

  it("no ve cambios externos hasta invalidar o caducar", async () => {
    let now = 1_000;
    const index = new ContentHashIndex({ ttlMs: 500, now: () => now });
    expect(await index.hashes(directory)).toEqual(new Set());

    await writeFile(path.join(directory, "b.zip"), beta);
    expect(await index.contains(directory, sha1OfBuffer(beta))).toBe(false);

    index.invalidate(directory);
    expect(await index.contains(directory, sha1OfBuffer(beta))).toBe(true);

    await writeFile(path.join(directory, "a.jar"), alpha);
    now += 501;
    expect(await index.contains(directory, sha1OfBuffer(alpha))).toBe(true);
  });

  it("serializa operaciones concurrentes sobre el mismo directorio", async () => {
    const index = new ContentHashIndex();
    const hash = sha1OfBuffer(alpha);
    const first = path.join(directory, "a.jar");
    const second = path.join(directory, "b.jar");

    await Promise.all([
      index.add(directory, first, hash),
      index.add(directory, second, hash),
      index.remove(directory, first),
    ]);

    expect(await index.contains(directory, hash)).toBe(true);
    await index.remove(directory, second);
    expect(await index.contains(directory, hash)).toBe(false);
  });
});
