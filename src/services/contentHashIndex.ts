import { readdir, unlink } from "node:fs/promises";
import path from "node:path";

import { errorMessage, getErrorCode } from "../core/errors";
import { sha1OfFile } from "../utils/sha1";
import { createLogger } from "./logService";

const logger = createLogger("index");

// `.disable` marks a mod the launcher keeps on disk but does not load.
const INDEXED_EXTENSIONS = new Set([".jar", ".zip", ".disable"]);

interface DirectoryEntry {
  /** Absolute file path -> lowercase sha1. */
  files: Map<string, string>;
  builtAt: number;
}

export interface ContentHashIndexOptions {
  /** Sets older than this are rebuilt on their next use. */
  ttlMs?: number;
  now?: () => number;
}

const normalizeHash = (sha1: string) => sha1.trim().toLowerCase();

const scanDirectory = async (directory: string) => {
  const files = new Map<string, string>();
  let names: string[];
  try {
    const entries = await readdir(directory, { withFileTypes: true });
    names = entries
      .filter((entry) => entry.isFile() && INDEXED_EXTENSIONS.has(path.extname(entry.name).toLowerCase()))
      .map((entry) => entry.name);
  } catch (error) {
    if (getErrorCode(error) === "ENOENT") {
      return files;
    }
    throw error;
  }
  for (const name of names) {
    const filePath = path.join(directory, name);
    try {
      files.set(filePath, await sha1OfFile(filePath));
    } catch (error) {
      logger.warn(`No se pudo calcular el hash de ${name}: ${errorMessage(error)}`);
    }
  }
  logger.debug(`Índice de ${directory}: ${files.size} archivos`);
  return files;
};

/**
 * Per-directory map of installed files to their content hash. A map is built
 * lazily on first use and kept up to date by the install and delete paths;
 * external changes to the directory are only seen after `invalidate` or the
 * TTL. Recording a file that the scan already saw replaces its entry.
 * Operations on one directory run one at a time, in call order.
 */
export class ContentHashIndex {
  private readonly entries = new Map<string, DirectoryEntry>();
  private readonly locks = new Map<string, Promise<void>>();
  private readonly ttlMs?: number;
  private readonly now: () => number;

  constructor({ ttlMs, now = Date.now }: ContentHashIndexOptions = {}) {
    this.ttlMs = ttlMs;
    this.now = now;
  }

  async contains(directory: string, sha1: string) {
    const key = path.resolve(directory);
    const hash = normalizeHash(sha1);
    return this.withLock(key, async () => {
      for (const value of (await this.load(key)).values()) {
        if (value === hash) {
          return true;
        }
      }
      return false;
    });
  }

  async hashes(directory: string) {
    const key = path.resolve(directory);
    return this.withLock(key, async () => new Set((await this.load(key)).values()));
  }

  async add(directory: string, filePath: string, sha1: string) {
    const key = path.resolve(directory);
    await this.withLock(key, async () => {
      (await this.load(key)).set(path.resolve(filePath), normalizeHash(sha1));
    });
  }

  async remove(directory: string, filePath: string) {
    const key = path.resolve(directory);
    await this.withLock(key, async () => {
      (await this.load(key)).delete(path.resolve(filePath));
    });
  }

  async recordInstalled(directory: string, filePath: string) {
    const hash = await sha1OfFile(filePath);
    await this.add(directory, filePath, hash);
    return hash;
  }

  async deleteFile(directory: string, filePath: string) {
    const hash = await sha1OfFile(filePath);
    await unlink(filePath);
    await this.remove(directory, filePath);
    return hash;
  }

  invalidate(directory: string) {
    this.entries.delete(path.resolve(directory));
  }

  private async load(key: string) {
    const entry = this.entries.get(key);
    const expired =
      entry !== undefined && this.ttlMs !== undefined && this.now() - entry.builtAt > this.ttlMs;
    if (entry && !expired) {
      return entry.files;
    }
    const files = await scanDirectory(key);
    this.entries.set(key, { files, builtAt: this.now() });
    return files;
  }

  private async withLock<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    const settled = run.then(
      () => undefined,
      () => undefined,
    );
    this.locks.set(key, settled);
    try {
      return await run;
    } finally {
      if (this.locks.get(key) === settled) {
        this.locks.delete(key);
      }
    }
  }
}
