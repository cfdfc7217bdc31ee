import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { configureLogging, createLogger, logMessage } from "./logService";

describe("logService", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), "logs-"));
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    configureLogging({ level: "info", directory: null });
    await rm(directory, { recursive: true, force: true });
  });

  it("escribe en consola con marca de tiempo, nivel y ámbito", () => {
    configureLogging({ level: "info", directory: null });

    createLogger("registry").warn("Proveedor lento");

    expect(console.warn).toHaveBeenCalledWith(
      expect.stringMatching(/^\[\d{4}-\d{2}-\d{2}T[^\]]+Z\] \[warn\] \[registry\] Proveedor lento$/),
    );
  });

  it("filtra mensajes por debajo del nivel mínimo", () => {
    configureLogging({ level: "warn", directory: null });

    createLogger("index").info("Índice listo");

    expect(console.info).not.toHaveBeenCalled();
  });

  it("vuelca al archivo del ámbito las líneas pendientes", async () => {
    const logDirectory = path.join(directory, "nested");
    configureLogging({ level: "info", directory: logDirectory });

    await logMessage("downloads", "info", "Primera descarga");
    await logMessage("downloads", "error", "Descarga rota", { flush: true });

    const lines = (await readFile(path.join(logDirectory, "downloads.log"), "utf8")).trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/\[info\] \[downloads\] Primera descarga$/);
    expect(lines[1]).toMatch(/\[error\] \[downloads\] Descarga rota$/);
  });
});
