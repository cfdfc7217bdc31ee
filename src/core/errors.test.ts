import { describe, expect, it } from "vitest";

import { describeError, presentationFor } from "./errorPresentation";
import {
  DownloadError,
  IntegrityError,
  NetworkError,
  ResourceError,
  ValidationError,
  toAppError,
} from "./errors";

describe("toAppError", () => {
  it("conserva los errores propios", () => {
    const error = new ValidationError("id inválido");
    expect(toAppError(error)).toBe(error);
  });

  it("convierte fallos de transporte en NetworkError", () => {
    const refused = Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:1"), { code: "ECONNREFUSED" });
    expect(toAppError(refused)).toBeInstanceOf(NetworkError);
    expect(toAppError(new TypeError("fetch failed"))).toBeInstanceOf(NetworkError);
    expect(toAppError(new TypeError("fetch failed", { cause: refused })).message).toBe(
      "Error de red: fetch failed",
    );
  });

  it("envuelve el resto como ResourceError", () => {
    const wrapped = toAppError(new Error("disco lleno"));
    expect(wrapped).toBeInstanceOf(ResourceError);
    expect(wrapped.message).toBe("Error inesperado: disco lleno");
    expect(toAppError("texto").message).toBe("Error inesperado");
  });
});

describe("presentación de errores", () => {
  it("asigna una presentación por tipo", () => {
    expect(presentationFor("integrity")).toBe("popup");
    expect(presentationFor("network")).toBe("notification");
  });

  it("describe cualquier error", () => {
    expect(describeError(new IntegrityError("hash inválido", "aa", "bb"))).toEqual({
      kind: "integrity",
      presentation: "popup",
      message: "hash inválido",
    });
    expect(describeError(new DownloadError("HTTP 404", "https://cdn.example.com/a.jar", 404))).toEqual({
      kind: "download",
      presentation: "notification",
      message: "HTTP 404",
    });
  });

  it("nombra las subclases", () => {
    expect(new NetworkError("x").name).toBe("NetworkError");
  });
});
