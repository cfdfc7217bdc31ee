import { describe, expect, it } from "vitest";

import { formatBytes, formatIsoTimestamp } from "./formatters";

describe("formatters", () => {
  it("formatea tamaños en unidades binarias", () => {
    expect(formatBytes(0)).toBe("0 B");
    expect(formatBytes(512)).toBe("512 B");
    expect(formatBytes(1536)).toBe("1.5 KB");
    expect(formatBytes(5 * 1024 * 1024)).toBe("5.0 MB");
  });

  it("formatea marcas de tiempo ISO", () => {
    expect(formatIsoTimestamp(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)))).toBe("2024-01-02T03:04:05.000Z");
  });
});
