import { describe, expect, it } from "vitest";

import { ValidationError } from "../core/errors";
import { decodeVarInt, encodeVarInt } from "./varint";

describe("varint", () => {
  it("codifica valores positivos y negativos", () => {
    expect([...encodeVarInt(0)]).toEqual([0x00]);
    expect([...encodeVarInt(300)]).toEqual([0xac, 0x02]);
    expect([...encodeVarInt(25565)]).toEqual([0xdd, 0xc7, 0x01]);
    expect([...encodeVarInt(-1)]).toEqual([0xff, 0xff, 0xff, 0xff, 0x0f]);
    expect([...encodeVarInt(2147483647)]).toEqual([0xff, 0xff, 0xff, 0xff, 0x07]);
  });

  it("decodifica lo que codifica, incluidos negativos", () => {
    for (const value of [0, 1, 127, 128, 25565, -1, -2147483648, 2147483647]) {
      const encoded = encodeVarInt(value);
      expect(decodeVarInt(encoded)).toEqual({ value, size: encoded.length });
    }
  });

  it("lee desde un desplazamiento", () => {
    expect(decodeVarInt(Buffer.from([0x05, 0xac, 0x02]), 1)).toEqual({ value: 300, size: 2 });
  });

  it("devuelve null si faltan bytes", () => {
    expect(decodeVarInt(Buffer.from([0x80]))).toBeNull();
    expect(decodeVarInt(Buffer.alloc(0))).toBeNull();
  });

  it("rechaza más de cinco bytes", () => {
    expect(() => decodeVarInt(Buffer.from([0x80, 0x80, 0x80, 0x80, 0x80, 0x01]))).toThrow(
      ValidationError,
    );
  });
});
