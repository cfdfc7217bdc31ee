import { ValidationError } from "../core/errors";

const MAX_VARINT_BYTES = 5;

// Negative values are written through their unsigned 32-bit pattern (5 bytes).
export const encodeVarInt = (value: number) => {
  const bytes: number[] = [];
  let remaining = value >>> 0;
  do {
    let byte = remaining & 0x7f;
    remaining >>>= 7;
    if (remaining !== 0) {
      byte |= 0x80;
    }
    bytes.push(byte);
  } while (remaining !== 0);
  return Buffer.from(bytes);
};

export interface DecodedVarInt {
  value: number;
  size: number;
}

/** Returns `null` while the buffer ends before the last byte of the varint. */
export const decodeVarInt = (buffer: Uint8Array, offset = 0): DecodedVarInt | null => {
  let value = 0;
  for (let index = 0; index < MAX_VARINT_BYTES; index += 1) {
    const position = offset + index;
    if (position >= buffer.length) {
      return null;
    }
    const byte = buffer[position];
    value |= (byte & 0x7f) << (7 * index);
    if ((byte & 0x80) === 0) {
      return { value: value | 0, size: index + 1 };
    }
  }
  throw new ValidationError("VarInt demasiado largo.");
};
