import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";

export const sha1OfFile = async (filePath: string) => {
  const hash = createHash("sha1");
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest("hex");
};

export const sha1OfBuffer = (data: Uint8Array) =>
  createHash("sha1").update(data).digest("hex");

export const sameHash = (left?: string, right?: string) =>
  Boolean(left && right && left.toLowerCase() === right.toLowerCase());
