import { decodeVarInt, encodeVarInt } from "../../utils/varint";

export interface ServerVersion {
  name: string;
  protocol?: number;
}

export interface ServerPlayers {
  max: number;
  online: number;
  sample?: Array<{ name: string; id?: string }>;
}

export type DescriptionComponent = string | { text?: string; extra?: DescriptionComponent[] };

export interface ServerModInfo {
  type: string;
  modList: Array<{ modid: string; version: string }>;
}

export interface ServerStatus {
  version?: ServerVersion;
  players?: ServerPlayers;
  description: DescriptionComponent;
  /** `data:image/png;base64,...` as sent by the server. */
  favicon?: string;
  modinfo?: ServerModInfo;
}

const STATUS_PACKET_ID = 0;
const HANDSHAKE_PROTOCOL_VERSION = -1;
const NEXT_STATE_STATUS = 1;

const framePacket = (payload: Buffer) => Buffer.concat([encodeVarInt(payload.length), payload]);

export const encodeString = (value: string) => {
  const bytes = Buffer.from(value, "utf8");
  return Buffer.concat([encodeVarInt(bytes.length), bytes]);
};

/** Handshake with next state "status"; host and port are the ones the user typed. */
export const buildHandshakePacket = (host: string, port: number) => {
  const portBytes = Buffer.alloc(2);
  portBytes.writeUInt16BE(port);
  return framePacket(
    Buffer.concat([
      encodeVarInt(STATUS_PACKET_ID),
      encodeVarInt(HANDSHAKE_PROTOCOL_VERSION),
      encodeString(host),
      portBytes,
      encodeVarInt(NEXT_STATE_STATUS),
    ]),
  );
};

export const buildStatusRequestPacket = () => framePacket(encodeVarInt(STATUS_PACKET_ID));

const stripFormatCodes = (text: string) => text.replace(/§[\s\S]?/g, "");

export const descriptionToPlainText = (description: DescriptionComponent): string => {
  if (typeof description === "string") {
    return stripFormatCodes(description);
  }
  const text = description.text ? stripFormatCodes(description.text) : "";
  return text + (description.extra ?? []).map(descriptionToPlainText).join("");
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseDescription = (value: unknown): DescriptionComponent | null => {
  if (typeof value === "string") {
    return value;
  }
  if (!isRecord(value)) {
    return null;
  }
  const extra = Array.isArray(value.extra)
    ? value.extra.flatMap((entry) => {
        const parsed = parseDescription(entry);
        return parsed === null ? [] : [parsed];
      })
    : undefined;
  return {
    text: typeof value.text === "string" ? value.text : undefined,
    extra,
  };
};

const parseVersion = (value: unknown): ServerVersion | undefined => {
  if (!isRecord(value) || typeof value.name !== "string") {
    return undefined;
  }
  return {
    name: value.name,
    protocol: typeof value.protocol === "number" ? value.protocol : undefined,
  };
};

const parsePlayers = (value: unknown): ServerPlayers | undefined => {
  if (!isRecord(value) || typeof value.max !== "number" || typeof value.online !== "number") {
    return undefined;
  }
  const sample = Array.isArray(value.sample)
    ? value.sample.flatMap((entry) =>
        isRecord(entry) && typeof entry.name === "string"
          ? [{ name: entry.name, id: typeof entry.id === "string" ? entry.id : undefined }]
          : [],
      )
    : undefined;
  return { max: value.max, online: value.online, sample };
};

const parseModInfo = (value: unknown): ServerModInfo | undefined => {
  if (!isRecord(value) || typeof value.type !== "string") {
    return undefined;
  }
  const modList = Array.isArray(value.modList)
    ? value.modList.flatMap((entry) =>
        isRecord(entry) && typeof entry.modid === "string" && typeof entry.version === "string"
          ? [{ modid: entry.modid, version: entry.version }]
          : [],
      )
    : [];
  return { type: value.type, modList };
};

/** `null` when the document has no usable description. */
export const parseServerStatus = (json: unknown): ServerStatus | null => {
  if (!isRecord(json)) {
    return null;
  }
  const description = parseDescription(json.description);
  if (description === null) {
    return null;
  }
  return {
    version: parseVersion(json.version),
    players: parsePlayers(json.players),
    description,
    favicon: typeof json.favicon === "string" ? json.favicon : undefined,
    modinfo: parseModInfo(json.modinfo),
  };
};

/**
 * Parses a status response from the bytes received so far. Returns `null`
 * while the packet is incomplete and for any malformed content.
 */
export const tryParseStatusResponse = (buffer: Uint8Array): ServerStatus | null => {
  try {
    const length = decodeVarInt(buffer, 0);
    if (!length || buffer.length < length.size + length.value) {
      return null;
    }
    const packetId = decodeVarInt(buffer, length.size);
    if (!packetId || packetId.value !== STATUS_PACKET_ID) {
      return null;
    }
    const stringOffset = length.size + packetId.size;
    const stringLength = decodeVarInt(buffer, stringOffset);
    if (!stringLength) {
      return null;
    }
    const start = stringOffset + stringLength.size;
    const end = start + stringLength.value;
    if (stringLength.value < 0 || end > buffer.length) {
      return null;
    }
    const text = Buffer.from(buffer.subarray(start, end)).toString("utf8");
    return parseServerStatus(JSON.parse(text));
  } catch {
    return null;
  }
};
