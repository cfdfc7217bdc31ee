import { promises as dns, type SrvRecord } from "node:dns";

import { CONCURRENCY_LIMITS, DEFAULT_SERVER_PORT } from "../config/limits";
import { ValidationError, errorMessage, getErrorCode } from "../core/errors";
import { runBounded } from "../utils/runBounded";
import { createLogger } from "./logService";

const logger = createLogger("servers");

export interface ResolvedServerAddress {
  /** Host and port the socket connects to (SRV target when there is one). */
  address: string;
  port: number;
  /** Host and port as typed by the user; sent in the handshake. */
  originalAddress: string;
  originalPort: number;
}

export interface ParsedAddressInput {
  host: string;
  port?: number;
}

export type SrvResolver = (name: string) => Promise<SrvRecord[]>;

const systemSrvResolver: SrvResolver = (name) => dns.resolveSrv(name);

const NO_RECORD_CODES = new Set(["ENODATA", "ENOTFOUND", "ENOTIMP", "ESERVFAIL", "EREFUSED"]);

export const parseAddressInput = (input: string): ParsedAddressInput => {
  const trimmed = input.trim();
  if (!trimmed) {
    throw new ValidationError("Dirección de servidor vacía.");
  }
  const colon = trimmed.lastIndexOf(":");
  if (colon > 0) {
    const rawPort = trimmed.slice(colon + 1);
    const port = Number(rawPort);
    if (/^\d+$/.test(rawPort) && port >= 1 && port <= 65535) {
      return { host: trimmed.slice(0, colon), port };
    }
  }
  return { host: trimmed };
};

/** Lowest priority wins; ties go to the highest weight. */
export const pickSrvRecord = (records: SrvRecord[]) =>
  [...records].sort((a, b) => a.priority - b.priority || b.weight - a.weight)[0];

export const resolveServerAddress = async (
  input: string,
  { resolveSrv = systemSrvResolver }: { resolveSrv?: SrvResolver } = {},
): Promise<ResolvedServerAddress> => {
  const { host, port } = parseAddressInput(input);
  if (port !== undefined) {
    return { address: host, port, originalAddress: host, originalPort: port };
  }

  const direct = {
    address: host,
    port: DEFAULT_SERVER_PORT,
    originalAddress: host,
    originalPort: DEFAULT_SERVER_PORT,
  };
  let records: SrvRecord[];
  try {
    records = await resolveSrv(`_minecraft._tcp.${host}`);
  } catch (error) {
    const code = getErrorCode(error);
    if (!code || !NO_RECORD_CODES.has(code)) {
      logger.debug(`Consulta SRV fallida para ${host}: ${errorMessage(error)}`);
    }
    return direct;
  }

  const record = pickSrvRecord(records.filter((entry) => entry.port >= 1 && entry.port <= 65535));
  if (!record) {
    return direct;
  }
  return {
    address: record.name.replace(/\.$/, ""),
    port: record.port,
    originalAddress: host,
    originalPort: DEFAULT_SERVER_PORT,
  };
};

export const resolveServerAddresses = async (
  inputs: readonly string[],
  limit: number = CONCURRENCY_LIMITS.serverResolution,
  options: { resolveSrv?: SrvResolver } = {},
) => {
  const results = await runBounded(inputs, limit, (input) => resolveServerAddress(input, options));
  return results.flatMap((result) => {
    if (result.status === "fulfilled") {
      return [{ input: result.item, resolved: result.value }];
    }
    logger.warn(`No se pudo resolver ${result.item}: ${errorMessage(result.reason)}`);
    return [];
  });
};
