import { Socket } from "node:net";

import { SERVER_PING_TIMEOUT_MS } from "../config/limits";
import {
  buildHandshakePacket,
  buildStatusRequestPacket,
  tryParseStatusResponse,
  type ServerStatus,
} from "../core/protocol/serverListPing";
import { errorMessage } from "../core/errors";
import { createLogger } from "./logService";
import {
  resolveServerAddress,
  type ResolvedServerAddress,
  type SrvResolver,
} from "./serverAddressService";

const logger = createLogger("servers");

export type PingState =
  | "idle"
  | "resolving"
  | "connecting"
  | "handshaking"
  | "awaitingResponse"
  | "parsed"
  | "timedOut"
  | "failed";

export interface PingOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  onStateChange?: (state: PingState) => void;
}

type PingOutcome = { state: "parsed"; status: ServerStatus } | { state: "timedOut" | "failed" };

/**
 * Server List Ping against an already resolved address. Resolves with the
 * parsed status, or `null` on refusal, timeout, abort or a malformed reply.
 */
export const pingServer = (
  resolved: ResolvedServerAddress,
  { timeoutMs = SERVER_PING_TIMEOUT_MS, signal, onStateChange }: PingOptions = {},
): Promise<ServerStatus | null> =>
  new Promise((resolve) => {
    const socket = new Socket();
    let received = Buffer.alloc(0);
    let settled = false;

    const report = (state: PingState) => onStateChange?.(state);

    const settle = (outcome: PingOutcome) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      socket.destroy();
      report(outcome.state);
      resolve(outcome.state === "parsed" ? outcome.status : null);
    };

    const onAbort = () => settle({ state: "failed" });

    const timer = setTimeout(() => {
      logger.debug(`Tiempo de espera agotado: ${resolved.address}:${resolved.port}`);
      settle({ state: "timedOut" });
    }, timeoutMs);
    timer.unref();

    if (signal?.aborted) {
      onAbort();
      return;
    }
    signal?.addEventListener("abort", onAbort, { once: true });

    socket.on("data", (chunk: Buffer) => {
      received = Buffer.concat([received, chunk]);
      const status = tryParseStatusResponse(received);
      if (status) {
        settle({ state: "parsed", status });
      }
    });
    socket.on("end", () => {
      if (!settled) {
        logger.debug(`Respuesta incompleta de ${resolved.address}:${resolved.port}`);
      }
      settle({ state: "failed" });
    });
    socket.on("error", (error) => {
      logger.debug(`Conexión fallida ${resolved.address}:${resolved.port}: ${errorMessage(error)}`);
      settle({ state: "failed" });
    });
    socket.on("close", () => settle({ state: "failed" }));

    report("connecting");
    socket.connect(resolved.port, resolved.address, () => {
      if (settled) {
        return;
      }
      report("handshaking");
      socket.write(buildHandshakePacket(resolved.originalAddress, resolved.originalPort));
      socket.write(buildStatusRequestPacket());
      report("awaitingResponse");
    });
  });

export type ServerConnectionResult =
  | { status: "online"; info: ServerStatus; address: ResolvedServerAddress }
  | { status: "unreachable"; address: ResolvedServerAddress };

export const checkServerConnection = async (
  input: string,
  options: PingOptions & { resolveSrv?: SrvResolver } = {},
): Promise<ServerConnectionResult> => {
  options.onStateChange?.("idle");
  options.onStateChange?.("resolving");
  const address = await resolveServerAddress(input, { resolveSrv: options.resolveSrv });
  const info = await pingServer(address, options);
  return info ? { status: "online", info, address } : { status: "unreachable", address };
};
