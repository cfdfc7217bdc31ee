export type ErrorKind =
  | "network"
  | "validation"
  | "download"
  | "integrity"
  | "resource"
  | "configuration";

export abstract class AppError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = new.target.name;
  }
}

export class NetworkError extends AppError {
  readonly kind = "network";

  constructor(
    message: string,
    public readonly url?: string,
    public readonly status?: number,
    details?: unknown,
  ) {
    super(message, details);
  }
}

export class ValidationError extends AppError {
  readonly kind = "validation";
}

export class DownloadError extends AppError {
  readonly kind = "download";

  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    details?: unknown,
  ) {
    super(message, details);
  }
}

export class IntegrityError extends AppError {
  readonly kind = "integrity";

  constructor(
    message: string,
    public readonly expected: string,
    public readonly actual: string,
  ) {
    super(message);
  }
}

export class ResourceError extends AppError {
  readonly kind = "resource";
}

export class ConfigurationError extends AppError {
  readonly kind = "configuration";
}

const NETWORK_CODES = new Set([
  "ENOTFOUND",
  "EAI_AGAIN",
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "ENETUNREACH",
  "EHOSTUNREACH",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET",
]);

export const isAppError = (error: unknown): error is AppError =>
  error instanceof AppError;

export const getErrorCode = (error: unknown): string | undefined => {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }
  return typeof error.code === "string" ? error.code : undefined;
};

export const errorMessage = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

const isNetworkFailure = (error: unknown) => {
  let current: unknown = error;
  for (let depth = 0; depth < 4 && current; depth += 1) {
    const code = getErrorCode(current);
    if (code && NETWORK_CODES.has(code)) {
      return true;
    }
    if (current instanceof Error && current.name === "AbortError") {
      return true;
    }
    current = current instanceof Error ? current.cause : undefined;
  }
  // fetch rejects with a bare TypeError("fetch failed") on transport errors
  return error instanceof TypeError && /fetch failed/i.test(error.message);
};

export const toAppError = (error: unknown, fallbackMessage = "Error inesperado"): AppError => {
  if (isAppError(error)) {
    return error;
  }
  if (isNetworkFailure(error)) {
    return new NetworkError(`Error de red: ${errorMessage(error)}`, undefined, undefined, error);
  }
  return new ResourceError(
    error instanceof Error ? `${fallbackMessage}: ${error.message}` : fallbackMessage,
    error,
  );
};
