import { toAppError, type ErrorKind } from "./errors";

export type ErrorPresentation = "popup" | "notification" | "silent" | "ignore";

const PRESENTATION_BY_KIND: Record<ErrorKind, ErrorPresentation> = {
  network: "notification",
  validation: "notification",
  download: "notification",
  integrity: "popup",
  resource: "notification",
  configuration: "popup",
};

export const presentationFor = (kind: ErrorKind): ErrorPresentation =>
  PRESENTATION_BY_KIND[kind];

export interface ErrorDescription {
  kind: ErrorKind;
  presentation: ErrorPresentation;
  message: string;
}

export const describeError = (error: unknown): ErrorDescription => {
  const appError = toAppError(error);
  return {
    kind: appError.kind,
    presentation: presentationFor(appError.kind),
    message: appError.message,
  };
};
