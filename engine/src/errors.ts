export type PosterErrorKind =
  | "InvalidRequest"
  | "LocationNotFound"
  | "ServiceUnavailable"
  | "DataFetchPartial"
  | "ThemeLoadError"
  | "AssetMissing"
  | "RenderError"
  | "ExportError";

export interface FailureInfo {
  kind: PosterErrorKind;
  message: string;
}

/** Base class for every failure the poster pipeline can attribute to a single kind. */
export class PosterError extends Error {
  readonly kind: PosterErrorKind;

  constructor(kind: PosterErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = kind;
    this.kind = kind;
  }

  toJSON(): FailureInfo {
    return { kind: this.kind, message: this.message };
  }
}

export class InvalidRequestError extends PosterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("InvalidRequest", message, options);
  }
}

export class LocationNotFoundError extends PosterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("LocationNotFound", message, options);
  }
}

export class ServiceUnavailableError extends PosterError {
  readonly attempts: number;

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super("ServiceUnavailable", message, options);
    this.attempts = attempts;
  }
}

export class DataFetchPartialError extends PosterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("DataFetchPartial", message, options);
  }
}

export class ThemeLoadError extends PosterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ThemeLoadError", message, options);
  }
}

export class AssetMissingError extends PosterError {
  readonly asset: string;

  constructor(asset: string, message: string, options?: { cause?: unknown }) {
    super("AssetMissing", message, options);
    this.asset = asset;
  }
}

export class RenderError extends PosterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("RenderError", message, options);
  }
}

export class ExportError extends PosterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ExportError", message, options);
  }
}

export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

/** Map any thrown value onto exactly one failure kind. Unknown errors count as render failures. */
export function toFailure(error: unknown): FailureInfo {
  if (error instanceof PosterError) return error.toJSON();
  return { kind: "RenderError", message: extractErrorMessage(error) };
}
