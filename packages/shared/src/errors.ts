/**
 * Base error class for typed pipeline errors.
 * Input and output errors propagate to the caller; asset errors are absorbed
 * by the component that raised them.
 */
export class AppError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AppError";
    this.code = code;
  }
}

export class SlideDecodeError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "SLIDE_DECODE_ERROR", options);
    this.name = "SlideDecodeError";
  }
}

export class InvalidSlideRecordError extends AppError {
  public readonly index: number;

  constructor(index: number, received: string) {
    super(`Slide record at position ${index + 1} is not an object (received ${received})`, "INVALID_SLIDE_RECORD");
    this.name = "InvalidSlideRecordError";
    this.index = index;
  }
}

export class ConfigError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CONFIG_ERROR", options);
    this.name = "ConfigError";
  }
}

export class AssetError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "ASSET_ERROR", options);
    this.name = "AssetError";
  }
}

export class OutputWriteError extends AppError {
  public readonly outputPath: string;

  constructor(outputPath: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Failed to write ${outputPath}${reason}`, "OUTPUT_WRITE_ERROR", options);
    this.name = "OutputWriteError";
    this.outputPath = outputPath;
  }
}

export class HttpStatusError extends AppError {
  public readonly status: number;
  /** Delay the server asked for via Retry-After, if any. */
  public readonly retryAfterMs: number | null;

  constructor(url: string, status: number, retryAfterMs: number | null = null) {
    super(`Request to ${url} failed with status ${status}`, "HTTP_STATUS_ERROR");
    this.name = "HttpStatusError";
    this.status = status;
    this.retryAfterMs = retryAfterMs;
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error && typeof error.code === "string";
}

export function isNotFoundError(error: unknown): boolean {
  return isErrnoException(error) && error.code === "ENOENT";
}
