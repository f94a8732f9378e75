/**
 * Error types raised by the browser and its registry client.
 */

export type RegistryErrorKind =
  | "unauthorized"
  | "forbidden"
  | "not_found"
  | "rate_limited"
  | "server_error"
  | "connection_failed"
  | "invalid_response"
  | "unknown";

/**
 * Failure of a registry query. Non-fatal: the browser shows the message in the
 * detail pane and keeps running.
 */
export class RegistryError extends Error {
  override readonly name = "RegistryError";
  readonly kind: RegistryErrorKind;
  readonly statusCode: number | undefined;

  constructor(
    kind: RegistryErrorKind,
    message: string,
    options?: Readonly<{ statusCode?: number; cause?: unknown }>,
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.kind = kind;
    this.statusCode = options?.statusCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RegistryError);
    }
  }

  /** Maps an HTTP status to the error kind the browser reports. */
  static fromStatus(statusCode: number, message: string): RegistryError {
    return new RegistryError(kindForStatus(statusCode), message, { statusCode });
  }
}

function kindForStatus(statusCode: number): RegistryErrorKind {
  if (statusCode === 401) return "unauthorized";
  if (statusCode === 403) return "forbidden";
  if (statusCode === 404) return "not_found";
  if (statusCode === 429) return "rate_limited";
  if (statusCode >= 500) return "server_error";
  return "unknown";
}

/**
 * Registry data broke an assumption the browser cannot recover from
 * (e.g. a history entry without a matching layer).
 */
export class InvariantError extends Error {
  override readonly name = "InvariantError";

  constructor(message: string) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InvariantError);
    }
  }
}

export class ConfigError extends Error {
  override readonly name = "ConfigError";
  readonly fields: Readonly<Record<string, readonly string[]>>;

  constructor(fields: Readonly<Record<string, readonly string[]>>) {
    const summary = Object.entries(fields)
      .map(([field, problems]) => `${field}: ${problems.join(", ")}`)
      .join("; ");
    super(`Invalid configuration (${summary})`);
    this.fields = fields;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof RegistryError) {
    return error.statusCode === undefined
      ? `${error.kind}: ${error.message}`
      : `${error.kind} (HTTP ${String(error.statusCode)}): ${error.message}`;
  }
  if (error instanceof Error) return error.message;
  return String(error);
}
