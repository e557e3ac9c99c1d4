/**
 * Base class for errors that map onto an HTTP response
 */
export abstract class GeoError extends Error {
  abstract readonly status: number;
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidHostError extends GeoError {
  readonly status = 400;
  readonly code = "INVALID_HOST";

  constructor(public readonly host: string, reason: string) {
    super(`Invalid host "${host}": ${reason}`);
  }
}

export class NoSuchHostError extends GeoError {
  readonly status = 404;
  readonly code = "NO_SUCH_HOST";

  constructor(public readonly host: string, reason = "no A or AAAA records") {
    super(`Failed to resolve host "${host}": ${reason}`);
  }
}

export type TableName = "asn" | "city" | "region";

export class DatabaseLoadError extends GeoError {
  readonly status = 503;
  readonly code = "DATABASE_UNAVAILABLE";

  constructor(
    public readonly table: TableName,
    public readonly path: string,
    cause: unknown
  ) {
    super(
      `Failed to load ${table} database from ${path}: ${
        errorMessage(cause)
      }`
    );
  }
}

export class DatabaseUnavailableError extends GeoError {
  readonly status = 503;
  readonly code = "DATABASE_UNAVAILABLE";

  constructor() {
    super("Geolocation databases are not loaded");
  }
}

/*
 * Errors from Node's core modules may come from another realm (Jest runs
 * tests in a vm context), so these read properties instead of using
 * instanceof Error.
 */

export function errorMessage(error: unknown): string {
  if (
    typeof error === "object" &&
    error !== null &&
    "message" in error &&
    typeof error.message === "string"
  ) {
    return error.message;
  }
  return String(error);
}

export function errorCode(error: unknown): string | null {
  if (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string"
  ) {
    return error.code;
  }
  return null;
}

/**
 * The 4xx status a library error carries (Express sets one on parameters it
 * cannot decode), or null
 */
export function clientErrorStatus(error: unknown): number | null {
  if (
    typeof error === "object" &&
    error !== null &&
    "status" in error &&
    typeof error.status === "number" &&
    error.status >= 400 &&
    error.status < 500
  ) {
    return error.status;
  }
  return null;
}
