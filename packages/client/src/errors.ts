import { EXCLUDE_BLOCKS, UNITS } from "./types.js";

export type ForecastErrorCode = "INVALID_UNITS" | "INVALID_EXCLUDE" | "PARSE_ERROR" | "HTTP_STATUS";

/**
 * Base class for errors raised by the client itself. Transport failures are
 * not wrapped: whatever the fetch implementation rejects with reaches the
 * caller unchanged.
 */
export class ForecastError extends Error {
  readonly code: ForecastErrorCode;

  constructor(code: ForecastErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidUnitsError extends ForecastError {
  readonly units: string;

  constructor(units: string) {
    super("INVALID_UNITS", `Invalid units requested: "${units}" (expected one of ${UNITS.join(", ")})`);
    this.units = units;
  }
}

export class InvalidExcludeError extends ForecastError {
  readonly exclude: string;

  constructor(exclude: string) {
    super("INVALID_EXCLUDE", `Invalid exclude requested: "${exclude}" (expected one of ${EXCLUDE_BLOCKS.join(", ")})`);
    this.exclude = exclude;
  }
}

export class ParseError extends ForecastError {
  constructor(message: string, cause: unknown) {
    super("PARSE_ERROR", message, { cause });
  }
}

export class ResponseStatusError extends ForecastError {
  readonly status: number;

  constructor(status: number, statusText: string, detail?: string) {
    const message = `Forecast API error: ${status} ${statusText}`.trimEnd();
    super("HTTP_STATUS", detail ? `${message} (${detail})` : message);
    this.status = status;
  }
}
