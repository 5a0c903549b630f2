import { DEFAULT_BASE_URL } from "./config.js";
import { InvalidExcludeError, InvalidUnitsError, ResponseStatusError } from "./errors.js";
import { ReadWriteLock } from "./rw-lock.js";
import { parseReport, readServiceError } from "./schema.js";
import { isExcludeBlock, isUnits, type Report, type Units, type WhenTime } from "./types.js";

export const CALL_COUNT_HEADER = "X-Forecast-API-Calls";

/** The HTTP transport. Rejections are passed to the caller unchanged. */
export type FetchLike = (url: string) => Promise<Response>;

export interface ConnectionOptions {
  baseUrl?: string;
  fetch?: FetchLike;
  /** Log one `[Forecast]` line per request (API key redacted). */
  debug?: boolean;
}

/**
 * A connection to the forecast API. Each connection has its own API key and
 * units setting, and remembers the call count the service reported on the
 * last response it received. The count is 0 until a fetch has been made and
 * is not shared with other connections using the same key.
 *
 * Fetches and setUnits() hold the connection's lock exclusively for their
 * whole duration, so requests through one connection never overlap.
 */
export class ForecastConnection {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly debug: boolean;
  private readonly lock = new ReadWriteLock();
  private units: Units = "auto";
  private apiCalls = 0;

  constructor(apiKey: string, options: ConnectionOptions = {}) {
    this.apiKey = apiKey;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.fetchImpl = options.fetch ?? ((url) => globalThis.fetch(url));
    this.debug = options.debug ?? false;
  }

  getUnits(): Promise<Units> {
    return this.lock.read(() => this.units);
  }

  /** Calls made today with this API key, as of this connection's last response. */
  getCallCount(): Promise<number> {
    return this.lock.read(() => this.apiCalls);
  }

  setUnits(units: string): Promise<void> {
    return this.lock.write(() => {
      if (!isUnits(units)) throw new InvalidUnitsError(units);
      this.units = units;
    });
  }

  /**
   * Current conditions and forecast for a location.
   *
   * `excludes` names blocks to leave out of the response; empty entries are
   * skipped. `extendHourly` asks for 7 days of hourly data instead of 2.
   */
  async fetchCurrent(
    lat: number,
    lon: number,
    excludes: readonly string[] = [],
    extendHourly = false,
  ): Promise<Report> {
    const blocks = excludes.filter((ex) => ex !== "");
    assertExcludes(blocks);

    return this.request(`${formatCoordinate(lat)},${formatCoordinate(lon)}`, blocks, extendHourly);
  }

  /**
   * Conditions at a given point in time, past or future. Unlike fetchCurrent,
   * every exclude entry must name a block; an empty string is rejected.
   * A Date or Unix value must be finite; a raw time string is only checked by the service.
   */
  async fetchAtTime(
    lat: number,
    lon: number,
    when: WhenTime,
    excludes: readonly string[] = [],
  ): Promise<Report> {
    assertExcludes(excludes);
    const time = formatWhen(when);

    return this.request(`${formatCoordinate(lat)},${formatCoordinate(lon)},${time}`, excludes, false);
  }

  // ── Private Helpers ───────────────────────────────────────────────────────

  private request(location: string, excludes: readonly string[], extendHourly: boolean): Promise<Report> {
    return this.lock.write(async () => {
      let path = `${location}?units=${this.units}&exclude=${excludes.join(",")}`;
      if (extendHourly) {
        path += "&extend=hourly";
      }

      const res = await this.fetchImpl(`${this.baseUrl}/${this.apiKey}/${path}`);
      this.recordCallCount(res.headers.get(CALL_COUNT_HEADER));

      if (this.debug) {
        console.debug(`[Forecast] GET ${this.baseUrl}/***/${path} -> ${res.status} (calls today: ${this.apiCalls})`);
      }

      if (!res.ok) {
        // Always consume the body, even on an error status.
        const detail = readServiceError(await res.text());
        throw new ResponseStatusError(res.status, res.statusText, detail);
      }

      const body = await res.text();
      return parseReport(body);
    });
  }

  /** Absent or non-numeric headers leave the previous count in place. */
  private recordCallCount(header: string | null): void {
    if (header === null) return;
    const value = header.trim();
    if (!/^\d+$/.test(value)) return;
    this.apiCalls = parseInt(value, 10);
  }
}

export function createConnection(apiKey: string, options?: ConnectionOptions): ForecastConnection {
  return new ForecastConnection(apiKey, options);
}

function assertExcludes(excludes: readonly string[]): void {
  for (const ex of excludes) {
    if (!isExcludeBlock(ex)) throw new InvalidExcludeError(ex);
  }
}

function formatCoordinate(value: number): string {
  return value.toFixed(6);
}

function formatWhen(when: WhenTime): string {
  switch (when.kind) {
    case "date":
      return String(Math.floor(finiteTime(when.date.getTime(), "date") / 1000));
    case "unix":
      return String(Math.trunc(finiteTime(when.seconds, "unix")));
    case "raw":
      return when.value;
  }
}

function finiteTime(value: number, kind: WhenTime["kind"]): number {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Invalid ${kind} time: ${value}`);
  }
  return value;
}
