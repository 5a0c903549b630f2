export type {
  Units,
  ExcludeBlock,
  WhenTime,
  Report,
  DataBlock,
  Conditions,
  DataPoint,
  MinuteDataPoint,
  HourDataPoint,
  DayDataPoint,
  Alert,
  Flags,
} from "./types.js";

export { UNITS, EXCLUDE_BLOCKS, isUnits, isExcludeBlock, atDate, atUnix, atRaw } from "./types.js";

export type { ConnectionOptions, FetchLike } from "./connection.js";
export { ForecastConnection, createConnection, CALL_COUNT_HEADER } from "./connection.js";

export type { ForecastErrorCode } from "./errors.js";
export {
  ForecastError,
  InvalidUnitsError,
  InvalidExcludeError,
  ParseError,
  ResponseStatusError,
} from "./errors.js";

export { reportSchema, parseReport } from "./schema.js";

export type { TimeStyle } from "./times.js";
export { normalizeTimes, fromUnixSeconds, formatInZone } from "./times.js";

export type { SkycastConfig } from "./config.js";
export { loadConfig, DEFAULT_BASE_URL } from "./config.js";

export { ReadWriteLock } from "./rw-lock.js";
