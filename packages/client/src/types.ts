// ── Request Options ─────────────────────────────────────────────────────────

export const UNITS = ["us", "si", "ca", "uk", "auto"] as const;
export type Units = (typeof UNITS)[number];

export const EXCLUDE_BLOCKS = ["currently", "minutely", "hourly", "daily", "alerts", "flags"] as const;
export type ExcludeBlock = (typeof EXCLUDE_BLOCKS)[number];

export function isUnits(value: string): value is Units {
  return (UNITS as readonly string[]).includes(value);
}

export function isExcludeBlock(value: string): value is ExcludeBlock {
  return (EXCLUDE_BLOCKS as readonly string[]).includes(value);
}

/** Point in time for `fetchAtTime`. */
export type WhenTime =
  | { kind: "date"; date: Date }
  | { kind: "unix"; seconds: number }
  | { kind: "raw"; value: string };

export function atDate(date: Date): WhenTime {
  return { kind: "date", date };
}

export function atUnix(seconds: number): WhenTime {
  return { kind: "unix", seconds };
}

/** Sent as-is: decimal Unix seconds or `YYYY-MM-DDTHH:MM:SS[Z|±HHMM]`. */
export function atRaw(value: string): WhenTime {
  return { kind: "raw", value };
}

// ── API Response Types ──────────────────────────────────────────────────────
//
// Raw timestamps are Unix epoch seconds. The Date companions (`date`,
// `sunrise`, `...At`) are only present after normalizeTimes().

export interface Report {
  latitude: number;
  longitude: number;
  timezone: string;
  offset?: number;
  currently?: DataPoint;
  minutely?: DataBlock<MinuteDataPoint>;
  hourly?: DataBlock<HourDataPoint>;
  daily?: DataBlock<DayDataPoint>;
  alerts?: Alert[];
  flags?: Flags;
}

export interface DataBlock<T> {
  summary?: string;
  icon?: string;
  data: T[];
}

/** Measurements shared by current, hourly and daily samples. */
export interface Conditions {
  dewPoint?: number;
  humidity?: number;
  windSpeed?: number;
  windGust?: number;
  windBearing?: number;
  visibility?: number;
  cloudCover?: number;
  pressure?: number;
  ozone?: number;
  uvIndex?: number;
}

export interface DataPoint extends Conditions {
  time: number;
  date?: Date;
  summary?: string;
  icon?: string;
  nearestStormDistance?: number;
  nearestStormBearing?: number;
  precipIntensity?: number;
  precipIntensityError?: number;
  precipProbability?: number;
  precipType?: string;
  temperature?: number;
  apparentTemperature?: number;
}

export interface MinuteDataPoint {
  time: number;
  date?: Date;
  precipIntensity?: number;
  precipIntensityError?: number;
  precipProbability?: number;
  precipType?: string;
}

export type HourDataPoint = Omit<DataPoint, "nearestStormDistance" | "nearestStormBearing">;

export interface DayDataPoint extends Conditions {
  time: number;
  date?: Date;
  summary?: string;
  icon?: string;
  sunriseTime?: number;
  sunrise?: Date;
  sunsetTime?: number;
  sunset?: Date;
  moonPhase?: number;
  precipIntensity?: number;
  precipIntensityMax?: number;
  precipIntensityMaxTime?: number;
  precipIntensityMaxAt?: Date;
  precipProbability?: number;
  precipType?: string;
  temperatureMin?: number;
  temperatureMinTime?: number;
  temperatureMinAt?: Date;
  temperatureMax?: number;
  temperatureMaxTime?: number;
  temperatureMaxAt?: Date;
  temperatureHigh?: number;
  temperatureHighTime?: number;
  temperatureHighAt?: Date;
  temperatureLow?: number;
  temperatureLowTime?: number;
  temperatureLowAt?: Date;
  apparentTemperatureMin?: number;
  apparentTemperatureMinTime?: number;
  apparentTemperatureMinAt?: Date;
  apparentTemperatureMax?: number;
  apparentTemperatureMaxTime?: number;
  apparentTemperatureMaxAt?: Date;
}

export interface Alert {
  title: string;
  time?: number;
  date?: Date;
  expires: number;
  expiresAt?: Date;
  description?: string;
  uri?: string;
  severity?: string;
  regions?: string[];
}

export interface Flags {
  sources?: string[];
  "isd-stations"?: string[];
  "madis-stations"?: string[];
  "datapoint-stations"?: string[];
  "darksky-stations"?: string[];
  "nearest-station"?: number;
  units?: string;
}
