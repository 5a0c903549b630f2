import type { Alert, DataPoint, DayDataPoint, HourDataPoint, MinuteDataPoint, Report } from "./types.js";

export function fromUnixSeconds(seconds: number): Date {
  return new Date(seconds * 1000);
}

// ── Per-shape Normalizers ───────────────────────────────────────────────────

function normalizePoint(point: DataPoint | HourDataPoint | MinuteDataPoint): void {
  point.date = fromUnixSeconds(point.time);
}

const DAY_TIME_FIELDS = [
  ["sunriseTime", "sunrise"],
  ["sunsetTime", "sunset"],
  ["precipIntensityMaxTime", "precipIntensityMaxAt"],
  ["temperatureMinTime", "temperatureMinAt"],
  ["temperatureMaxTime", "temperatureMaxAt"],
  ["temperatureHighTime", "temperatureHighAt"],
  ["temperatureLowTime", "temperatureLowAt"],
  ["apparentTemperatureMinTime", "apparentTemperatureMinAt"],
  ["apparentTemperatureMaxTime", "apparentTemperatureMaxAt"],
] as const satisfies ReadonlyArray<readonly [keyof DayDataPoint, keyof DayDataPoint]>;

function normalizeDay(day: DayDataPoint): void {
  day.date = fromUnixSeconds(day.time);
  for (const [raw, structured] of DAY_TIME_FIELDS) {
    const seconds = day[raw];
    if (seconds !== undefined) day[structured] = fromUnixSeconds(seconds);
  }
}

function normalizeAlert(alert: Alert): void {
  alert.expiresAt = fromUnixSeconds(alert.expires);
  if (alert.time !== undefined) alert.date = fromUnixSeconds(alert.time);
}

// ── Report ──────────────────────────────────────────────────────────────────

/**
 * Fill every Date companion in the report from its raw Unix-seconds field.
 * Dates are UTC instants. Mutates and returns the same report; running it
 * again recomputes the same values.
 */
export function normalizeTimes(report: Report): Report {
  if (report.currently) normalizePoint(report.currently);
  for (const minute of report.minutely?.data ?? []) normalizePoint(minute);
  for (const hour of report.hourly?.data ?? []) normalizePoint(hour);
  for (const day of report.daily?.data ?? []) normalizeDay(day);
  for (const alert of report.alerts ?? []) normalizeAlert(alert);
  return report;
}

// ── Display ─────────────────────────────────────────────────────────────────

export type TimeStyle = "date" | "datetime";

/**
 * Render a Date in an IANA time zone, e.g. the report's `timezone`.
 * "datetime" gives `01/Jan/2021 - 09:30`, "date" gives `01/Jan/2021`.
 * Unknown zones fall back to UTC.
 */
export function formatInZone(date: Date, timeZone: string, style: TimeStyle = "datetime"): string {
  const parts = zonedParts(date, timeZone);
  const day = `${parts.day}/${parts.month}/${parts.year}`;
  return style === "date" ? day : `${day} - ${parts.hour}:${parts.minute}`;
}

function zonedParts(date: Date, timeZone: string): Record<"day" | "month" | "year" | "hour" | "minute", string> {
  let format: Intl.DateTimeFormat;
  try {
    format = dateFormat(timeZone);
  } catch (err) {
    if (!(err instanceof RangeError)) throw err;
    format = dateFormat("UTC");
  }

  const parts = { day: "", month: "", year: "", hour: "", minute: "" };
  for (const part of format.formatToParts(date)) {
    if (part.type === "day" || part.type === "month" || part.type === "year" || part.type === "hour" || part.type === "minute") {
      parts[part.type] = part.value;
    }
  }
  return parts;
}

function dateFormat(timeZone: string): Intl.DateTimeFormat {
  return new Intl.DateTimeFormat("en-GB", {
    timeZone,
    day: "2-digit",
    month: "short",
    year: "numeric",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
  });
}
