import { formatInZone, type DataBlock, type DayDataPoint, type HourDataPoint, type Report } from "@skycast/client";

function round(value: number | undefined, width = 0): string {
  return value === undefined ? "-".padStart(width) : value.toFixed(0).padStart(width);
}

function when(date: Date | undefined, timeZone: string, style: "date" | "datetime" = "datetime"): string {
  return date ? formatInZone(date, timeZone, style) : "-";
}

function hourlyLines(hourly: DataBlock<HourDataPoint>, tz: string): string[] {
  const lines = [`Hourly summary: ${hourly.summary ?? "-"}`];
  for (const h of hourly.data) {
    lines.push(
      `Time: ${when(h.date, tz)}  Temperature: ${round(h.temperature, 2)}°  Pressure: ${round(h.pressure, 4)}mb  - ${h.summary ?? ""}`.trimEnd(),
    );
  }
  return lines;
}

function dailyLines(daily: DataBlock<DayDataPoint>, tz: string): string[] {
  const lines = [`Daily summary: ${daily.summary ?? "-"}`];
  for (const d of daily.data) {
    lines.push(
      `Time: ${when(d.date, tz, "date")}  Temperature (Min/Max): ${round(d.temperatureMin, 2)}/${round(d.temperatureMax, 2)}°  Pressure: ${round(d.pressure, 4)}mb  - ${d.summary ?? ""}`.trimEnd(),
    );
  }
  return lines;
}

/**
 * Render a report for the terminal. Expects normalizeTimes() to have run;
 * times are shown in the report's own time zone.
 */
export function formatReport(report: Report, callCount: number): string[] {
  const tz = report.timezone;
  const lines = [
    `API calls made today: ${callCount}`,
    `Latitude: ${report.latitude.toFixed(2)}  Longitude: ${report.longitude.toFixed(2)}  Timezone: ${tz}`,
  ];

  const now = report.currently;
  if (now) {
    const humidity = now.humidity === undefined ? undefined : now.humidity * 100;
    lines.push(
      "Current weather -",
      `Report time: ${when(now.date, tz)}  Summary: ${now.summary ?? "-"}`,
      `Temperature: ${round(now.temperature)}°  Pressure: ${round(now.pressure)}mb  Humidity: ${round(humidity)}%`,
    );
  }

  if (report.hourly && report.hourly.data.length > 0) {
    lines.push(...hourlyLines(report.hourly, tz));
  }
  if (report.daily && report.daily.data.length > 0) {
    lines.push(...dailyLines(report.daily, tz));
  }

  for (const alert of report.alerts ?? []) {
    lines.push(`Alert: ${alert.title} (until ${when(alert.expiresAt, tz)})${alert.uri ? ` ${alert.uri}` : ""}`);
  }

  return lines;
}
