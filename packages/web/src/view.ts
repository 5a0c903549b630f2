import { formatInZone, type Report } from "@skycast/client";

export interface WeatherView {
  latitude: number;
  longitude: number;
  timezone: string;
  callCount: number;
  current: {
    time: string | null;
    summary: string | null;
    temperature: number | null;
    pressure: number | null;
    humidity: number | null;
  } | null;
  daily: {
    summary: string | null;
    days: Array<{
      date: string | null;
      summary: string | null;
      temperatureMin: number | null;
      temperatureMax: number | null;
      pressure: number | null;
    }>;
  } | null;
}

/** Flatten a normalized report into what the page shows. Times are rendered in the report's zone. */
export function toWeatherView(report: Report, callCount: number): WeatherView {
  const tz = report.timezone;
  const now = report.currently;

  return {
    latitude: report.latitude,
    longitude: report.longitude,
    timezone: tz,
    callCount,
    current: now
      ? {
          time: now.date ? formatInZone(now.date, tz) : null,
          summary: now.summary ?? null,
          temperature: now.temperature ?? null,
          pressure: now.pressure ?? null,
          humidity: now.humidity ?? null,
        }
      : null,
    daily: report.daily
      ? {
          summary: report.daily.summary ?? null,
          days: report.daily.data.map((d) => ({
            date: d.date ? formatInZone(d.date, tz, "date") : null,
            summary: d.summary ?? null,
            temperatureMin: d.temperatureMin ?? null,
            temperatureMax: d.temperatureMax ?? null,
            pressure: d.pressure ?? null,
          })),
        }
      : null,
  };
}
