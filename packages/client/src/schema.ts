import { z, ZodError } from "zod";
import { ParseError } from "./errors.js";
import type { Report } from "./types.js";

const epochSeconds = z.number().int();

/** The service sends `null` for some values it has none for; read it as absent. */
function maybe<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value) => value ?? undefined);
}

const conditionsShape = {
  dewPoint: maybe(z.number()),
  humidity: maybe(z.number()),
  windSpeed: maybe(z.number()),
  windGust: maybe(z.number()),
  windBearing: maybe(z.number()),
  visibility: maybe(z.number()),
  cloudCover: maybe(z.number()),
  pressure: maybe(z.number()),
  ozone: maybe(z.number()),
  uvIndex: maybe(z.number()),
};

const hourDataPointSchema = z.object({
  ...conditionsShape,
  time: epochSeconds,
  summary: maybe(z.string()),
  icon: maybe(z.string()),
  precipIntensity: maybe(z.number()),
  precipIntensityError: maybe(z.number()),
  precipProbability: maybe(z.number()),
  precipType: maybe(z.string()),
  temperature: maybe(z.number()),
  apparentTemperature: maybe(z.number()),
});

const dataPointSchema = hourDataPointSchema.extend({
  nearestStormDistance: maybe(z.number()),
  nearestStormBearing: maybe(z.number()),
});

const minuteDataPointSchema = z.object({
  time: epochSeconds,
  precipIntensity: maybe(z.number()),
  precipIntensityError: maybe(z.number()),
  precipProbability: maybe(z.number()),
  precipType: maybe(z.string()),
});

const dayDataPointSchema = z.object({
  ...conditionsShape,
  time: epochSeconds,
  summary: maybe(z.string()),
  icon: maybe(z.string()),
  sunriseTime: maybe(epochSeconds),
  sunsetTime: maybe(epochSeconds),
  moonPhase: maybe(z.number()),
  precipIntensity: maybe(z.number()),
  precipIntensityMax: maybe(z.number()),
  precipIntensityMaxTime: maybe(epochSeconds),
  precipProbability: maybe(z.number()),
  precipType: maybe(z.string()),
  temperatureMin: maybe(z.number()),
  temperatureMinTime: maybe(epochSeconds),
  temperatureMax: maybe(z.number()),
  temperatureMaxTime: maybe(epochSeconds),
  temperatureHigh: maybe(z.number()),
  temperatureHighTime: maybe(epochSeconds),
  temperatureLow: maybe(z.number()),
  temperatureLowTime: maybe(epochSeconds),
  apparentTemperatureMin: maybe(z.number()),
  apparentTemperatureMinTime: maybe(epochSeconds),
  apparentTemperatureMax: maybe(z.number()),
  apparentTemperatureMaxTime: maybe(epochSeconds),
});

function dataBlock<T extends z.ZodTypeAny>(point: T) {
  return z.object({
    summary: maybe(z.string()),
    icon: maybe(z.string()),
    data: z.array(point),
  });
}

const alertSchema = z.object({
  title: z.string(),
  time: maybe(epochSeconds),
  expires: epochSeconds,
  description: maybe(z.string()),
  uri: maybe(z.string()),
  severity: maybe(z.string()),
  regions: maybe(z.array(z.string())),
});

const flagsSchema = z.object({
  sources: maybe(z.array(z.string())),
  "isd-stations": maybe(z.array(z.string())),
  "madis-stations": maybe(z.array(z.string())),
  "datapoint-stations": maybe(z.array(z.string())),
  "darksky-stations": maybe(z.array(z.string())),
  "nearest-station": maybe(z.number()),
  units: maybe(z.string()),
});

export const reportSchema = z.object({
  latitude: z.number(),
  longitude: z.number(),
  timezone: z.string(),
  offset: maybe(z.number()),
  currently: maybe(dataPointSchema),
  minutely: maybe(dataBlock(minuteDataPointSchema)),
  hourly: maybe(dataBlock(hourDataPointSchema)),
  daily: maybe(dataBlock(dayDataPointSchema)),
  alerts: maybe(z.array(alertSchema)),
  flags: maybe(flagsSchema),
});

/**
 * Parse a response body into a Report. Malformed JSON and bodies that do not
 * match the Report shape both reject with ParseError; no partial Report is
 * handed back.
 */
export function parseReport(body: string): Report {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    throw new ParseError(`Response body is not valid JSON: ${err instanceof Error ? err.message : String(err)}`, err);
  }

  try {
    const report: Report = reportSchema.parse(json);
    return report;
  } catch (err) {
    if (err instanceof ZodError) {
      const issue = err.issues[0];
      const where = issue && issue.path.length > 0 ? issue.path.join(".") : "body";
      throw new ParseError(`Response does not match the report shape at ${where}: ${issue?.message ?? err.message}`, err);
    }
    throw err;
  }
}

const serviceErrorSchema = z.object({ error: z.string() });

/** The `error` message of a service error body, if it has one. */
export function readServiceError(body: string): string | undefined {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return undefined;
  }
  const result = serviceErrorSchema.safeParse(json);
  return result.success ? result.data.error : undefined;
}
