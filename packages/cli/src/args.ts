import { parseArgs } from "node:util";
import { atRaw, atUnix, type SkycastConfig, type WhenTime } from "@skycast/client";

export interface CliOptions {
  apiKey: string;
  lat: number;
  lon: number;
  excludes: string[];
  units: string;
  extend: boolean;
  at?: WhenTime;
  verbose: boolean;
  help: boolean;
}

const DEFAULT_LAT = 37.8267;
const DEFAULT_LON = -122.423;

export const USAGE = `Usage: skycast [options]

  --apikey <key>     API key (default: $SKYCAST_API_KEY)
  --lat <deg>        latitude (default: ${DEFAULT_LAT})
  --lon <deg>        longitude (default: ${DEFAULT_LON})
  --exclude <list>   comma separated blocks to leave out:
                     currently, minutely, hourly, daily, alerts, flags
  --units <units>    us, si, ca, uk or auto (default: $SKYCAST_UNITS or auto)
  --extend           request 7 days of hourly data instead of 2
                     (not with --at)
  --at <time>        conditions at a point in time: Unix seconds or
                     YYYY-MM-DDTHH:MM:SS[Z|+HHMM]
  --verbose          log each request
  -h, --help         show this help`;

export function parseCliArgs(argv: string[], config: SkycastConfig): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      apikey: { type: "string" },
      lat: { type: "string" },
      lon: { type: "string" },
      exclude: { type: "string", default: "" },
      units: { type: "string" },
      extend: { type: "boolean", default: false },
      at: { type: "string" },
      verbose: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
  });

  if (values.extend && values.at !== undefined) {
    throw new Error("--extend cannot be combined with --at");
  }

  return {
    apiKey: values.apikey ?? config.apiKey,
    lat: parseCoordinate("lat", values.lat, DEFAULT_LAT),
    lon: parseCoordinate("lon", values.lon, DEFAULT_LON),
    excludes: (values.exclude ?? "").split(","),
    units: values.units ?? config.units,
    extend: values.extend ?? false,
    at: values.at === undefined ? undefined : parseWhen(values.at),
    verbose: values.verbose ?? false,
    help: values.help ?? false,
  };
}

function parseCoordinate(flag: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new Error(`Invalid --${flag}: "${raw}" is not a number`);
  }
  return value;
}

function parseWhen(raw: string): WhenTime {
  return /^-?\d+$/.test(raw) ? atUnix(Number(raw)) : atRaw(raw);
}
