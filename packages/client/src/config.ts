import { isUnits, type Units } from "./types.js";

export const DEFAULT_BASE_URL = "https://api.forecast.io/forecast";

export interface SkycastConfig {
  apiKey: string;
  baseUrl: string;
  units: Units;
  debug: boolean;
  port: number; // web sample only
}

const defaults: SkycastConfig = {
  apiKey: "",
  baseUrl: DEFAULT_BASE_URL,
  units: "auto",
  debug: false,
  port: 3200,
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SkycastConfig {
  const units = env.SKYCAST_UNITS ?? defaults.units;
  const port = parseInt(env.SKYCAST_PORT ?? String(defaults.port), 10);

  return {
    ...defaults,
    apiKey: env.SKYCAST_API_KEY ?? defaults.apiKey,
    baseUrl: env.SKYCAST_BASE_URL || defaults.baseUrl,
    units: isUnits(units) ? units : defaults.units,
    debug: env.SKYCAST_DEBUG === "1" || env.SKYCAST_DEBUG?.toLowerCase() === "true",
    port: Number.isNaN(port) ? defaults.port : port,
  };
}
