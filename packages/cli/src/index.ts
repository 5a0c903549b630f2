import { createConnection, loadConfig, normalizeTimes, type Report } from "@skycast/client";
import { parseCliArgs, USAGE } from "./args.js";
import { formatReport } from "./format.js";

async function main(argv: string[]): Promise<number> {
  const config = loadConfig();

  try {
    const options = parseCliArgs(argv, config);
    if (options.help) {
      console.log(USAGE);
      return 0;
    }
    if (!options.apiKey) {
      throw new Error("No API key: pass --apikey or set SKYCAST_API_KEY");
    }

    const conn = createConnection(options.apiKey, {
      baseUrl: config.baseUrl,
      debug: options.verbose || config.debug,
    });
    await conn.setUnits(options.units);

    let report: Report;
    if (options.at) {
      // fetchAtTime rejects empty entries; an unset --exclude splits to [""]
      const excludes = options.excludes.filter((ex) => ex !== "");
      report = await conn.fetchAtTime(options.lat, options.lon, options.at, excludes);
    } else {
      report = await conn.fetchCurrent(options.lat, options.lon, options.excludes, options.extend);
    }
    normalizeTimes(report);

    const lines = formatReport(report, await conn.getCallCount());
    console.log(lines.join("\n"));
    return 0;
  } catch (err) {
    console.error(`[skycast] ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error("[skycast] Unhandled error:", err);
    process.exitCode = 1;
  },
);
