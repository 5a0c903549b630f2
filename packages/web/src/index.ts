import { createConnection, loadConfig } from "@skycast/client";
import { startWebServer } from "./server.js";

async function main(): Promise<void> {
  const config = loadConfig();
  if (!config.apiKey) {
    throw new Error("SKYCAST_API_KEY is not set");
  }

  const connection = createConnection(config.apiKey, { baseUrl: config.baseUrl, debug: config.debug });
  await connection.setUnits(config.units);

  const web = startWebServer({ connection }, config.port);

  const shutdown = () => {
    console.log("[Web] Shutting down");
    web.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error("[Web] Close failed:", err);
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  console.error(`[Web] Fatal: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
