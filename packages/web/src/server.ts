import http from "node:http";
import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { createHTTPHandler } from "@trpc/server/adapters/standalone";
import { appRouter } from "./router.js";
import type { WebContext } from "./context.js";

const INDEX_HTML = fileURLToPath(new URL("../public/index.html", import.meta.url));

function serveIndex(res: http.ServerResponse): void {
  try {
    const html = fs.readFileSync(INDEX_HTML);
    res.writeHead(200, { "Content-Type": "text/html; charset=utf-8" });
    res.end(html);
  } catch (err) {
    console.error("[Web] Could not read index.html:", err instanceof Error ? err.message : String(err));
    res.writeHead(500);
    res.end("Page unavailable");
  }
}

export function startWebServer(ctx: WebContext, port: number, host = "0.0.0.0") {
  const handler = createHTTPHandler({
    router: appRouter,
    createContext: () => ctx,
  });

  const server = http.createServer((req, res) => {
    const pathname = new URL(req.url ?? "/", "http://localhost").pathname;

    if (pathname.startsWith("/trpc/")) {
      // Strip the prefix so procedure names resolve
      req.url = (req.url ?? "/").replace(/^\/trpc/, "");
      handler(req, res);
      return;
    }

    if (req.method === "GET" && (pathname === "/" || pathname === "/index.html")) {
      serveIndex(res);
      return;
    }

    res.writeHead(404);
    res.end("Not found");
  });

  server.listen(port, host);
  server.on("listening", () => {
    const address = server.address();
    const shown = typeof address === "object" && address ? `${address.address}:${address.port}` : String(address);
    console.log(`[Web] Listening on ${shown}`);
  });

  return {
    server,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
