// src/commands/serve.ts
import { Command } from "commander";
import { loadConfig } from "../lib/config.js";
import { logger } from "../lib/logger.js";
import { LocalConnection } from "../server/local.js";

export function serveCommand(): Command {
  return new Command("serve")
    .description("Start the HTTP gateway")
    .option("-p, --port <port>", "Listen port")
    .option("-H, --host <host>", "Listen address")
    .option("--tool <bin>", "Device tool binary")
    .option("--timeout <ms>", "Per-invocation timeout in milliseconds")
    .option("--cors-origin <origin...>", "Allowed CORS origins")
    .action(
      async (opts: {
        port?: string;
        host?: string;
        tool?: string;
        timeout?: string;
        corsOrigin?: string[];
      }) => {
        const config = loadConfig(process.env, {
          port: opts.port,
          host: opts.host,
          toolBin: opts.tool,
          timeoutMs: opts.timeout,
          corsOrigins: opts.corsOrigin,
        });
        const conn = new LocalConnection();

        // Dynamic import keeps hono out of the other commands' startup path
        const { startServer } = await import("../web/server.js");
        const server = await startServer({ config, conn });

        logger.success(`Gateway running at http://${config.host}:${config.port}`);
        logger.dim(
          `Tool: ${config.toolBin} ${config.toolSubcommand} (timeout ${config.timeoutMs} ms)`,
        );

        const shutdown = () => {
          logger.info("Shutting down");
          server.close();
        };
        process.once("SIGINT", shutdown);
        process.once("SIGTERM", shutdown);
      },
    );
}
