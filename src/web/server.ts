// src/web/server.ts
import { Hono } from "hono";
import { cors } from "hono/cors";
import { serve, type ServerType } from "@hono/node-server";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { ServerConnection } from "../server/connection.js";
import type { GatewayConfig } from "../lib/config.js";
import { CommandGateway } from "../core/gateway.js";
import { Mup1ccCLI } from "../core/mup1cc-cli.js";
import { constants } from "../lib/constants.js";
import { logger as defaultLogger, type Logger } from "../lib/logger.js";
import { readInvocationForm } from "./invocation-form.js";

export interface GatewayServerOptions {
  config: GatewayConfig;
  conn: ServerConnection;
  log?: Logger;
}

function fallbackPage(reason: string): string {
  return `<!DOCTYPE html><html><head><title>mup1cc gateway</title></head>
<body><h1>mup1cc gateway</h1>
<p>Page not found. POST a multipart form to <code>${constants.RUN_ROUTE}</code>
with <code>device</code>, <code>method</code> and an optional <code>input_file</code>.</p>
<p><small>${reason}</small></p></body></html>`;
}

export function createApp(options: GatewayServerOptions): Hono {
  const { config, conn } = options;
  const log = options.log ?? defaultLogger;
  const cli = new Mup1ccCLI(conn, config);
  const gateway = new CommandGateway(conn, cli, log);
  const app = new Hono();

  app.use(
    "*",
    cors({
      origin: config.corsOrigins.includes("*") ? "*" : config.corsOrigins,
    }),
  );

  // --- API routes ---

  app.post(constants.RUN_ROUTE, async (c) => {
    let body: Record<string, unknown>;
    try {
      body = await c.req.parseBody();
    } catch {
      return c.json({ error: "Invalid form body" }, 400);
    }

    const form = await readInvocationForm(body);
    if (!form.ok) return c.json({ error: form.error }, 400);

    const { status, body: result } = await gateway.handle(form.request);
    return c.json(result, status);
  });

  app.get("/api/health", (c) => {
    return c.json({ ok: true, tool: cli.command });
  });

  // --- Static page ---

  app.get("/", async (c) => {
    try {
      const html = await fs.readFile(
        path.join(config.publicDir, constants.INDEX_FILE),
        "utf-8",
      );
      return c.html(html);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      return c.html(fallbackPage(msg));
    }
  });

  app.notFound((c) => c.json({ error: "Not found" }, 404));

  app.onError((err, c) => {
    log.error(`Unhandled error on ${c.req.method} ${c.req.path}: ${err.message}`);
    return c.json({ error: err.message }, 500);
  });

  return app;
}

/** Start listening; resolves once the socket is bound. */
export function startServer(options: GatewayServerOptions): Promise<ServerType> {
  const { port, host } = options.config;
  const app = createApp(options);
  return new Promise((resolve, reject) => {
    const server = serve({ fetch: app.fetch, port, hostname: host }, () => {
      resolve(server);
    });
    server.once("error", reject);
  });
}
