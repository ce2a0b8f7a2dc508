// src/commands/run.ts
import { Command } from "commander";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { loadConfig } from "../lib/config.js";
import { LocalConnection } from "../server/local.js";
import { Mup1ccCLI } from "../core/mup1cc-cli.js";
import { CommandGateway } from "../core/gateway.js";
import type { Upload } from "../core/temp-artifact.js";
import { stderrLogger } from "../lib/logger.js";

export function runCommand(): Command {
  return new Command("run")
    .description("Run one invocation through the gateway and print the JSON result")
    .requiredOption("-d, --device <device>", "Device locator (e.g. /dev/ttyACM0)")
    .requiredOption("-m, --method <method>", "Method (get, fetch, ipatch, post, put, delete)")
    .option("-i, --input <file>", "YAML request document")
    .option("--tool <bin>", "Device tool binary")
    .option("--timeout <ms>", "Timeout in milliseconds")
    .action(
      async (opts: {
        device: string;
        method: string;
        input?: string;
        tool?: string;
        timeout?: string;
      }) => {
        const config = loadConfig(process.env, {
          toolBin: opts.tool,
          timeoutMs: opts.timeout,
        });
        const conn = new LocalConnection();
        const gateway = new CommandGateway(
          conn,
          new Mup1ccCLI(conn, config),
          stderrLogger,
        );

        let upload: Upload | undefined;
        if (opts.input) {
          upload = {
            content: await fs.readFile(opts.input),
            filename: path.basename(opts.input),
          };
        }

        const { status, body } = await gateway.handle({
          method: opts.method,
          device: opts.device,
          upload,
        });
        console.log(JSON.stringify(body, null, 2));
        if (status !== 200) process.exitCode = 1;
      },
    );
}
