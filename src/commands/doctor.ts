// src/commands/doctor.ts
import { Command } from "commander";
import * as path from "node:path";
import chalk from "chalk";
import { loadConfig } from "../lib/config.js";
import { constants } from "../lib/constants.js";
import { logger } from "../lib/logger.js";
import { LocalConnection } from "../server/local.js";
import { Mup1ccCLI } from "../core/mup1cc-cli.js";

export function doctorCommand(): Command {
  return new Command("doctor")
    .description("Check that the device tool and static page are reachable")
    .option("--tool <bin>", "Device tool binary")
    .action(async (opts: { tool?: string }) => {
      const config = loadConfig(process.env, { toolBin: opts.tool });
      const conn = new LocalConnection();
      const cli = new Mup1ccCLI(conn, config);

      console.log(chalk.bold("Configuration"));
      logger.dim(`Listen:  ${config.host}:${config.port}`);
      logger.dim(`Tool:    ${cli.command}`);
      logger.dim(`Timeout: ${config.timeoutMs} ms`);
      logger.dim(`CORS:    ${config.corsOrigins.join(", ")}`);
      console.log("");

      let allOk = true;

      const bin = await cli.detect();
      if (bin) {
        logger.success(`${config.toolBin} found (${bin})`);
      } else {
        logger.fail(`${config.toolBin} not found in PATH`);
        allOk = false;
      }

      const indexPath = path.join(config.publicDir, constants.INDEX_FILE);
      if (await conn.exists(indexPath)) {
        logger.success(`Page: ${indexPath}`);
      } else {
        logger.fail(`Page missing: ${indexPath} (a fallback page will be served)`);
        allOk = false;
      }

      console.log("");
      if (allOk) {
        logger.info("All checks passed.");
      } else {
        logger.warn("Some checks failed.");
        process.exitCode = 1;
      }
    });
}
