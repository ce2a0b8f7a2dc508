#!/usr/bin/env node
// src/index.ts
import { Command } from "commander";
import { createRequire } from "node:module";
const require = createRequire(import.meta.url);
const { version } = require("../package.json") as { version: string };
import { serveCommand } from "./commands/serve.js";
import { runCommand } from "./commands/run.js";
import { doctorCommand } from "./commands/doctor.js";

const program = new Command();

program
  .name("mup1-gateway")
  .description("HTTP gateway for the mup1cc device configuration tool")
  .version(version);

program.addCommand(serveCommand());
program.addCommand(runCommand());
program.addCommand(doctorCommand());

// Global error handler for unhandled async errors
process.on("unhandledRejection", (err) => {
  if (err instanceof Error) {
    console.error(`Error: ${err.message}`);
  } else {
    console.error("Unknown error:", err);
  }
  process.exit(1);
});

try {
  await program.parseAsync();
} catch (err) {
  if (err instanceof Error && err.message !== "(outputHelp)") {
    console.error(`Error: ${err.message}`);
    process.exit(1);
  }
}
