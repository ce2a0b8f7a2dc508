// src/core/mup1cc-cli.ts
import type { ServerConnection, ExecResult } from "../server/connection.js";
import type { GatewayConfig } from "../lib/config.js";
import { shellQuote } from "../lib/shell.js";

export interface Mup1ccInvocation {
  device: string;
  method: string;
  /** Path of a YAML request document, passed with `-i` */
  inputPath?: string;
}

export type Mup1ccOptions = Pick<
  GatewayConfig,
  "toolBin" | "toolSubcommand" | "timeoutMs" | "maxBufferBytes"
>;

export class Mup1ccCLI {
  constructor(
    private conn: ServerConnection,
    private options: Mup1ccOptions,
  ) {}

  /** Human-readable command prefix, e.g. `dr mup1cc` */
  get command(): string {
    return `${this.options.toolBin} ${this.options.toolSubcommand}`;
  }

  /** Argument vector after the binary: `<subcommand> -d <device> -m <method> [-i <path>]` */
  buildArgs(invocation: Mup1ccInvocation): string[] {
    const args = [
      this.options.toolSubcommand,
      "-d",
      invocation.device,
      "-m",
      invocation.method,
    ];
    if (invocation.inputPath) {
      args.push("-i", invocation.inputPath);
    }
    return args;
  }

  async run(invocation: Mup1ccInvocation): Promise<ExecResult> {
    return this.conn.execFile(this.options.toolBin, this.buildArgs(invocation), {
      timeout: this.options.timeoutMs,
      maxBuffer: this.options.maxBufferBytes,
    });
  }

  /** Resolve the tool binary through PATH. Returns null when it cannot be found. */
  async detect(): Promise<string | null> {
    const result = await this.conn.execFile("sh", [
      "-c",
      `command -v ${shellQuote(this.options.toolBin)}`,
    ]);
    if (result.status !== "exited" || result.exitCode !== 0) return null;
    const bin = result.stdout.trim();
    return bin || null;
  }
}
