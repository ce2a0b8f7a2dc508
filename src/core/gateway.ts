// src/core/gateway.ts
import type { ServerConnection, ExecResult } from "../server/connection.js";
import type { Mup1ccCLI } from "./mup1cc-cli.js";
import { decodeOutput } from "./decode.js";
import { withTempArtifact, type Upload } from "./temp-artifact.js";
import { constants } from "../lib/constants.js";
import { logger as defaultLogger, type Logger } from "../lib/logger.js";

export interface InvocationRequest {
  method: string;
  device: string;
  upload?: Upload;
}

export type GatewayBody =
  | { output: unknown }
  | { output_raw: string }
  | { error: string };

export interface GatewayResponse {
  status: 200 | 500 | 504;
  body: GatewayBody;
}

/**
 * Turns one invocation request into one run of the device tool and maps the
 * run's outcome to an HTTP status and JSON body. Never throws.
 */
export class CommandGateway {
  constructor(
    private conn: ServerConnection,
    private cli: Mup1ccCLI,
    private log: Logger = defaultLogger,
  ) {}

  async handle(request: InvocationRequest): Promise<GatewayResponse> {
    const { method, device, upload } = request;
    try {
      return await withTempArtifact(this.conn, upload, async (inputPath) => {
        this.log.step(
          `${this.cli.command} -d ${device} -m ${method}` +
            (inputPath ? ` -i ${inputPath}` : ""),
        );
        const result = await this.cli.run({ device, method, inputPath });
        return this.toResponse(result);
      }, this.log);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.log.warn(`${this.cli.command} aborted: ${message}`);
      return { status: 500, body: { error: message } };
    }
  }

  private toResponse(result: ExecResult): GatewayResponse {
    switch (result.status) {
      case "timeout":
        this.log.warn(`${this.cli.command} timed out`);
        return { status: 504, body: { error: constants.TOOL_TIMEOUT_MESSAGE } };

      case "spawn-error":
        this.log.warn(`${this.cli.command} could not run: ${result.message}`);
        return { status: 500, body: { error: result.message } };

      case "exited": {
        if (result.exitCode !== 0) {
          const stderr = result.stderr.trim();
          this.log.warn(`${this.cli.command} exited with code ${result.exitCode}`);
          return {
            status: 500,
            body: { error: stderr || constants.TOOL_FAILED_MESSAGE },
          };
        }
        const decoded = decodeOutput(result.stdout.trim());
        return decoded.kind === "structured"
          ? { status: 200, body: { output: decoded.value } }
          : { status: 200, body: { output_raw: decoded.text } };
      }
    }
  }
}
