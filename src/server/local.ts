// src/server/local.ts
import { execFile as execFileCb } from "node:child_process";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import { constants } from "../lib/constants.js";
import type { ServerConnection, ExecResult, ExecOptions } from "./connection.js";

export class LocalConnection implements ServerConnection {
  async execFile(file: string, args: string[], options?: ExecOptions): Promise<ExecResult> {
    const timeout = options?.timeout ?? constants.TOOL_TIMEOUT;
    return new Promise((resolve) => {
      let settled = false;
      let deadline: ReturnType<typeof setTimeout> | undefined;
      const settle = (result: ExecResult) => {
        if (settled) return;
        settled = true;
        clearTimeout(deadline);
        resolve(result);
      };

      const child = execFileCb(
        file,
        args,
        {
          timeout,
          killSignal: "SIGKILL",
          maxBuffer: options?.maxBuffer ?? constants.TOOL_MAX_BUFFER,
          encoding: "utf8",
        },
        (err, stdout, stderr) => {
          if (!err) {
            settle({ status: "exited", exitCode: 0, stdout, stderr });
            return;
          }
          // String codes (ENOENT, EACCES, ERR_CHILD_PROCESS_STDIO_MAXBUFFER)
          // mean the run never produced a usable exit status.
          if (typeof err.code === "string") {
            settle({ status: "spawn-error", message: err.message });
            return;
          }
          // execFile only sets `killed` when it sent the kill itself, i.e. on timeout
          if (err.killed) {
            settle({ status: "timeout", stdout, stderr });
            return;
          }
          settle({
            status: "exited",
            exitCode: typeof err.code === "number" ? err.code : 1,
            stdout,
            stderr,
          });
        },
      );

      // execFile waits for stdio to close, which a surviving grandchild can
      // hold open long after the kill. Stop waiting at the deadline regardless.
      deadline = setTimeout(() => {
        child.kill("SIGKILL");
        child.stdout?.destroy();
        child.stderr?.destroy();
        settle({ status: "timeout", stdout: "", stderr: "" });
      }, timeout);
    });
  }

  async writeFile(
    filePath: string,
    content: string | Uint8Array,
    mode?: number,
  ): Promise<void> {
    const dir = path.dirname(filePath);
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(filePath, content, { mode: mode ?? 0o644 });
  }

  async makeTempDir(prefix: string): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), prefix));
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async remove(
    filePath: string,
    options?: { recursive?: boolean },
  ): Promise<void> {
    await fs.rm(filePath, {
      recursive: options?.recursive ?? false,
      force: true,
    });
  }
}
