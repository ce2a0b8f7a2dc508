// src/core/__tests__/mock-connection.ts
import type {
  ServerConnection,
  ExecResult,
  ExecOptions,
} from "../../server/connection.js";

type ExecHandler = (file: string, args: string[]) => ExecResult | Promise<ExecResult>;

export class MockConnection implements ServerConnection {
  public commands: string[] = [];
  public execOptions: (ExecOptions | undefined)[] = [];
  public files: Map<string, Uint8Array> = new Map();
  public dirs: Set<string> = new Set();
  public execResponses: Map<string, ExecResult> = new Map();
  private handler: ExecHandler | null = null;
  private tempCounter = 0;

  /** Set a custom response for a specific command pattern */
  mockExec(pattern: string, result: ExecResult): void {
    this.execResponses.set(pattern, result);
  }

  /** Compute responses dynamically; takes precedence over patterns */
  onExec(handler: ExecHandler): void {
    this.handler = handler;
  }

  async execFile(file: string, args: string[], options?: ExecOptions): Promise<ExecResult> {
    const command = [file, ...args].join(" ");
    this.commands.push(command);
    this.execOptions.push(options);
    if (this.handler) return this.handler(file, args);
    for (const [pattern, result] of this.execResponses) {
      if (command.includes(pattern)) return result;
    }
    return { status: "exited", exitCode: 0, stdout: "", stderr: "" };
  }

  async writeFile(path: string, content: string | Uint8Array, _mode?: number): Promise<void> {
    this.files.set(
      path,
      typeof content === "string" ? new TextEncoder().encode(content) : content,
    );
  }

  async makeTempDir(prefix: string): Promise<string> {
    this.tempCounter += 1;
    const dir = `/tmp/${prefix}${this.tempCounter}`;
    this.dirs.add(dir);
    return dir;
  }

  async exists(path: string): Promise<boolean> {
    return this.files.has(path) || this.dirs.has(path);
  }

  async remove(path: string, _options?: { recursive?: boolean }): Promise<void> {
    this.files.delete(path);
    this.dirs.delete(path);
    // Also remove sub-paths for recursive
    for (const key of this.files.keys()) {
      if (key.startsWith(path + "/")) this.files.delete(key);
    }
  }
}
