// src/server/connection.ts

/** Outcome of running an external program. */
export type ExecResult =
  | { status: "exited"; exitCode: number; stdout: string; stderr: string }
  /** Killed after exceeding `timeout`; output is whatever arrived before the kill. */
  | { status: "timeout"; stdout: string; stderr: string }
  /** The program could not be started or its output could not be captured. */
  | { status: "spawn-error"; message: string };

export interface ExecOptions {
  timeout?: number; // ms, default 30_000
  maxBuffer?: number; // bytes per stream
}

export interface ServerConnection {
  /** Execute a command with explicit args array (no shell interpolation) */
  execFile(file: string, args: string[], options?: ExecOptions): Promise<ExecResult>;

  /** Write file contents (creates parent dirs if needed) */
  writeFile(path: string, content: string | Uint8Array, mode?: number): Promise<void>;

  /** Create a fresh, uniquely named directory under the OS temp dir */
  makeTempDir(prefix: string): Promise<string>;

  /** Check if path exists */
  exists(path: string): Promise<boolean>;

  /** Remove file or directory; missing paths are ignored */
  remove(path: string, options?: { recursive?: boolean }): Promise<void>;
}
