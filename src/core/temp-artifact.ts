// src/core/temp-artifact.ts
import * as path from "node:path";
import type { ServerConnection } from "../server/connection.js";
import { constants } from "../lib/constants.js";
import { logger as defaultLogger, type Logger } from "../lib/logger.js";

export interface Upload {
  content: Uint8Array;
  filename?: string;
}

/** File suffix for an upload: its own extension, or `.yaml` when it has none. */
export function artifactSuffix(filename?: string): string {
  const ext = path.extname(filename ?? "");
  return ext.length > 1 ? ext : constants.DEFAULT_INPUT_SUFFIX;
}

/**
 * Materialize `upload` as a private temp file for the duration of `fn`.
 *
 * Each call gets its own directory, so concurrent callers never share a path.
 * The directory is removed once `fn` settles, whether it resolved or threw.
 * A failed removal is logged and does not replace `fn`'s outcome.
 * Without an upload, `fn` runs with `undefined` and nothing touches the disk.
 */
export async function withTempArtifact<T>(
  conn: ServerConnection,
  upload: Upload | undefined,
  fn: (filePath: string | undefined) => Promise<T>,
  log: Logger = defaultLogger,
): Promise<T> {
  if (!upload) return fn(undefined);

  const dir = await conn.makeTempDir(constants.TEMP_DIR_PREFIX);
  try {
    const filePath = path.join(
      dir,
      constants.TEMP_FILE_BASENAME + artifactSuffix(upload.filename),
    );
    await conn.writeFile(filePath, upload.content, constants.TEMP_FILE_MODE);
    return await fn(filePath);
  } finally {
    try {
      await conn.remove(dir, { recursive: true });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.warn(`Could not remove ${dir}: ${message}`);
    }
  }
}
