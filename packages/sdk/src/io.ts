/**
 * File I/O for source feeds and result files
 *
 * Invariants:
 * - Reads are UTF-8; a failed read is logged as "load.failed" and rethrown unchanged
 * - Writes are atomic: never observe partial file contents
 * - Temp files reside in the same directory as the target and are removed on failure
 *
 * Pattern: write → fsync → rename
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { OutputWriteError } from "./errors.js";
import { logger } from "./observability/logs.js";

/**
 * Node error code of a failed fs call, if any
 */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Read a source feed as UTF-8 text
 * @throws The underlying fs error, after logging a diagnostic
 */
export async function readSource(filePath: string): Promise<string> {
  try {
    const content = await fs.readFile(filePath, "utf8");
    // Strip BOM if present
    return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
  } catch (err) {
    logger.error("load.failed", {
      source: filePath,
      message: `Error loading data from ${filePath}`,
      details: { code: errorCode(err) ?? "UNKNOWN" },
    });
    throw err;
  }
}

/**
 * Ensure a directory exists, creating it and parent directories as needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new OutputWriteError(dirPath, { cause: err });
  }
}

/**
 * Atomically write content to a file using write-sync-rename
 * @param filePath - Target file path
 * @param content - Content to write (UTF-8 string)
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const tmp = join(dir, `.${basename(filePath)}.${randomUUID()}.tmp`);

  await ensureDirectory(dir);

  let fileHandle: fs.FileHandle | null = null;
  try {
    fileHandle = await fs.open(tmp, "w", 0o644);
    await fileHandle.writeFile(content, "utf-8");

    try {
      await fileHandle.datasync();
    } catch (err) {
      // ENOTSUP/ENOSYS/EINVAL: datasync unavailable on this filesystem
      const code = errorCode(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    await fs.rename(tmp, filePath);
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch((closeErr: unknown) => {
        logger.debug("write.cleanup", { source: tmp, message: String(closeErr) });
      });
    }
    await fs.unlink(tmp).catch((unlinkErr: unknown) => {
      if (errorCode(unlinkErr) !== "ENOENT") {
        logger.debug("write.cleanup", { source: tmp, message: String(unlinkErr) });
      }
    });

    throw new OutputWriteError(filePath, { cause: err });
  }
}
