import * as fs from "fs";
import * as path from "path";
import crypto from "crypto";

let debugEnabled = false;

/**
 * Turns `debug` lines on or off. Called once at startup from the configured
 * debug flag.
 */
export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled;
}

/**
 * Logger utility for consistent logging format.
 * Everything goes to stderr: stdout belongs to the stdio transport.
 */
export const logger = {
  info: (context: string, message: string) =>
    console.error(`[${context}] ${message}`),
  warn: (context: string, message: string) =>
    console.error(`[Warn:${context}] ${message}`),
  error: (context: string, message: string) =>
    console.error(`[Error:${context}] ${message}`),
  debug: (context: string, message: string) => {
    if (debugEnabled) {
      console.error(`[Debug:${context}] ${message}`);
    }
  },
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  try {
    if (!fs.existsSync(dirPath)) {
      logger.debug("Storage", `Creating directory: ${dirPath}`);
      await fs.promises.mkdir(dirPath, { recursive: true });
    }
  } catch (error: unknown) {
    throw new Error(
      `Failed to create directory ${dirPath}: ${errorMessage(error)}`
    );
  }
}

/**
 * Writes a file through a temporary sibling and a rename, so readers see
 * either the old content or the new one.
 */
export async function writeFileAtomic(
  filePath: string,
  content: string
): Promise<void> {
  await ensureDirectory(path.dirname(filePath));
  const tempPath = `${filePath}.${process.pid}.${crypto
    .randomBytes(4)
    .toString("hex")}.tmp`;
  try {
    await fs.promises.writeFile(tempPath, content, { encoding: "utf-8" });
    await fs.promises.rename(tempPath, filePath);
  } catch (error: unknown) {
    await fs.promises.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Convert a cache key to a fixed-length file name
 */
export function keyToFileName(key: string): string {
  return `${crypto.createHash("sha256").update(key).digest("hex")}.json`;
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
