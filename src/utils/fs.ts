/**
 * File System Utilities
 * Directory listing, idempotent mkdir and non-overwriting moves
 */

import * as fsPromises from "node:fs/promises";
import * as path from "node:path";
import * as crypto from "node:crypto";
import fg from "fast-glob";

/**
 * Options for file discovery
 */
export interface GlobOptions {
  patterns: string[];
  ignore?: string[];
  cwd?: string;
  absolute?: boolean;
  onlyFiles?: boolean;
  /** Directory depth to descend; 1 means immediate children only */
  deep?: number;
}

/**
 * Ensures a directory exists, creating it recursively if needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  try {
    await fsPromises.mkdir(dirPath, { recursive: true });
  } catch (error) {
    // Already there, unless it is not a directory
    if (!isErrnoException(error) || error.code !== "EEXIST" || !(await isDirectory(dirPath))) {
      throw error;
    }
  }
}

/**
 * Check if a path exists (file, directory or dangling symlink)
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fsPromises.lstat(filePath);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

/**
 * Check if a path is an existing directory
 */
export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    const stats = await fsPromises.stat(dirPath);
    return stats.isDirectory();
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return false;
    }
    throw error;
  }
}

/**
 * Find files matching glob patterns
 *
 * @returns Array of matching file paths
 */
export async function findFiles(options: GlobOptions): Promise<string[]> {
  const {
    patterns,
    ignore = [],
    cwd = process.cwd(),
    absolute = true,
    onlyFiles = true,
    deep = Infinity,
  } = options;

  return fg(patterns, {
    cwd,
    absolute,
    onlyFiles,
    deep,
    ignore,
    dot: false, // Don't include dotfiles
    suppressErrors: false,
  });
}

/**
 * Moves a file without ever replacing an existing entry at the destination.
 *
 * @throws NodeJS.ErrnoException with code EEXIST when the destination is taken
 */
export async function moveFileNoOverwrite(source: string, destination: string): Promise<void> {
  if (await pathExists(destination)) {
    const error: NodeJS.ErrnoException = new Error(`Destination already exists: ${destination}`);
    error.code = "EEXIST";
    error.path = destination;
    throw error;
  }
  await fsPromises.rename(source, destination);
}

/**
 * Short content hash, used for stable identifiers
 */
export function calculateContentHash(content: string): string {
  return crypto.createHash("md5").update(content, "utf8").digest("hex");
}

/**
 * Narrow an unknown error to a Node.js system error
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Split a filename into base and extension; dotfiles have no extension
 */
export function splitExtension(fileName: string): { base: string; extension: string } {
  const extension = path.extname(fileName);
  return { base: fileName.slice(0, fileName.length - extension.length), extension };
}
