/**
 * File Scanner
 *
 * Lists the files sitting directly in the target directory. Category folders
 * (and files that share their names) are left out so sorted files are never
 * picked up twice.
 *
 * @module
 */

import * as path from "node:path";
import type { FileEntry } from "../../types/index.js";
import type { SorterConfig } from "../../utils/validation.js";
import { findFiles, isDirectory } from "../../utils/fs.js";
import { createLogger } from "../../utils/logger.js";
import { ErrorCode, FileSystemError, errorMessage } from "../errors.js";
import { isCategoryName } from "../classification/models/classification.js";

const logger = createLogger("scanner");

/**
 * Build an immutable entry for a file name inside `targetDir`
 */
export function createFileEntry(targetDir: string, fileName: string): FileEntry {
  return Object.freeze({
    path: path.join(targetDir, fileName),
    fileName,
    extension: path.extname(fileName).toLowerCase(),
  });
}

/**
 * Code-unit order, so batch ids do not depend on the host locale
 */
export function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Scans the target directory for files to classify.
 *
 * Hidden files, directories, and names equal to a category label are
 * skipped. Entries come back sorted by name.
 *
 * @throws FileSystemError when the directory is missing or unreadable
 *
 * @example
 * ```typescript
 * const entries = await scanDirectory(config);
 * console.log(`Found ${entries.length} files`);
 * ```
 */
export async function scanDirectory(config: Pick<SorterConfig, "targetDir">): Promise<FileEntry[]> {
  const { targetDir } = config;
  const startTime = Date.now();

  let names: string[];
  try {
    if (!(await isDirectory(targetDir))) {
      throw new FileSystemError(
        `Target directory does not exist or is not a directory: ${targetDir}`,
        ErrorCode.FS_NOT_A_DIRECTORY,
        { filePath: targetDir }
      );
    }

    names = await findFiles({
      patterns: ["*"],
      cwd: targetDir,
      absolute: false,
      onlyFiles: true,
      deep: 1,
    });
  } catch (error) {
    if (error instanceof FileSystemError) throw error;
    throw new FileSystemError(
      `Failed to read directory ${targetDir}: ${errorMessage(error)}`,
      ErrorCode.FS_SCAN_FAILED,
      { filePath: targetDir }
    );
  }

  const entries = names
    .filter((name) => !name.startsWith(".") && !isCategoryName(name))
    .sort(compareNames)
    .map((name) => createFileEntry(targetDir, name));

  logger.debug(
    { targetDir, found: names.length, eligible: entries.length, durationMs: Date.now() - startTime },
    "Scanned target directory"
  );

  return entries;
}
