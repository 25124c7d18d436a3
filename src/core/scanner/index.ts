/**
 * Scanner Module
 *
 * Discovers the files to classify.
 *
 * @module
 */

export { scanDirectory, createFileEntry } from "./scanner.js";
