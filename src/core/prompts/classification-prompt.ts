/**
 * Prompts for Filename Classification
 *
 * Renders one batch of filenames into a single completion request.
 *
 * @module
 */

import type { Batch, ClassificationRequest } from "../../types/index.js";
import type { SorterConfig } from "../../utils/validation.js";
import { TAXONOMY } from "../classification/models/classification.js";

// =============================================================================
// System Prompt
// =============================================================================

/**
 * Instructions shared by every batch
 */
export const CLASSIFICATION_SYSTEM_PROMPT = `You sort files into folders using only their filenames.

Assign every filename below exactly ONE category from this list:
${TAXONOMY.join(", ")}

Rules:
1. Decide mainly by file extension and type (.mp3/.flac -> Music, .jpg/.png -> Images, .zip/.7z -> Archives).
2. Do NOT translate Japanese, Chinese or other foreign-language filenames. Classify them by their file type.
3. Use the filename EXACTLY as given as the key, character for character.
4. If nothing fits, use "Other".

Return ONLY one JSON object that maps each filename to its category.
No explanations, no markdown, no code fences.`;

const EXAMPLE_OUTPUT = `{"song.mp3": "Music", "photo.jpg": "Images", "invoice.pdf": "Documents"}`;

// =============================================================================
// Builders
// =============================================================================

/**
 * Render the prompt text for one batch.
 * Filenames are embedded as a JSON array; JSON.stringify leaves non-ASCII
 * characters untouched, so every name appears byte-identical.
 */
export function buildClassificationPrompt(batch: Batch): string {
  const fileNames = batch.entries.map((entry) => entry.fileName);

  const parts: string[] = [];
  parts.push(CLASSIFICATION_SYSTEM_PROMPT);
  parts.push("");
  parts.push(`Filenames (${fileNames.length}):`);
  parts.push(JSON.stringify(fileNames));
  parts.push("");
  parts.push(`Example output: ${EXAMPLE_OUTPUT}`);

  return parts.join("\n");
}

/**
 * Build the immutable request for one batch
 */
export function buildClassificationRequest(
  batch: Batch,
  config: Pick<SorterConfig, "model" | "apiUrl">
): ClassificationRequest {
  return Object.freeze({
    batchId: batch.id,
    prompt: buildClassificationPrompt(batch),
    model: config.model,
    apiUrl: config.apiUrl,
  });
}
