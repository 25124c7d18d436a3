/**
 * Prompts Module
 *
 * @module
 */

export {
  CLASSIFICATION_SYSTEM_PROMPT,
  buildClassificationPrompt,
  buildClassificationRequest,
} from "./classification-prompt.js";
