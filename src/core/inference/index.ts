/**
 * Inference Module
 *
 * Talks to the local completion endpoint.
 *
 * @module
 */

export * from "./interfaces/IInferenceClient.js";

export {
  OllamaInferenceClient,
  createInferenceClient,
  type OllamaInferenceClientConfig,
  type OllamaGenerateRequest,
} from "./impl/OllamaInferenceClient.js";
