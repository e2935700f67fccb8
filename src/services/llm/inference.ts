import type { GenerationConfig } from "../../env.js";
import { OllamaGenerationService } from "./ollama.js";

/**
 * Text generation backend. Implementations return the raw reply for a
 * fully rendered prompt or throw one of the generation errors.
 */
export interface GenerationService {
  readonly name: string;
  readonly baseUrl: string;
  readonly model: string;
  generate(prompt: string): Promise<string>;
}

export function createGenerationService(config: GenerationConfig): GenerationService {
  return new OllamaGenerationService(config);
}
