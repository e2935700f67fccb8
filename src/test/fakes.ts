import type { AppConfig } from "../env.js";
import type { TextExtractor } from "../features/upload/textExtractor.js";
import type { GenerationService } from "../services/llm/inference.js";

type ScriptedReply = string | Error;

/**
 * Generation service that answers prompts from a script, in order.
 * Once the script runs out every further call gets `fallback`.
 */
export class FakeGenerationService implements GenerationService {
  readonly name = "fake";
  readonly baseUrl = "http://generation.test";
  readonly model = "test-model";
  readonly prompts: string[] = [];

  constructor(
    private readonly script: ScriptedReply[] = [],
    private readonly fallback: ScriptedReply = "[]"
  ) {}

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const reply = this.script.shift() ?? this.fallback;
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}

export class FakeTextExtractor implements TextExtractor {
  readonly name = "fake-extractor";
  readonly received: Buffer[] = [];

  constructor(private readonly result: string | Error) {}

  async extractText(buffer: Buffer): Promise<string> {
    this.received.push(buffer);
    if (this.result instanceof Error) {
      throw this.result;
    }
    return this.result;
  }
}

export function makeMcq(index: number) {
  return {
    question: `Question ${index}?`,
    options: [`A${index}`, `B${index}`, `C${index}`, `D${index}`],
    answer: index % 4,
    explanation: `Because ${index}`,
  };
}

export function mcqArray(count: number, start = 1): string {
  return JSON.stringify(Array.from({ length: count }, (_, i) => makeMcq(start + i)));
}

export const testConfig: AppConfig = {
  port: 0,
  corsOrigin: "*",
  generation: {
    baseUrl: "http://generation.test",
    model: "test-model",
    temperature: 0.3,
    timeoutMs: 1000,
  },
  chunkSize: 2500,
  maxQuestionsPerChunk: 5,
  maxFileSize: 1024,
};
