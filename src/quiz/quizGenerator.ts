import { logger } from '../logger.js';
import type { GenerationService } from '../services/llm/inference.js';
import { chunkText } from './chunker.js';
import { validateMcq } from './mcqValidator.js';
import { buildMcqPrompt, STRICT_JSON_REMINDER } from './prompt.js';
import { extractJsonArray } from './responseParser.js';
import type { MCQ, McqGenerationRequest, McqGenerationSettings } from './quizTypes.js';

export interface McqGeneratorDeps {
  generationService: GenerationService;
  settings: McqGenerationSettings;
}

/**
 * Questions asked of each chunk. Floor division can leave the last chunks
 * with a smaller share than the request needs.
 */
export function questionsPerChunk(nQuestions: number, chunkCount: number, maxPerChunk: number): number {
  return Math.min(maxPerChunk, Math.max(1, Math.floor(nQuestions / chunkCount)));
}

/**
 * Generates up to `nQuestions` MCQs from the text, chunk by chunk. Fewer
 * questions than requested is not an error here; generation service failures
 * abort the whole run.
 */
export async function generateMcqsFromText(
  { text, nQuestions, difficulty }: McqGenerationRequest,
  { generationService, settings }: McqGeneratorDeps
): Promise<MCQ[]> {
  const chunks = chunkText(text, settings.chunkSize);
  const mcqs: MCQ[] = [];
  const perChunk = questionsPerChunk(nQuestions, chunks.length, settings.maxQuestionsPerChunk);

  logger.info(`🧩 Generating ${nQuestions} ${difficulty} MCQs from ${chunks.length} chunk(s), ${perChunk} per chunk`);

  const collect = async (prompt: string, chunkIndex: number): Promise<void> => {
    const reply = await generationService.generate(prompt);
    const candidates = extractJsonArray(reply);
    let accepted = 0;
    for (const candidate of candidates) {
      const mcq = validateMcq(candidate);
      if (mcq && mcqs.length < nQuestions) {
        mcqs.push(mcq);
        accepted++;
      }
    }
    logger.debug(`   chunk ${chunkIndex + 1}: ${candidates.length} candidate(s), ${accepted} accepted`);
  };

  for (const [chunkIndex, chunk] of chunks.entries()) {
    const remaining = nQuestions - mcqs.length;
    if (remaining <= 0) {
      break;
    }

    const prompt = buildMcqPrompt(chunk, Math.min(remaining, perChunk), difficulty);
    await collect(prompt, chunkIndex);

    // One stricter attempt when the first chunk produced nothing usable
    if (chunkIndex === 0 && mcqs.length === 0) {
      logger.warn(`⚠️  No valid MCQs from the first chunk, retrying with a strict JSON reminder`);
      await collect(prompt + STRICT_JSON_REMINDER, chunkIndex);
    }
  }

  logger.info(`✅ Generated ${mcqs.length}/${nQuestions} MCQs`);
  return mcqs;
}
