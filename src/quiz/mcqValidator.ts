import { mcqSchema } from '../../shared/schema.js';
import type { CandidateRecord, MCQ } from './quizTypes.js';

/**
 * Converts a candidate record into an MCQ, or returns null when it does not
 * have exactly four string options and an answer index between 0 and 3.
 * A missing explanation becomes an empty string.
 *
 * JSON.parse yields the same number for `2` and `2.0`, so an integral float
 * answer in the reply is accepted as that index.
 */
export function validateMcq(candidate: CandidateRecord): MCQ | null {
  const result = mcqSchema.safeParse(candidate);
  return result.success ? result.data : null;
}
