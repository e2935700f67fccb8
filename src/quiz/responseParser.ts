import type { CandidateRecord } from './quizTypes.js';

/**
 * One way of recovering a JSON array from a model reply.
 * Returns null when the strategy does not apply.
 */
export type ExtractionStrategy = (text: string) => CandidateRecord[] | null;

function parseArray(source: string): CandidateRecord[] | null {
  try {
    const data: unknown = JSON.parse(source);
    return Array.isArray(data) ? data : null;
  } catch {
    return null;
  }
}

export const parseWholeReply: ExtractionStrategy = (text) => parseArray(text);

const FENCED_ARRAY = /```(?:json)?\s*(\[[\s\S]*?\])\s*```/;

export const parseFencedBlock: ExtractionStrategy = (text) => {
  const match = FENCED_ARRAY.exec(text);
  return match?.[1] !== undefined ? parseArray(match[1]) : null;
};

// Greedy: spans from the first '[' to the last ']'
const BRACKETED_ARRAY = /\[[\s\S]*\]/;

export const parseBracketedSpan: ExtractionStrategy = (text) => {
  const match = BRACKETED_ARRAY.exec(text);
  return match ? parseArray(match[0]) : null;
};

export const EXTRACTION_STRATEGIES: readonly ExtractionStrategy[] = [
  parseWholeReply,
  parseFencedBlock,
  parseBracketedSpan,
];

/**
 * Recovers the candidate records from a free-text model reply. Strategies run
 * in order and the first one producing an array wins; when none does the
 * result is empty.
 */
export function extractJsonArray(
  text: string,
  strategies: readonly ExtractionStrategy[] = EXTRACTION_STRATEGIES
): CandidateRecord[] {
  for (const strategy of strategies) {
    const records = strategy(text);
    if (records !== null) {
      return records;
    }
  }
  return [];
}
