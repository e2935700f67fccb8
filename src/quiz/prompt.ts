import type { Difficulty } from './quizTypes.js';

/** Characters (code points) of a chunk that are placed in the prompt. */
export const PROMPT_TEXT_LIMIT = 3000;

export const STRICT_JSON_REMINDER = '\n\nIMPORTANT: Return ONLY valid JSON array, nothing else.';

export function buildMcqPrompt(text: string, nQuestions: number, difficulty: Difficulty): string {
  return `You are an expert educator creating multiple-choice questions.

Given the following text, generate ${nQuestions} multiple-choice questions at ${difficulty} difficulty level.

TEXT:
${Array.from(text).slice(0, PROMPT_TEXT_LIMIT).join('')}

REQUIREMENTS:
- Generate exactly ${nQuestions} questions
- Difficulty: ${difficulty}
- Each question must have exactly 4 options (A, B, C, D)
- One option must be correct
- Include a brief explanation for the correct answer

OUTPUT FORMAT (CRITICAL - MUST BE VALID JSON):
Return ONLY a JSON array with this exact structure, no other text:
[
  {
    "question": "Question text here?",
    "options": ["Option A", "Option B", "Option C", "Option D"],
    "answer": 0,
    "explanation": "Brief explanation of why this is correct"
  }
]

The "answer" field must be the zero-based index (0-3) of the correct option.
Return ONLY the JSON array, no markdown, no code blocks, no additional text.`;
}
