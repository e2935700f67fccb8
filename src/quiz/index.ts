export * from './quizTypes.js';
export { chunkText } from './chunker.js';
export { extractJsonArray } from './responseParser.js';
export { validateMcq } from './mcqValidator.js';
export { generateMcqsFromText } from './quizGenerator.js';
export { evaluateMcqs } from './quizEvaluator.js';
