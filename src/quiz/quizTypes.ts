import type { Difficulty, EvaluateMcqRequest, MCQ } from '../../shared/schema.js';

export type { Difficulty, MCQ };

/** Decoded but unvalidated item from a model reply. */
export type CandidateRecord = unknown;

export interface McqGenerationRequest {
  text: string;
  nQuestions: number;
  difficulty: Difficulty;
}

export interface McqGenerationSettings {
  chunkSize: number;
  maxQuestionsPerChunk: number;
}

export type UserAnswer = number | string | null;

export type QuizEvaluationRequest = EvaluateMcqRequest;

export interface QuizEvaluationResult {
  question: string;
  userAnswer: UserAnswer;
  isCorrect: boolean;
  correctAnswer: number;
  explanation: string;
}

export interface QuizEvaluationResponse {
  total: number;
  correct: number;
  percentage: number;
  results: QuizEvaluationResult[];
}
