import type {
  MCQ,
  QuizEvaluationRequest,
  QuizEvaluationResponse,
  QuizEvaluationResult,
  UserAnswer,
} from './quizTypes.js';

function isCorrectAnswer(mcq: MCQ, userAnswer: UserAnswer): boolean {
  if (typeof userAnswer === 'number') {
    return userAnswer === mcq.answer;
  }
  if (typeof userAnswer === 'string') {
    const expected = mcq.options[mcq.answer];
    return expected !== undefined && userAnswer.trim().toLowerCase() === expected.trim().toLowerCase();
  }
  return false;
}

export function evaluateMcqs({ mcqs, answers }: QuizEvaluationRequest): QuizEvaluationResponse {
  let correct = 0;
  const total = mcqs.length;
  const results: QuizEvaluationResult[] = mcqs.map((mcq, i) => {
    // Unanswered questions count as wrong
    const userAnswer = answers[i] ?? null;
    const isCorrect = isCorrectAnswer(mcq, userAnswer);
    if (isCorrect) correct++;
    return {
      question: mcq.question,
      userAnswer,
      isCorrect,
      correctAnswer: mcq.answer,
      explanation: mcq.explanation,
    };
  });
  const percentage = total > 0 ? Math.round((correct / total) * 100) : 0;
  return {
    total,
    correct,
    percentage,
    results,
  };
}
