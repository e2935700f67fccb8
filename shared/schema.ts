import { z } from "zod";

export const DIFFICULTIES = ["easy", "medium", "hard"] as const;
export const MIN_QUESTIONS = 1;
export const MAX_QUESTIONS = 20;

export const difficultySchema = z.enum(DIFFICULTIES);

// Canonical multiple-choice question. Unknown keys are stripped.
export const mcqSchema = z.object({
  question: z.string().refine((value) => value.trim().length > 0, "question must not be blank"),
  options: z.array(z.string()).length(4),
  answer: z.number().int().min(0).max(3),
  explanation: z
    .string()
    .nullish()
    .transform((value) => value ?? ""),
});

export const generateMcqRequestSchema = z.object({
  text: z
    .string({ required_error: "Text cannot be empty", invalid_type_error: "Text cannot be empty" })
    .refine((value) => value.trim().length > 0, "Text cannot be empty"),
  n_questions: z
    .number({ invalid_type_error: "Number of questions must be between 1 and 20" })
    .int("Number of questions must be between 1 and 20")
    .min(MIN_QUESTIONS, "Number of questions must be between 1 and 20")
    .max(MAX_QUESTIONS, "Number of questions must be between 1 and 20")
    .default(5),
  difficulty: z
    .enum(DIFFICULTIES, {
      errorMap: () => ({ message: "Difficulty must be easy, medium, or hard" }),
    })
    .default("medium"),
});

export const evaluateMcqRequestSchema = z.object({
  mcqs: z.array(mcqSchema).min(1, "At least one MCQ is required"),
  answers: z.array(z.union([z.number(), z.string(), z.null()])),
});

export type Difficulty = z.infer<typeof difficultySchema>;
export type MCQ = z.output<typeof mcqSchema>;
export type EvaluateMcqRequest = z.output<typeof evaluateMcqRequestSchema>;

export interface MCQResponse {
  mcqs: MCQ[];
}

export interface DocumentUploadResponse {
  text: string;
  pages: number;
}

export interface ServiceStatusResponse {
  status: "running";
  generation_service_url: string;
  model_name: string;
  extraction_library_name: string;
}

export interface ErrorResponse {
  message: string;
  error?: string;
}
