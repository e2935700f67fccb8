import 'dotenv/config';
import { z } from "zod";

// Environment variable validation and type safety
export const env = {
  // Application
  NODE_ENV: process.env.NODE_ENV || 'development',
  PORT: parseInt(process.env.PORT || '8000', 10),

  // Security
  CORS_ORIGIN: process.env.CORS_ORIGIN || '*',

  // Ollama
  OLLAMA_BASE_URL: process.env.OLLAMA_BASE_URL || 'http://localhost:11434',
  OLLAMA_MODEL: process.env.OLLAMA_MODEL || 'llama3.2', // llama2, mistral, gemma, ...
  OLLAMA_TEMPERATURE: parseFloat(process.env.OLLAMA_TEMPERATURE || '0.3'), // 0.0 - 1.0, lower is more focused
  OLLAMA_TIMEOUT_MS: parseInt(process.env.OLLAMA_TIMEOUT_MS || '120000', 10), // 2 minutes default

  // Text processing
  MAX_CHUNK_SIZE: parseInt(process.env.MAX_CHUNK_SIZE || '2500', 10), // approximate tokens per chunk (1 token ≈ 4 chars)
  MAX_QUESTIONS_PER_CHUNK: parseInt(process.env.MAX_QUESTIONS_PER_CHUNK || '5', 10),

  // File Upload
  MAX_FILE_SIZE: parseInt(process.env.MAX_FILE_SIZE || '10485760', 10), // 10MB default

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
} as const;

// Type definitions for environment variables
export type Environment = typeof env;

const configSchema = z.object({
  port: z.number().int().min(1).max(65535),
  corsOrigin: z.string().min(1),
  generation: z.object({
    baseUrl: z.string().url(),
    model: z.string().min(1),
    temperature: z.number().min(0).max(1),
    timeoutMs: z.number().int().positive(),
  }),
  chunkSize: z.number().int().positive(),
  maxQuestionsPerChunk: z.number().int().positive(),
  maxFileSize: z.number().int().positive(),
});

export type AppConfig = Readonly<z.infer<typeof configSchema>>;
export type GenerationConfig = AppConfig['generation'];

/**
 * Builds the process-wide configuration from environment variables.
 * Throws a ZodError when a value is missing its expected shape.
 */
export function loadConfig(source: Environment = env): AppConfig {
  return Object.freeze(
    configSchema.parse({
      port: source.PORT,
      corsOrigin: source.CORS_ORIGIN,
      generation: {
        baseUrl: source.OLLAMA_BASE_URL.replace(/\/+$/, ''),
        model: source.OLLAMA_MODEL,
        temperature: source.OLLAMA_TEMPERATURE,
        timeoutMs: source.OLLAMA_TIMEOUT_MS,
      },
      chunkSize: source.MAX_CHUNK_SIZE,
      maxQuestionsPerChunk: source.MAX_QUESTIONS_PER_CHUNK,
      maxFileSize: source.MAX_FILE_SIZE,
    })
  );
}

// Validation function for environment variables, run once on startup
export function validateEnv(source: Environment = env): AppConfig {
  try {
    return loadConfig(source);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('Invalid environment variables:');
      for (const issue of error.issues) {
        console.error(`  ${issue.path.join('.')}: ${issue.message}`);
      }
      console.error('Please check your .env file and ensure all variables are set correctly.');
      process.exit(1);
    }
    throw error;
  }
}
