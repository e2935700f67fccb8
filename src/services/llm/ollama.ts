import axios, { type AxiosInstance } from "axios";
import type { GenerationConfig } from "../../env.js";
import {
  errorMessage,
  GenerationServiceError,
  GenerationTimeoutError,
  ServiceUnavailableError,
  UnknownClientError,
} from "../../errors.js";
import type { GenerationService } from "./inference.js";

interface OllamaGenerateRequest {
  model: string;
  prompt: string;
  stream: false;
  options: {
    temperature: number;
  };
}

interface OllamaGenerateResponse {
  response?: unknown;
}

function isGenerateResponse(data: unknown): data is OllamaGenerateResponse {
  return typeof data === "object" && data !== null && !Array.isArray(data);
}

const UNREACHABLE_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
]);

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT"]);

function stringifyBody(data: unknown): string {
  if (typeof data === "string") return data;
  try {
    return JSON.stringify(data) ?? "";
  } catch {
    return String(data);
  }
}

/**
 * Maps a failed request to the generation error taxonomy.
 */
export function toGenerationError(error: unknown): Error {
  if (!axios.isAxiosError(error)) {
    return new UnknownClientError(`Ollama error: ${errorMessage(error)}`, { cause: error });
  }

  if (error.response) {
    return new GenerationServiceError(error.response.status, stringifyBody(error.response.data));
  }

  const code = error.code ?? "";
  if (TIMEOUT_CODES.has(code)) {
    return new GenerationTimeoutError(
      "Ollama request timed out. Try with shorter text or fewer questions.",
      { cause: error }
    );
  }
  if (UNREACHABLE_CODES.has(code)) {
    return new ServiceUnavailableError(
      "Cannot connect to Ollama. Make sure Ollama is running (ollama serve)",
      { cause: error }
    );
  }

  return new UnknownClientError(`Ollama error: ${error.message}`, { cause: error });
}

/**
 * Client for a locally hosted Ollama server's non-streaming generate endpoint.
 * One call per prompt, no retries.
 */
export class OllamaGenerationService implements GenerationService {
  readonly name = "ollama";
  private readonly http: AxiosInstance;

  constructor(private readonly config: GenerationConfig) {
    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      // Ollama runs locally; never route it through HTTP(S)_PROXY
      proxy: false,
      headers: { "Content-Type": "application/json" },
    });
  }

  get baseUrl(): string {
    return this.config.baseUrl;
  }

  get model(): string {
    return this.config.model;
  }

  async generate(prompt: string): Promise<string> {
    const body: OllamaGenerateRequest = {
      model: this.config.model,
      prompt,
      stream: false,
      options: {
        temperature: this.config.temperature,
      },
    };

    let data: unknown;
    try {
      ({ data } = await this.http.post<unknown>("/api/generate", body));
    } catch (error) {
      throw toGenerationError(error);
    }

    // axios leaves a body that is not JSON as the raw string
    if (!isGenerateResponse(data)) {
      throw new UnknownClientError("Ollama error: invalid JSON in generation response");
    }
    return typeof data.response === "string" ? data.response : "";
  }
}
