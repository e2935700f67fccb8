import type { Express, RequestHandler } from "express";
import multer from "multer";
import type { ZodError } from "zod";
import {
  evaluateMcqRequestSchema,
  generateMcqRequestSchema,
  type MCQResponse,
  type ServiceStatusResponse,
} from "../shared/schema.js";
import type { AppConfig } from "./env.js";
import { GenerationExhaustedError, ValidationError } from "./errors.js";
import { DocumentProcessor, isSupportedDocument } from "./features/upload/documentProcessor.js";
import { evaluateMcqs, generateMcqsFromText } from "./quiz/index.js";
import type { GenerationService } from "./services/llm/inference.js";

export interface RouteDependencies {
  config: AppConfig;
  documentProcessor: DocumentProcessor;
  generationService: GenerationService;
}

function firstIssue(error: ZodError): string {
  const issue = error.issues[0];
  return issue ? issue.message : "Invalid request";
}

export function registerRoutes(
  app: Express,
  { config, documentProcessor, generationService }: RouteDependencies
): void {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.maxFileSize },
    fileFilter: (_req, file, cb) => {
      if (isSupportedDocument(file.originalname)) {
        cb(null, true);
      } else {
        cb(new ValidationError("Only PDF files are supported"));
      }
    },
  });

  // Service status
  app.get("/", (_req, res) => {
    const status: ServiceStatusResponse = {
      status: "running",
      generation_service_url: generationService.baseUrl,
      model_name: generationService.model,
      extraction_library_name: documentProcessor.extractorName,
    };
    res.json(status);
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "OK", timestamp: new Date().toISOString() });
  });

  // Upload a PDF and extract its text
  const uploadDocument: RequestHandler = async (req, res, next) => {
    try {
      if (!req.file) {
        throw new ValidationError("No file uploaded");
      }
      const result = await documentProcessor.processDocument({
        originalName: req.file.originalname,
        buffer: req.file.buffer,
      });
      res.json(result);
    } catch (error) {
      next(error);
    }
  };

  app.post("/upload_document", upload.single("file"), uploadDocument);
  app.post("/upload_pdf", upload.single("file"), uploadDocument);

  // Generate multiple-choice questions from text
  app.post("/generate_mcq", async (req, res, next) => {
    try {
      const parsed = generateMcqRequestSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        throw new ValidationError(firstIssue(parsed.error));
      }
      const { text, n_questions, difficulty } = parsed.data;

      const mcqs = await generateMcqsFromText(
        { text, nQuestions: n_questions, difficulty },
        {
          generationService,
          settings: {
            chunkSize: config.chunkSize,
            maxQuestionsPerChunk: config.maxQuestionsPerChunk,
          },
        }
      );

      if (mcqs.length === 0) {
        throw new GenerationExhaustedError();
      }

      const response: MCQResponse = { mcqs };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  // Score answers against a set of MCQs
  app.post("/evaluate_mcq", (req, res, next) => {
    try {
      const parsed = evaluateMcqRequestSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        throw new ValidationError(firstIssue(parsed.error));
      }
      res.json(evaluateMcqs(parsed.data));
    } catch (error) {
      next(error);
    }
  });
}
