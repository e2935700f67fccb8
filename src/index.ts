import 'dotenv/config';
import { createApp } from "./app.js";
import { validateEnv } from "./env.js";
import { DocumentProcessor } from "./features/upload/documentProcessor.js";
import { PdfTextExtractor } from "./features/upload/textExtractor.js";
import { logger } from "./logger.js";
import { createGenerationService } from "./services/llm/inference.js";

// Validate environment variables on startup
const config = validateEnv();

const generationService = createGenerationService(config.generation);
const documentProcessor = new DocumentProcessor(new PdfTextExtractor());

const app = createApp({ config, documentProcessor, generationService });

app.listen(config.port, () => {
  logger.info(`🚀 MCQ generator running on port ${config.port}`);
  logger.info(`🤖 Using ${generationService.name} model "${generationService.model}" at ${generationService.baseUrl}`);
  logger.info(`📄 PDF extraction via ${documentProcessor.extractorName}`);
});

export default app;
