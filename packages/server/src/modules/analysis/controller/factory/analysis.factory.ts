import type { AppConfig } from "../../../../config/app-config.js";
import { AnalysisOrchestrator } from "../../application/usecases/submit-analysis.usecase.js";
import { GroqResponseGenerator } from "../../infrastructure/generation/groq-response-generator.js";
import { HfTagExtractor } from "../../infrastructure/tagging/hf-tag-extractor.js";

export function buildAnalysisOrchestrator(
  config: AppConfig,
  baseFetch: typeof fetch = globalThis.fetch
): AnalysisOrchestrator {
  return new AnalysisOrchestrator({
    tagExtractor: new HfTagExtractor(config.tagging, baseFetch),
    responseGenerator: new GroqResponseGenerator(config.generation, baseFetch),
    taggingModels: config.taggingModels,
  });
}
