import { createGroq } from "@ai-sdk/groq";
import { createLogger } from "@vision-assistant/shared/logger";
import { generateText, type LanguageModel } from "ai";
import type { AppConfig } from "../../../../config/app-config.js";
import { createTimeoutFetch } from "../../../../shared/infrastructure/timeout-fetch.js";
import type { ResponseGenerator } from "../../domain/ports.js";

const logger = createLogger("server");

/**
 * Single-shot completion through the AI SDK. Failures are not caught here;
 * the orchestrator decides what a failed generation means.
 */
export class GroqResponseGenerator implements ResponseGenerator {
  private readonly model: LanguageModel;

  constructor(
    private readonly settings: AppConfig["generation"],
    baseFetch: typeof fetch = globalThis.fetch
  ) {
    const groq = createGroq({
      apiKey: settings.apiKey,
      fetch: createTimeoutFetch(settings.timeoutMs, baseFetch),
    });
    this.model = groq(settings.model);
  }

  async generate(prompt: string): Promise<string> {
    const start = Date.now();
    const { text } = await generateText({
      model: this.model,
      prompt,
      temperature: this.settings.temperature,
      maxRetries: 0,
    });

    logger.debug("Generation finished", {
      module: "generation",
      model: this.settings.model,
      duration: Date.now() - start,
    });

    return text;
  }
}
