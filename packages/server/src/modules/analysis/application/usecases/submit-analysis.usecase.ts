import { createLogger } from "@vision-assistant/shared/logger";
import type { AppConfig } from "../../../../config/app-config.js";
import { disclaimerFor, taggingModelFor, type Category } from "../../domain/category.js";
import type { ResponseGenerator, TagExtractor } from "../../domain/ports.js";
import {
  GENERIC_FAILURE_MESSAGE,
  type ImagePayload,
  type SubmissionInput,
  type SubmissionOutcome,
  type SubmissionState,
} from "../../domain/submission.js";
import { toAnalysisText } from "../../domain/tag-result.js";
import { composePrompt } from "../prompts/templates.js";

const logger = createLogger("server");

export interface TransitionEvent {
  from: SubmissionState;
  to: SubmissionState;
  category: Category;
}

export interface AnalysisOrchestratorDeps {
  tagExtractor: TagExtractor;
  responseGenerator: ResponseGenerator;
  taggingModels: AppConfig["taggingModels"];
  onTransition?: (event: TransitionEvent) => void;
}

export interface SubmitOptions {
  requestId?: string;
}

interface ReadySubmission {
  category: Category;
  image: ImagePayload;
  query: string;
}

function readySubmission(input: SubmissionInput): ReadySubmission | null {
  const { image, query } = input;
  if (!image || image.bytes.byteLength === 0 || !query?.trim()) {
    return null;
  }
  return { category: input.category, image, query };
}

/**
 * Runs one submission: idle → validating → extracting → composing →
 * generating → displaying, or failed from any step.
 *
 * Tagging never fails the submission (its problems show up inside the
 * prompt); a generation error does, and is reported as one generic message.
 */
export class AnalysisOrchestrator {
  constructor(private readonly deps: AnalysisOrchestratorDeps) {}

  async submit(input: SubmissionInput, options: SubmitOptions = {}): Promise<SubmissionOutcome> {
    const ready = readySubmission(input);
    if (!ready) {
      return { status: "idle" };
    }

    const { category, image, query } = ready;
    const log = logger.child({ module: "analysis", requestId: options.requestId, category });
    let state: SubmissionState = "idle";
    const moveTo = (next: SubmissionState) => {
      log.debug(`Submission ${state} -> ${next}`);
      this.deps.onTransition?.({ from: state, to: next, category });
      state = next;
    };

    try {
      moveTo("validating");
      const modelId = taggingModelFor(category, this.deps.taggingModels);
      moveTo("extracting");
      const tags = await this.deps.tagExtractor.extract(image.bytes, modelId);

      moveTo("composing");
      const prompt = composePrompt(category, toAnalysisText(category, tags), query);

      moveTo("generating");
      const text = await this.deps.responseGenerator.generate(prompt);

      moveTo("displaying");
      log.info("Submission completed", { tagResult: tags.kind });
      return {
        status: "displayed",
        report: { category, text, disclaimer: disclaimerFor(category) },
      };
    } catch (error) {
      const failedIn = state;
      moveTo("failed");
      log.error(
        `Submission failed while ${failedIn}`,
        error instanceof Error ? error : new Error(String(error))
      );
      return { status: "failed", message: GENERIC_FAILURE_MESSAGE };
    }
  }
}
