import { createLogger } from "@vision-assistant/shared/logger";
import { z } from "zod";
import type { AppConfig } from "../../../../config/app-config.js";
import { createTimeoutFetch } from "../../../../shared/infrastructure/timeout-fetch.js";
import type { TagExtractor } from "../../domain/ports.js";
import { emptyTags, type TagResult } from "../../domain/tag-result.js";

const logger = createLogger("server");

export const tagListSchema = z.array(
  z.object({
    label: z.string(),
    score: z.number().optional(),
  })
);

function parseBody(body: string): TagResult {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return { kind: "opaque", text: body };
  }

  const tags = tagListSchema.safeParse(json);
  if (tags.success) {
    return { kind: "tags", tags: tags.data };
  }

  return { kind: "opaque", text: JSON.stringify(json) };
}

/**
 * Image classification over a Hugging Face style inference endpoint:
 * raw image bytes in, `[{ label, score }]` out.
 */
export class HfTagExtractor implements TagExtractor {
  private readonly fetch: typeof fetch;

  constructor(
    private readonly settings: AppConfig["tagging"],
    baseFetch: typeof fetch = globalThis.fetch
  ) {
    this.fetch = createTimeoutFetch(settings.timeoutMs, baseFetch);
  }

  async extract(image: Uint8Array, modelId: string): Promise<TagResult> {
    const url = `${this.settings.baseUrl}${modelId}`;

    try {
      const response = await this.fetch(url, {
        method: "POST",
        headers: { Authorization: `Bearer ${this.settings.token}` },
        body: image.slice(),
      });

      if (response.status !== 200) {
        logger.warn("Tagging endpoint returned no tags", {
          module: "tagging",
          modelId,
          status: response.status,
        });
        return emptyTags();
      }

      const result = parseBody(await response.text());
      logger.debug("Tagging finished", {
        module: "tagging",
        modelId,
        kind: result.kind,
        tagCount: result.kind === "tags" ? result.tags.length : undefined,
      });
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn("Tagging request failed", { module: "tagging", modelId, reason: message });
      return { kind: "error", message };
    }
  }
}
