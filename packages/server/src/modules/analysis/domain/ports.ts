import type { TagResult } from "./tag-result.js";

export interface TagExtractor {
  /** Never rejects: failures come back as TagResult variants */
  extract(image: Uint8Array, modelId: string): Promise<TagResult>;
}

export interface ResponseGenerator {
  generate(prompt: string): Promise<string>;
}
