/**
 * Result of one tagging call. Failures are values, not exceptions:
 * a non-200 answer becomes an empty tag list and a transport failure
 * becomes the error variant, which is later shown inline in the prompt.
 */

import type { Category } from "./category.js";

export interface Tag {
  label: string;
  score?: number;
}

export type TagResult =
  | { kind: "tags"; tags: Tag[] }
  | { kind: "opaque"; text: string }
  | { kind: "error"; message: string };

export const ANALYSIS_ERROR_PREFIX = "Analysis error: ";

export function emptyTags(): TagResult {
  return { kind: "tags", tags: [] };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled tag result: ${JSON.stringify(value)}`);
}

/**
 * Text substituted into the prompt's analysis slot.
 * Medical prompts get the bare labels; other categories see the tag list as JSON.
 */
export function toAnalysisText(category: Category, result: TagResult): string {
  switch (result.kind) {
    case "tags":
      return category === "Medical"
        ? result.tags.map(tag => tag.label).join(", ")
        : JSON.stringify(result.tags);
    case "opaque":
      return result.text;
    case "error":
      return `${ANALYSIS_ERROR_PREFIX}${result.message}`;
    default:
      return assertNever(result);
  }
}
