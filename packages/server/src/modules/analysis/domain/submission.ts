import type { Category } from "./category.js";

export const ACCEPTED_IMAGE_TYPES = ["image/jpeg", "image/png"] as const;

export type ImageContentType = (typeof ACCEPTED_IMAGE_TYPES)[number];

export interface ImagePayload {
  bytes: Uint8Array;
  contentType: ImageContentType;
  fileName?: string;
}

export interface SubmissionInput {
  category: Category;
  image?: ImagePayload;
  query?: string;
}

export interface AnalysisReport {
  category: Category;
  text: string;
  /** Empty when the category carries no disclaimer */
  disclaimer: string;
}

export type SubmissionState =
  | "idle"
  | "validating"
  | "extracting"
  | "composing"
  | "generating"
  | "displaying"
  | "failed";

export type SubmissionOutcome =
  | { status: "idle" }
  | { status: "displayed"; report: AnalysisReport }
  | { status: "failed"; message: string };

export const GENERIC_FAILURE_MESSAGE = "Analysis failed. Please try again.";

export function isImageContentType(value: string): value is ImageContentType {
  return ACCEPTED_IMAGE_TYPES.some(type => type === value);
}
