import type { Category } from "../../domain/category.js";

export type PromptTemplate = (analysis: string, query: string) => string;

const medicalTemplate: PromptTemplate = (tags, query) =>
  [
    `As a medical assistant, analyze these image tags: ${tags}`,
    `For this question: ${query}`,
    "",
    "Provide:",
    "1. 3 possible conditions matching these symptoms",
    "2. Recommended diagnostic tests",
    "3. Urgency level (Emergency/Urgent/Routine)",
    "4. Clear disclaimer",
    "",
    "Format: Concise bullet points in plain text",
  ].join("\n");

const productTemplate: PromptTemplate = (analysis, query) =>
  [
    `Analyze product features: ${analysis}`,
    `For query: ${query}`,
    "",
    "Provide:",
    "1. Product identification",
    "2. Price estimate range (USD)",
    "3. 3 fictional purchase options",
    "4. Alternative suggestions",
    "",
    "Format: Simple text with line breaks",
  ].join("\n");

const generalTemplate: PromptTemplate = (analysis, query) =>
  [
    `Analyze image description: ${analysis}`,
    `For question: ${query}`,
    "",
    "Provide:",
    "1. Direct answer",
    "2. 3 relevant facts",
    "3. Related information",
    "",
    "Format: Short paragraphs in plain text",
  ].join("\n");

export const PROMPT_TEMPLATES: Record<Category, PromptTemplate> = {
  Medical: medicalTemplate,
  Product: productTemplate,
  General: generalTemplate,
};

export function composePrompt(category: Category, analysis: string, query: string): string {
  return PROMPT_TEMPLATES[category](analysis, query);
}
