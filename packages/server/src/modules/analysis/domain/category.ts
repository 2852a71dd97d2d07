import type { AppConfig } from "../../../config/app-config.js";

export const CATEGORIES = ["General", "Medical", "Product"] as const;

export type Category = (typeof CATEGORIES)[number];

const DISCLAIMERS: Record<Category, string> = {
  Medical: "⚠️ This is not medical advice - Consult a doctor for diagnosis",
  Product: "ℹ️ Price estimates are approximate",
  General: "",
};

export function disclaimerFor(category: Category): string {
  return DISCLAIMERS[category];
}

/**
 * Tagging model id configured for a category
 */
export function taggingModelFor(category: Category, models: AppConfig["taggingModels"]): string {
  switch (category) {
    case "Medical":
      return models.medical;
    case "Product":
      return models.product;
    case "General":
      return models.general;
  }
}

/** Sidebar copy: what each category is meant for. */
export const CATEGORY_GUIDE: ReadonlyArray<{ category: Category; examples: string }> = [
  { category: "General", examples: "Landscapes, objects, animals" },
  { category: "Medical", examples: "Skin conditions, X-rays, scans" },
  { category: "Product", examples: "Consumer goods, electronics, clothing" },
];
