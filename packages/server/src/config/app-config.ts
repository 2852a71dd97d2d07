/**
 * Process configuration, read once at startup and passed into every component.
 */

import { z } from "zod";

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const requiredString = z.string().trim().min(1, "is required");

export const appEnvSchema = z.object({
  GROQ_API_KEY: requiredString,
  HF_API_URL: requiredString.url("must be a URL"),
  HF_TOKEN: requiredString,
  MEDICAL_MODEL: requiredString,
  GENERAL_MODEL: requiredString,
  PRODUCT_MODEL: requiredString,
  LLM_MODEL: requiredString.default("llama-3.3-70b-specdec"),
  TAGGING_TIMEOUT_MS: positiveInt(30_000),
  GENERATION_TIMEOUT_MS: positiveInt(60_000),
  MAX_UPLOAD_BYTES: positiveInt(10 * 1024 * 1024),
  PORT: z.coerce.number().int().min(0).max(65_535).default(8501),
});

export interface AppConfig {
  readonly port: number;
  readonly maxUploadBytes: number;
  readonly tagging: {
    readonly baseUrl: string;
    readonly token: string;
    readonly timeoutMs: number;
  };
  readonly taggingModels: {
    readonly medical: string;
    readonly general: string;
    readonly product: string;
  };
  readonly generation: {
    readonly apiKey: string;
    readonly model: string;
    readonly temperature: number;
    readonly timeoutMs: number;
  };
}

export class ConfigError extends Error {
  readonly code = "CONFIG_ERROR" as const;

  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
  }
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const nested of Object.values(value)) {
    if (nested && typeof nested === "object") {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

/**
 * Empty strings count as unset so optional values fall back to their defaults.
 */
function withoutBlankValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const entries = Object.entries(env).filter(
    (entry): entry is [string, string] => typeof entry[1] === "string" && entry[1].trim() !== ""
  );
  return Object.fromEntries(entries);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = appEnvSchema.safeParse(withoutBlankValues(env));

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join(".")} ${issue.message}`)
    );
  }

  const values = parsed.data;

  return deepFreeze({
    port: values.PORT,
    maxUploadBytes: values.MAX_UPLOAD_BYTES,
    tagging: {
      baseUrl: values.HF_API_URL,
      token: values.HF_TOKEN,
      timeoutMs: values.TAGGING_TIMEOUT_MS,
    },
    taggingModels: {
      medical: values.MEDICAL_MODEL,
      general: values.GENERAL_MODEL,
      product: values.PRODUCT_MODEL,
    },
    generation: {
      apiKey: values.GROQ_API_KEY,
      model: values.LLM_MODEL,
      temperature: 0.3,
      timeoutMs: values.GENERATION_TIMEOUT_MS,
    },
  });
}
