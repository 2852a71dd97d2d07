import { vi, type Mock } from "vitest";
import { z } from "zod";
import { loadConfig, type AppConfig } from "../../src/config/app-config.js";

export const TAGGING_BASE_URL = "https://tagging.test/models/";
export const GROQ_CHAT_URL = "https://api.groq.com/openai/v1/chat/completions";

export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({
    GROQ_API_KEY: "test-groq-key",
    HF_API_URL: TAGGING_BASE_URL,
    HF_TOKEN: "test-hf-token",
    MEDICAL_MODEL: "org/medical-model",
    GENERAL_MODEL: "org/general-model",
    PRODUCT_MODEL: "org/product-model",
    ...overrides,
  });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

export function groqCompletion(content: string): Response {
  return jsonResponse({
    id: "chatcmpl-test",
    object: "chat.completion",
    created: 1_700_000_000,
    model: "llama-3.3-70b-specdec",
    choices: [{ index: 0, message: { role: "assistant", content }, finish_reason: "stop" }],
    usage: { prompt_tokens: 12, completion_tokens: 6, total_tokens: 18 },
  });
}

export function groqFailure(message: string, status = 500): Response {
  return jsonResponse({ error: { message, type: "server_error" } }, status);
}

export type FakeFetch = Mock<typeof fetch>;

/**
 * In-process stand-in for both upstreams, routed by URL.
 */
export function fakeUpstreams(handlers: {
  tagging: () => Response | Promise<Response>;
  generation: () => Response | Promise<Response>;
}): FakeFetch {
  return vi.fn<typeof fetch>(async input => {
    const url = input instanceof Request ? input.url : String(input);
    if (url.startsWith(TAGGING_BASE_URL)) {
      return handlers.tagging();
    }
    if (url === GROQ_CHAT_URL) {
      return handlers.generation();
    }
    throw new Error(`Unexpected request to ${url}`);
  });
}

const chatRequestSchema = z.object({
  messages: z.array(z.object({ content: z.unknown() })),
});

/**
 * Text of the chat completion request sent upstream, if any
 */
export function sentPrompt(fetchMock: FakeFetch): string | undefined {
  const call = fetchMock.mock.calls.find(([input]) => String(input) === GROQ_CHAT_URL);
  if (!call) return undefined;

  const { messages } = chatRequestSchema.parse(JSON.parse(String(call[1]?.body)));
  const content = messages[0]?.content;
  return typeof content === "string" ? content : JSON.stringify(content);
}

export function pngFile(name = "bike.png"): File {
  return new File([new Uint8Array([0x89, 0x50, 0x4e, 0x47])], name, { type: "image/png" });
}
