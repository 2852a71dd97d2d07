import { describe, expect, it, vi } from "vitest";
import { GroqResponseGenerator } from "../generation/groq-response-generator.js";

const settings = {
  apiKey: "test-groq-key",
  model: "llama-3.3-70b-specdec",
  temperature: 0.3,
  timeoutMs: 60_000,
};

function completion(content: string): Response {
  return new Response(
    JSON.stringify({
      id: "chatcmpl-test",
      object: "chat.completion",
      created: 1_700_000_000,
      model: "llama-3.3-70b-specdec",
      choices: [
        {
          index: 0,
          message: { role: "assistant", content },
          finish_reason: "stop",
        },
      ],
      usage: { prompt_tokens: 12, completion_tokens: 6, total_tokens: 18 },
    }),
    { status: 200, headers: { "content-type": "application/json" } }
  );
}

describe("GroqResponseGenerator", () => {
  it("returns the completion text unchanged", async () => {
    const baseFetch = vi.fn<typeof fetch>(async () => completion("  A red bicycle.\n"));
    const generator = new GroqResponseGenerator(settings, baseFetch);

    await expect(generator.generate("What is this?")).resolves.toBe("  A red bicycle.\n");
  });

  it("sends one chat completion with the fixed model and temperature", async () => {
    const baseFetch = vi.fn<typeof fetch>(async () => completion("ok"));
    const generator = new GroqResponseGenerator(settings, baseFetch);

    await generator.generate("Analyze image description: []");

    expect(baseFetch).toHaveBeenCalledTimes(1);
    const [input, init] = baseFetch.mock.calls[0] ?? [];
    expect(String(input)).toBe("https://api.groq.com/openai/v1/chat/completions");
    expect(new Headers(init?.headers).get("authorization")).toBe("Bearer test-groq-key");

    const body = JSON.parse(String(init?.body));
    expect(body.model).toBe("llama-3.3-70b-specdec");
    expect(body.temperature).toBe(0.3);
    expect(body.messages).toHaveLength(1);
    expect(body.messages[0].role).toBe("user");
  });

  it("propagates provider failures without retrying", async () => {
    const baseFetch = vi.fn<typeof fetch>(
      async () =>
        new Response(
          JSON.stringify({ error: { message: "model overloaded", type: "server_error" } }),
          { status: 500, headers: { "content-type": "application/json" } }
        )
    );
    const generator = new GroqResponseGenerator(settings, baseFetch);

    await expect(generator.generate("What is this?")).rejects.toThrow("model overloaded");
    expect(baseFetch).toHaveBeenCalledTimes(1);
  });
});
