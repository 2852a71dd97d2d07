import { describe, expect, it } from "vitest";
import {
  fakeUpstreams,
  groqCompletion,
  groqFailure,
  jsonResponse,
  pngFile,
  sentPrompt,
  testConfig,
} from "../../../../../tests/helpers/fake-upstreams.js";
import { createApp } from "../../../../app/app.js";
import { errorResponseSchema } from "../../../../shared/controller/schemas/common.js";
import { buildAnalysisOrchestrator } from "../factory/analysis.factory.js";

function appWith(fetchMock: ReturnType<typeof fakeUpstreams>, overrides: Record<string, string> = {}) {
  const config = testConfig(overrides);
  return createApp({ config, orchestrator: buildAnalysisOrchestrator(config, fetchMock) });
}

function submission(fields: { category?: string; query?: string; image?: File }): FormData {
  const form = new FormData();
  if (fields.category) form.append("category", fields.category);
  if (fields.query !== undefined) form.append("query", fields.query);
  if (fields.image) form.append("image", fields.image);
  return form;
}

describe("POST /api/analyze", () => {
  it("answers a general question from opaque analysis", async () => {
    const fetchMock = fakeUpstreams({
      tagging: () => jsonResponse({ description: "a red bicycle" }),
      generation: () => groqCompletion("It is a red bicycle."),
    });
    const app = appWith(fetchMock);

    const res = await app.request("/api/analyze", {
      method: "POST",
      body: submission({ category: "General", query: "What is this?", image: pngFile() }),
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: "displayed",
      report: { category: "General", text: "It is a red bicycle.", disclaimer: "" },
    });
    expect(String(fetchMock.mock.calls[0]?.[0])).toBe(
      "https://tagging.test/models/org/general-model"
    );
    const prompt = sentPrompt(fetchMock);
    expect(prompt).toContain('Analyze image description: {"description":"a red bicycle"}');
    expect(prompt).toContain("For question: What is this?");
  });

  it("joins unscored medical labels and returns the completion as written", async () => {
    const fetchMock = fakeUpstreams({
      tagging: () => jsonResponse([{ label: "rash" }, { label: "mole" }]),
      generation: () => groqCompletion("  Likely benign.\n"),
    });
    const app = appWith(fetchMock);

    const res = await app.request("/api/analyze", {
      method: "POST",
      body: submission({ category: "Medical", query: "Should I worry?", image: pngFile() }),
    });

    expect(await res.json()).toEqual({
      status: "displayed",
      report: {
        category: "Medical",
        text: "  Likely benign.\n",
        disclaimer: "⚠️ This is not medical advice - Consult a doctor for diagnosis",
      },
    });
    expect(sentPrompt(fetchMock)?.split("\n")[0]).toBe(
      "As a medical assistant, analyze these image tags: rash, mole"
    );
  });

  it("reaches generation when tagging answers 503", async () => {
    const fetchMock = fakeUpstreams({
      tagging: () => jsonResponse({ error: "Model is loading" }, 503),
      generation: () => groqCompletion("Looks like a skin irritation."),
    });
    const app = appWith(fetchMock);

    const res = await app.request("/api/analyze", {
      method: "POST",
      body: submission({ category: "Medical", query: "What is this rash?", image: pngFile() }),
    });

    expect(await res.json()).toEqual({
      status: "displayed",
      report: {
        category: "Medical",
        text: "Looks like a skin irritation.",
        disclaimer: "⚠️ This is not medical advice - Consult a doctor for diagnosis",
      },
    });
    expect(sentPrompt(fetchMock)?.split("\n")[0]).toBe(
      "As a medical assistant, analyze these image tags: "
    );
  });

  it("embeds tagging transport errors in the prompt", async () => {
    const fetchMock = fakeUpstreams({
      tagging: () => {
        throw new Error("getaddrinfo ENOTFOUND tagging.test");
      },
      generation: () => groqCompletion("I could not see the image."),
    });
    const app = appWith(fetchMock);

    const res = await app.request("/api/analyze", {
      method: "POST",
      body: submission({ category: "Product", query: "How much?", image: pngFile() }),
    });

    expect(await res.json()).toMatchObject({ status: "displayed" });
    expect(sentPrompt(fetchMock)?.split("\n")[0]).toBe(
      "Analyze product features: Analysis error: getaddrinfo ENOTFOUND tagging.test"
    );
  });

  it("reports generation failures generically", async () => {
    const fetchMock = fakeUpstreams({
      tagging: () => jsonResponse([{ label: "bicycle", score: 0.98 }]),
      generation: () => groqFailure("model overloaded"),
    });
    const app = appWith(fetchMock);

    const res = await app.request("/api/analyze", {
      method: "POST",
      body: submission({ category: "General", query: "What is this?", image: pngFile() }),
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: "failed",
      message: "Analysis failed. Please try again.",
    });
  });

  it("does nothing without a query", async () => {
    const fetchMock = fakeUpstreams({
      tagging: () => jsonResponse([]),
      generation: () => groqCompletion("unused"),
    });
    const app = appWith(fetchMock);

    const res = await app.request("/api/analyze", {
      method: "POST",
      body: submission({ category: "General", image: pngFile() }),
    });

    expect(await res.json()).toEqual({ status: "idle" });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("rejects unknown categories", async () => {
    const app = appWith(
      fakeUpstreams({ tagging: () => jsonResponse([]), generation: () => groqCompletion("") })
    );

    const res = await app.request("/api/analyze", {
      method: "POST",
      body: submission({ category: "Legal", query: "What is this?", image: pngFile() }),
    });

    expect(res.status).toBe(400);
    const body = errorResponseSchema.parse(await res.json());
    expect(body.error.code).toBe("VALIDATION_ERROR");
    expect(body.error.message).toBe("Invalid category");
  });

  it("rejects images that are not JPEG or PNG", async () => {
    const app = appWith(
      fakeUpstreams({ tagging: () => jsonResponse([]), generation: () => groqCompletion("") })
    );
    const gif = new File([new Uint8Array([0x47, 0x49, 0x46])], "anim.gif", { type: "image/gif" });

    const res = await app.request("/api/analyze", {
      method: "POST",
      body: submission({ category: "General", query: "What is this?", image: gif }),
    });

    expect(res.status).toBe(400);
    const body = errorResponseSchema.parse(await res.json());
    expect(body.error.message).toBe("Invalid image");
    expect(body.error.details).toEqual([
      { path: "image", message: "Only JPEG and PNG images are accepted" },
    ]);
  });

  it("rejects uploads over the size limit", async () => {
    const fetchMock = fakeUpstreams({
      tagging: () => jsonResponse([]),
      generation: () => groqCompletion(""),
    });
    const app = appWith(fetchMock, { MAX_UPLOAD_BYTES: "64" });
    const big = new File([new Uint8Array(512)], "big.png", { type: "image/png" });

    const res = await app.request("/api/analyze", {
      method: "POST",
      body: submission({ category: "General", query: "What is this?", image: big }),
    });

    expect(res.status).toBe(413);
    const body = errorResponseSchema.parse(await res.json());
    expect(body.error.code).toBe("PAYLOAD_TOO_LARGE");
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
