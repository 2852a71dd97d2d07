import { html, raw } from "hono/html";
import { CATEGORIES, CATEGORY_GUIDE, type Category } from "../../domain/category.js";
import type { ImagePayload, SubmissionOutcome } from "../../domain/submission.js";

export interface AnalysisPageView {
  category: Category;
  query: string;
  image?: ImagePayload;
  outcome?: SubmissionOutcome;
  /** Form problem shown in place of a result */
  error?: string;
}

const STYLES = `
  body { margin: 0; font-family: system-ui, sans-serif; color: #1f2933; display: flex; }
  aside { width: 18rem; min-height: 100vh; padding: 1.5rem; background: #f0f2f6; box-sizing: border-box; }
  main { flex: 1; padding: 2rem 3rem; max-width: 60rem; }
  form { display: grid; gap: 0.75rem; margin-bottom: 1.5rem; }
  label { font-weight: 600; }
  input, select, button { font: inherit; padding: 0.5rem; }
  button { width: fit-content; cursor: pointer; }
  figure { margin: 0 0 1.5rem; }
  figure img { max-width: 100%; border-radius: 0.5rem; }
  .result { white-space: pre-wrap; line-height: 1.5; }
  .warning { padding: 0.75rem 1rem; border-radius: 0.5rem; background: #fffbe6; color: #7a5c00; }
  .error { padding: 0.75rem 1rem; border-radius: 0.5rem; background: #ffecec; color: #a11; }
`;

export function imageDataUrl(image: ImagePayload): string {
  return `data:${image.contentType};base64,${Buffer.from(image.bytes).toString("base64")}`;
}

function renderSidebar() {
  return html`<aside>
    <h2>Category Guide</h2>
    <ul>
      ${CATEGORY_GUIDE.map(
        entry => html`<li><strong>${entry.category}</strong>: ${entry.examples}</li>`
      )}
    </ul>
    <h2>How It Works</h2>
    <ol>
      <li>Select image type</li>
      <li>Upload image</li>
      <li>Ask your question</li>
      <li>Get AI-powered analysis</li>
    </ol>
  </aside>`;
}

function renderForm(view: AnalysisPageView) {
  return html`<form method="post" action="/" enctype="multipart/form-data">
    <label for="category">Select Analysis Type:</label>
    <select id="category" name="category">
      ${CATEGORIES.map(
        category =>
          html`<option value="${category}" ${category === view.category ? "selected" : ""}>
            ${category}
          </option>`
      )}
    </select>
    <label for="image">Choose an image...</label>
    <input id="image" name="image" type="file" accept=".jpg,.jpeg,.png,image/jpeg,image/png" />
    <label for="query">Ask about the image:</label>
    <input id="query" name="query" type="text" value="${view.query}" />
    <button type="submit">Analyze</button>
  </form>`;
}

function renderOutcome(view: AnalysisPageView) {
  if (view.error) {
    return html`<p class="error" role="alert">${view.error}</p>`;
  }

  const outcome = view.outcome;
  if (!outcome || outcome.status === "idle") {
    return "";
  }

  const figure = view.image
    ? html`<figure>
        <img src="${imageDataUrl(view.image)}" alt="Uploaded Image" />
        <figcaption>Uploaded Image</figcaption>
      </figure>`
    : "";

  if (outcome.status === "failed") {
    return html`${figure}<p class="error" role="alert">${outcome.message}</p>`;
  }

  const { report } = outcome;
  return html`${figure}
    <section>
      <h2>Analysis Results</h2>
      <div class="result">${report.text}</div>
      ${report.disclaimer ? html`<p class="warning" role="note">${report.disclaimer}</p>` : ""}
    </section>`;
}

export function renderAnalysisPage(view: AnalysisPageView) {
  return html`<!doctype html>
    <html lang="en">
      <head>
        <meta charset="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>AI Vision Assistant</title>
        <style>
          ${raw(STYLES)}
        </style>
      </head>
      <body>
        ${renderSidebar()}
        <main>
          <h1>🖼️ AI Vision Assistant</h1>
          <h3>Upload Image + Select Analysis Type</h3>
          ${renderForm(view)}
          ${renderOutcome(view)}
        </main>
      </body>
    </html>`;
}
