import { z } from "zod";
import { CATEGORIES, type Category } from "../../domain/category.js";
import { isImageContentType, type SubmissionInput } from "../../domain/submission.js";

export const analysisFormSchema = z.object({
  category: z.enum(CATEGORIES).default("General"),
  query: z.string().optional(),
  image: z
    .instanceof(File)
    .optional()
    .refine(file => !file || file.size === 0 || isImageContentType(file.type), {
      message: "Only JPEG and PNG images are accepted",
    }),
});

export type AnalysisForm = z.infer<typeof analysisFormSchema>;

/**
 * Values to put back into the form when the submission itself was rejected.
 * An unknown category falls back to the default selection.
 */
export function echoFormValues(body: Record<string, unknown>): { category: Category; query: string } {
  const category = analysisFormSchema.shape.category.safeParse(body.category);
  return {
    category: category.success ? category.data : "General",
    query: typeof body.query === "string" ? body.query : "",
  };
}

/**
 * Browsers send an empty file part when nothing was picked; that counts as no image.
 */
export async function toSubmissionInput(form: AnalysisForm): Promise<SubmissionInput> {
  const { category, query, image } = form;

  if (!image || image.size === 0 || !isImageContentType(image.type)) {
    return { category, query };
  }

  return {
    category,
    query,
    image: {
      bytes: new Uint8Array(await image.arrayBuffer()),
      contentType: image.type,
      fileName: image.name || undefined,
    },
  };
}
