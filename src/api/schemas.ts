import { z } from "zod";

export const documentQueryRequestShape = {
  documents: z
    .string()
    .url()
    .describe("http(s) URL of a .pdf or .docx document"),
  questions: z
    .array(z.string().trim().min(1))
    .min(1)
    .max(50)
    .describe("Questions to answer, in order"),
};

export const documentQueryRequestSchema = z.object(documentQueryRequestShape);
