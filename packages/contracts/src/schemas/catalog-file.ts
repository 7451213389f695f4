import { z } from "zod";

import { nonEmptyStringSchema } from "./common.js";

export const jsonCatalogFileSchema = z
  .object({
    language: nonEmptyStringSchema.optional(),
    messages: z.record(z.string(), z.string()),
  })
  .strict();

export type JsonCatalogFile = z.infer<typeof jsonCatalogFileSchema>;
