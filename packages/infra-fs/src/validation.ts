import { CatalogFormatError } from "@shellmsg/application";
import { formatSchemaIssues } from "@shellmsg/contracts";
import type { ZodTypeAny } from "zod";

export function parseOrThrowFormatError<TSchema extends ZodTypeAny>(
  schema: TSchema,
  input: unknown,
  source: string,
): TSchema["_output"] {
  const parsed = schema.safeParse(input);

  if (!parsed.success) {
    const details = formatSchemaIssues(parsed.error.issues, "catalog");
    throw new CatalogFormatError(`${source}: invalid catalog - ${details}`, {
      source,
    });
  }

  return parsed.data;
}
