import type { ZodIssue } from "zod";

export function formatSchemaIssues(
  issues: readonly ZodIssue[],
  rootLabel = "payload",
): string {
  return issues
    .map((issue) => {
      const field =
        issue.path.length > 0
          ? issue.path.map((part) => String(part)).join(".")
          : rootLabel;
      return `${field}: ${issue.message}`;
    })
    .join("; ");
}
