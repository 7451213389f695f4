export interface ErrorSummary {
  message: string;
  code: string;
  details?: unknown;
}

export interface BuildErrorSummaryInput {
  message: string;
  code: string;
  details?: unknown;
}

export function buildErrorSummary(input: BuildErrorSummaryInput): ErrorSummary {
  return {
    message: input.message,
    code: input.code,
    ...(input.details !== undefined ? { details: input.details } : {}),
  };
}

export function summarizeUnknownError(error: unknown): ErrorSummary {
  if (error instanceof Error) {
    return buildErrorSummary({
      message: error.message,
      code:
        "code" in error && typeof error.code === "string"
          ? error.code
          : "INTERNAL_ERROR",
    });
  }

  return buildErrorSummary({
    message: String(error),
    code: "INTERNAL_ERROR",
  });
}
