import type { CommandResult } from "@shellmsg/contracts";

import { AppError, InternalError } from "./errors.js";

export function toCommandErrorResult(error: unknown): CommandResult {
  const appError = error instanceof AppError ? error : new InternalError();

  return {
    stdout: "",
    stderr: `${appError.message}\n`,
    exitStatus: appError.exitStatus,
  };
}
