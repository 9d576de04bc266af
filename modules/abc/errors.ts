import type { ZodError } from "zod";

export class AbcFlowParameterError extends Error {
  readonly code = "invalid_parameter";
  issues: string[];
  constructor(message: string, issues: string[] = [message]) {
    super(message);
    this.issues = issues;
    this.name = "AbcFlowParameterError";
  }

  static fromZod(error: ZodError): AbcFlowParameterError {
    const issues = error.issues.map((issue) =>
      issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    );
    return new AbcFlowParameterError(`invalid ABC flow parameters: ${issues.join("; ")}`, issues);
  }
}

export class AbcFlowIoError extends Error {
  readonly code = "io_failure";
  path: string;
  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.path = path;
    this.name = "AbcFlowIoError";
  }
}

const describeCause = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/** Runs an fs operation, rethrowing any failure as an AbcFlowIoError for `target`. */
export const withIoContext = async <T>(
  action: string,
  target: string,
  op: () => Promise<T>,
): Promise<T> => {
  try {
    return await op();
  } catch (error) {
    throw new AbcFlowIoError(`${action} ${target} failed: ${describeCause(error)}`, target, {
      cause: error,
    });
  }
};
