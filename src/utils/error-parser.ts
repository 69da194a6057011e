import { ZodError } from "zod";

/**
 * Digs into an error object to find the most useful, specific error message.
 * Schema failures get every issue with its path, not just zod's summary.
 *
 * @param error The error object, which could be anything.
 * @returns A user-friendly string with the best error message we could find.
 */
export function getGroundedError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues
      .map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join(".")}: ${issue.message}`
          : issue.message,
      )
      .join("; ");
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

/**
 * Q: When is a failure "indeterminate" rather than a fault?
 * A: When the work didn't finish but nothing told us why: the operation was
 *    aborted, or whatever rejected didn't bother to reject with an Error.
 *    Those get a generic message instead of a fault message.
 */
export function isIndeterminate(error: unknown): boolean {
  if (error instanceof Error) {
    return error.name === "AbortError";
  }
  return true;
}
