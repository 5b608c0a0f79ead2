/**
 * Schema validation failures.
 */

import { SelectorError, SelectorErrorCodes } from "@textmark/core";
import type { z } from "zod";

export function formatValidationError(issues: readonly z.ZodIssue[]): string {
  return issues
    .map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

/** A serialized record or shorthand value was rejected before reaching the core */
export class SchemaValidationError extends SelectorError {
  readonly issues: readonly z.ZodIssue[];

  constructor(
    what: string,
    issues: readonly z.ZodIssue[],
    code: SelectorErrorCodes = SelectorErrorCodes.SCHEMA_INVALID
  ) {
    super(code, `Invalid ${what}: ${formatValidationError(issues)}`, {
      context: { what, issueCount: issues.length },
    });
    this.name = "SchemaValidationError";
    this.issues = issues;
  }
}
