import type { ZodError, ZodIssue } from 'zod';

/** A requirement diagram relationship names a node the diagram does not hold. */
export class MissingNodeError extends Error {
  constructor(public readonly nodeName: string) {
    super(`${nodeName} isn't found in the list of elements or requirements`);
  }
}

export class DefinitionError extends Error {
  public readonly issues: ZodIssue[];

  constructor(
    public readonly subject: string,
    error: ZodError,
  ) {
    super(`Invalid ${subject}: ${error.message}`);
    this.issues = error.issues;
  }
}
