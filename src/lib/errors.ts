/**
 * Error classes for caller bugs. Sparse or missing evidence is never an
 * error; these are raised only when an invocation breaks the contract.
 */
import type { ZodError } from "zod";
import { fromError } from "zod-validation-error";

export class ScoringContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ScoringContractError";
  }
}

/** A record carried a negative or non-finite fact, or was not an object at all. */
export class EvidenceRecordError extends ScoringContractError {
  constructor(
    message: string,
    readonly path: string,
  ) {
    super(message);
    this.name = "EvidenceRecordError";
  }

  static fromZod(path: string, error: ZodError): EvidenceRecordError {
    const validationError = fromError(error, { prefix: `Invalid evidence at ${path}` });
    return new EvidenceRecordError(validationError.toString(), path);
  }
}

export class ScoringConfigError extends ScoringContractError {
  constructor(message: string) {
    super(message);
    this.name = "ScoringConfigError";
  }

  static fromZod(error: ZodError): ScoringConfigError {
    return new ScoringConfigError(fromError(error, { prefix: "Invalid scoring config" }).toString());
  }
}
