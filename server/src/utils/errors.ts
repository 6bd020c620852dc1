export type DomainErrorCode = "INVALID_INPUT" | "INVALID_SEED";

/** Raised by the analytics engine and the seed loader; `errorHandler` maps it to a response. */
export class DomainError extends Error {
  readonly code: DomainErrorCode;
  readonly details?: unknown;

  constructor(code: DomainErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = "DomainError";
    this.code = code;
    this.details = details;
  }
}
