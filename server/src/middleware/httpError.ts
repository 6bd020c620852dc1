import { NextFunction, Request, Response } from "express";
import { ZodError } from "zod";
import { DomainError, DomainErrorCode } from "../utils/errors";

export class HttpError extends Error {
  status: number;
  details?: unknown;

  constructor(status: number, message: string, details?: unknown) {
    super(message);
    this.status = status;
    this.details = details;
  }
}

export type FormattedIssue = {
  path: string;
  message: string;
};

export function formatIssues(error: ZodError): FormattedIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message
  }));
}

/** A record failed its schema when it was built. */
export class RecordValidationError extends HttpError {
  constructor(kind: string, issues: FormattedIssue[]) {
    super(400, `Invalid ${kind} record.`, issues);
    this.name = "RecordValidationError";
  }
}

export class InvalidConfigError extends HttpError {
  constructor(message: string, details?: unknown) {
    super(400, message, details);
    this.name = "InvalidConfigError";
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(404, message);
    this.name = "NotFoundError";
  }
}

const DOMAIN_ERROR_STATUS: Record<DomainErrorCode, number> = {
  INVALID_INPUT: 400,
  INVALID_SEED: 400
};

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof ZodError) {
    return res.status(400).json({
      message: "Validation failed.",
      errors: formatIssues(err)
    });
  }
  if (err instanceof DomainError) {
    return res.status(DOMAIN_ERROR_STATUS[err.code]).json({
      message: err.message,
      error: { code: err.code, message: err.message, details: err.details }
    });
  }
  const status = err instanceof HttpError && Number.isInteger(err.status) ? err.status : 500;
  const message = err instanceof Error && err.message ? err.message : "Unexpected error";
  const body = {
    message,
    error: {
      code: status === 500 ? "INTERNAL_ERROR" : "REQUEST_ERROR",
      message,
      details: err instanceof HttpError ? err.details : undefined
    }
  };
  if (status === 500) {
    // eslint-disable-next-line no-console
    console.error(err);
  }
  res.status(status).json(body);
}
