import { NextFunction, Request, Response } from "express";
import { ZodError, ZodTypeAny } from "zod";
import { formatIssues } from "./httpError";

type RequestSchema = {
  body?: ZodTypeAny;
  params?: ZodTypeAny;
  query?: ZodTypeAny;
};

/**
 * Rejects a request whose body, params or query fail their schema. Only the
 * body is replaced with the parsed value; controllers parse params and query
 * again to get them typed.
 */
export function validateRequest(schema: RequestSchema) {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      if (schema.body) {
        req.body = schema.body.parse(req.body ?? {});
      }
      if (schema.params) {
        schema.params.parse(req.params ?? {});
      }
      if (schema.query) {
        schema.query.parse(req.query ?? {});
      }
      return next();
    } catch (error) {
      if (error instanceof ZodError) {
        return res.status(400).json({
          message: "Validation failed.",
          errors: formatIssues(error)
        });
      }
      return next(error);
    }
  };
}
