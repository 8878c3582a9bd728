import type { RequestHandler } from "express";
import type { ZodTypeAny } from "zod";

type RequestLocation = "body" | "query" | "params";

type ValidationSchemas = Partial<Record<RequestLocation, ZodTypeAny>>;

export interface ValidationIssue {
  location: RequestLocation;
  path: string;
  message: string;
}

const LOCATIONS: RequestLocation[] = ["body", "query", "params"];

/**
 * Parses each configured request part in place. Issues from every part are reported together
 * as a 400 before the handler runs.
 */
export const validate = (schemas: ValidationSchemas): RequestHandler => {
  return (req, res, next) => {
    const issues: ValidationIssue[] = [];

    for (const location of LOCATIONS) {
      const schema = schemas[location];
      if (!schema) {
        continue;
      }

      const parsed = schema.safeParse(req[location]);
      if (!parsed.success) {
        issues.push(
          ...parsed.error.issues.map((issue) => ({
            location,
            path: issue.path.join("."),
            message: issue.message
          }))
        );
        continue;
      }

      if (location === "body") {
        req.body = parsed.data;
      } else if (location === "query") {
        req.query = parsed.data;
      } else {
        req.params = parsed.data;
      }
    }

    if (issues.length > 0) {
      res.status(400).json({ error: "Validation failed", details: issues });
      return;
    }
    next();
  };
};
