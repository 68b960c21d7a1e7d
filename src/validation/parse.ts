// validation/parse.ts
import { z } from "zod";
import { EmptyUpdateError, ValidationError } from "../util/errors";

/** Drops top-level nulls so they read as "not provided". */
const withoutNulls = (payload: unknown): unknown => {
  if (typeof payload !== "object" || payload === null || Array.isArray(payload)) {
    return payload;
  }
  return Object.fromEntries(Object.entries(payload).filter(([, value]) => value !== null));
};

const toValidationError = (error: z.ZodError): ValidationError => {
  const issue = error.issues[0];
  const field = issue.path.join(".");
  return field
    ? new ValidationError(`${field}: ${issue.message}`, field)
    : new ValidationError(issue.message);
};

export function parsePayload<S extends z.ZodTypeAny>(schema: S, payload: unknown): z.output<S> {
  const result = schema.safeParse(withoutNulls(payload));
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Parses a partial update. Only the fields present are validated; a payload
 * with no recognized field is rejected before anything else happens.
 */
export function parseUpdate<S extends z.AnyZodObject>(schema: S, payload: unknown): z.output<S> {
  const data = parsePayload(schema, payload ?? {});
  if (Object.values(data).every((value) => value === undefined)) {
    throw new EmptyUpdateError();
  }
  return data;
}
