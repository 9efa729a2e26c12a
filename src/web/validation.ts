import { z } from "zod";

import type { FieldErrors } from "../shared/errors.js";

import { UUID_RE } from "../platform/request-context.js";
import { MalformedRequestError, NotFoundError, ValidationFailedError } from "../shared/errors.js";

function fieldErrorsOf(error: z.ZodError): FieldErrors {
  const fieldErrors: FieldErrors = {};
  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? issue.path.join(".") : "base";
    (fieldErrors[field] ??= []).push(issue.message);
  }
  return fieldErrors;
}

export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.output<T> {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    throw new ValidationFailedError(fieldErrorsOf(result.error));
  }
  return result.data;
}

export function parseQuery<T extends z.ZodTypeAny>(schema: T, query: unknown): z.output<T> {
  const result = schema.safeParse(query ?? {});
  if (!result.success) {
    const errors = result.error.issues.map((issue) => `${issue.path.join(".") || "query"}: ${issue.message}`);
    throw new MalformedRequestError("Invalid query parameters", errors);
  }
  return result.data;
}

export function parseId(value: string, label: string): string {
  if (!UUID_RE.test(value)) {
    throw new NotFoundError(`${label} not found`);
  }
  return value.toLowerCase();
}

const booleanFlag = z
  .enum(["true", "false"])
  .default("false")
  .transform((value) => value === "true");

const optionalSearch = z
  .string()
  .trim()
  .max(255)
  .optional()
  .transform((value) => (value ? value : undefined));

const paging = {
  page: z.coerce.number().int().min(1).default(1),
  per_page: z.coerce.number().int().min(1).max(100).default(25),
  sort_order: z.enum(["asc", "desc"]).default("asc"),
  search: optionalSearch,
};

export const entityListQuerySchema = z.object({
  ...paging,
  sort_by: z.enum(["name", "created_at", "updated_at"]).default("created_at"),
  include_deleted: booleanFlag,
});

export const memberListQuerySchema = z.object({
  ...paging,
  sort_by: z.enum(["identity_id", "role", "created_at"]).default("created_at"),
});

export const showQuerySchema = z.object({
  include_deleted: booleanFlag,
});

export const deleteQuerySchema = z.object({
  hard: booleanFlag,
});

export function toEntityFilter(query: z.output<typeof entityListQuerySchema>) {
  return {
    page: query.page,
    perPage: query.per_page,
    sortBy: query.sort_by,
    sortOrder: query.sort_order,
    search: query.search,
    includeDeleted: query.include_deleted,
  };
}

export function toMemberFilter(query: z.output<typeof memberListQuerySchema>) {
  return {
    page: query.page,
    perPage: query.per_page,
    sortBy: query.sort_by,
    sortOrder: query.sort_order,
    search: query.search,
  };
}
