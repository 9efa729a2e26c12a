import type { ErrorCode, FieldErrors } from "../shared/errors.js";

export type PageMeta = {
  page: number;
  per_page: number;
  total: number;
  total_pages: number;
};

export type SuccessEnvelope<T> = {
  success: true;
  data: T;
  meta?: PageMeta;
};

export type ErrorEnvelope = {
  success: false;
  error: string;
  error_code: ErrorCode;
  errors?: string[];
  field_errors?: FieldErrors;
};

export function ok<T>(data: T, meta?: PageMeta): SuccessEnvelope<T> {
  return meta ? { success: true, data, meta } : { success: true, data };
}

export function pageMeta(page: number, perPage: number, total: number): PageMeta {
  return {
    page,
    per_page: perPage,
    total,
    total_pages: Math.ceil(total / perPage),
  };
}
