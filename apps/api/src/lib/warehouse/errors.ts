import type { DimensionName } from "./schema";

export class InvalidFilterError extends Error {
  code: "invalid_filter";
  status: number;
  field: string | null;

  constructor(message: string, field: string | null = null) {
    super(message);
    this.name = "InvalidFilterError";
    this.code = "invalid_filter";
    this.status = 400;
    this.field = field;
  }
}

export type BackendQueryErrorCode = "query_failed" | "timeout" | "connection_unavailable";

export class BackendQueryError extends Error {
  code: BackendQueryErrorCode;
  status: number;
  backend: string;

  constructor(
    message: string,
    options: { backend: string; code?: BackendQueryErrorCode; cause?: unknown }
  ) {
    super(message, { cause: options.cause });
    this.name = "BackendQueryError";
    this.code = options.code ?? "query_failed";
    this.status = this.code === "timeout" ? 504 : 502;
    this.backend = options.backend;
  }
}

export class UnsupportedPlanError extends Error {
  code: "unsupported_plan";
  status: number;
  template: string;

  constructor(template: string, reason: string) {
    super(`Plan "${template}" cannot be emulated: ${reason}`);
    this.name = "UnsupportedPlanError";
    this.code = "unsupported_plan";
    this.status = 501;
    this.template = template;
  }
}

/**
 * A dimension lookup inside the emulated executor failed and was read as "no matches".
 * Attached to the result instead of thrown: the number is possibly wrong, not definitely zero.
 */
export type DegradedLookupWarning = {
  code: "degraded_lookup";
  dimension: DimensionName;
  table: string;
  message: string;
};

export const isInvalidFilterError = (value: unknown): value is InvalidFilterError => {
  return value instanceof InvalidFilterError;
};

export const isBackendQueryError = (value: unknown): value is BackendQueryError => {
  return value instanceof BackendQueryError;
};

export const isUnsupportedPlanError = (value: unknown): value is UnsupportedPlanError => {
  return value instanceof UnsupportedPlanError;
};

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }

  if (error && typeof error === "object" && "message" in error && typeof error.message === "string") {
    return error.message;
  }

  return String(error);
};
