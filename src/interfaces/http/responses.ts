import { type Context } from "hono";
import { z } from "zod";

export const apiFieldErrorSchema = z.object({
  field: z.string(),
  message: z.string(),
  code: z.string(),
});

export const errorResponseSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.array(apiFieldErrorSchema).optional(),
  }),
});

export type ApiFieldError = z.infer<typeof apiFieldErrorSchema>;
export type ErrorResponse = z.infer<typeof errorResponseSchema>;

export interface ApiResponse<T> {
  data: T;
}

export const ok = <T>(c: Context, data: T, status: 200 | 202 = 200) => {
  const body: ApiResponse<T> = { data };
  return c.json(body, status);
};

const isObject = (value: unknown): value is Record<string, unknown> =>
  value != null && typeof value === "object" && !Array.isArray(value);

const buildErrorPayload = (
  code: string,
  message: string,
  details: ApiFieldError[] = [],
): ErrorResponse => ({
  error: {
    code,
    message,
    ...(details.length > 0 ? { details } : {}),
  },
});

export const parseValidationDetails = (
  issues: readonly unknown[] | undefined,
): ApiFieldError[] => {
  if (!Array.isArray(issues) || issues.length === 0) {
    return [];
  }

  return issues.map((issue: unknown) => {
    if (!isObject(issue)) {
      return {
        field: "body",
        message: String(issue),
        code: "invalid_value",
      };
    }

    const path = Array.isArray(issue.path)
      ? issue.path
          .map((segment: unknown) =>
            isObject(segment) && "key" in segment
              ? String(segment.key)
              : String(segment),
          )
          .join(".")
      : "body";

    return {
      field: path || "body",
      message:
        typeof issue.message === "string" ? issue.message : "Invalid value",
      code: typeof issue.code === "string" ? issue.code : "invalid_value",
    };
  });
};

export const validationError = (
  c: Context,
  message: string,
  details: ApiFieldError[] = [],
) =>
  c.json<ErrorResponse>(
    buildErrorPayload("VALIDATION_ERROR", message, details),
    422,
  );

export const notFound = (c: Context, message: string) =>
  c.json<ErrorResponse>(buildErrorPayload("NOT_FOUND", message), 404);

export const busy = (c: Context, message: string) =>
  c.json<ErrorResponse>(buildErrorPayload("BUSY", message), 409);

export const notConfigured = (c: Context, message: string) =>
  c.json<ErrorResponse>(buildErrorPayload("NOT_CONFIGURED", message), 409);

export const badGateway = (c: Context, message: string) =>
  c.json<ErrorResponse>(buildErrorPayload("UPSTREAM_ERROR", message), 502);

export const serviceUnavailable = (c: Context, message: string) =>
  c.json<ErrorResponse>(buildErrorPayload("STORAGE_UNAVAILABLE", message), 503);

export const internalServerError = (c: Context, message: string) =>
  c.json<ErrorResponse>(buildErrorPayload("INTERNAL_ERROR", message), 500);
