import { type Context } from "hono";
import {
  ConfigError,
  NotConfiguredError,
  StorageError,
  TransportError,
  ValidationError,
} from "#/application/errors";
import {
  badGateway,
  notConfigured,
  serviceUnavailable,
  validationError,
} from "#/interfaces/http/responses";

type ErrorMapper = (c: Context, error: unknown) => Response | null;

type ErrorClass = abstract new (...args: never[]) => Error;

export const mapErrorToResponse = (
  ErrorType: ErrorClass,
  responder: (c: Context, message: string) => Response,
): ErrorMapper => {
  return (c, error) => {
    if (error instanceof ErrorType) {
      return responder(c, error.message);
    }
    return null;
  };
};

export const applicationErrorMappers: readonly ErrorMapper[] = [
  mapErrorToResponse(ValidationError, validationError),
  mapErrorToResponse(NotConfiguredError, notConfigured),
  mapErrorToResponse(TransportError, badGateway),
  mapErrorToResponse(StorageError, serviceUnavailable),
  mapErrorToResponse(ConfigError, serviceUnavailable),
] as const;

/** First mapper that recognizes the error wins; `null` when none does. */
export const mapApplicationError = (
  c: Context,
  error: unknown,
  mappers: readonly ErrorMapper[] = applicationErrorMappers,
): Response | null => {
  for (const mapper of mappers) {
    const response = mapper(c, error);
    if (response != null) {
      return response;
    }
  }
  return null;
};
