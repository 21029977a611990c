import { sValidator } from "@hono/standard-validator";
import { type StandardSchemaV1 } from "@standard-schema/spec";
import { type Context } from "hono";
import {
  parseValidationDetails,
  validationError,
} from "#/interfaces/http/responses";

type HookResult = Response | undefined;

type ValidationHookResult =
  | {
      success: true;
      data: unknown;
      target: string;
      error?: never;
    }
  | {
      success: false;
      data: unknown;
      target: string;
      error: readonly StandardSchemaV1.Issue[];
    };

const validationHook = (
  result: ValidationHookResult,
  c: Context,
): HookResult => {
  if (!result.success) {
    return validationError(
      c,
      "Invalid request",
      parseValidationDetails(result.error),
    );
  }
  return undefined;
};

const validateJson = <Schema extends StandardSchemaV1>(schema: Schema) =>
  sValidator("json", schema, validationHook);

export { validateJson };
