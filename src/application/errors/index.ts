export { ConfigError } from "./config";
export { ExecutionError } from "./execution";
export { NotConfiguredError } from "./not-configured";
export { StorageError } from "./storage";
export { TransportError, type TransportFailureReason } from "./transport";
export { ValidationError } from "./validation";

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
