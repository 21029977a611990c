import { type CommandKind } from "#/domain/commands/command";

export class ExecutionError extends Error {
  constructor(
    readonly kind: CommandKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ExecutionError";
  }
}
