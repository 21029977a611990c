export type TransportFailureReason = "timeout" | "network" | "http" | "payload";

export class TransportError extends Error {
  constructor(
    message: string,
    readonly reason: TransportFailureReason,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TransportError";
  }
}
