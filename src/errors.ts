/** The message of anything thrown, including errors created in another realm. */
export const errorMessage = (error: unknown): string =>
  typeof error === "object" && error !== null && "message" in error && typeof error.message === "string"
    ? error.message
    : String(error);

export class CoordinationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "CoordinationError";
  }
}

export class ConfigError extends CoordinationError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

/** The resource slot stayed busy for longer than the guard wait. Retry later. */
export class LockConflictError extends CoordinationError {
  constructor(
    message: string,
    public readonly resource: string,
  ) {
    super(message);
    this.name = "LockConflictError";
  }
}

export class LockTimeoutError extends CoordinationError {
  constructor(
    public readonly resource: string,
    public readonly waitedMs: number,
  ) {
    super(`Timed out after ${waitedMs}ms waiting for ${resource}`);
    this.name = "LockTimeoutError";
  }
}

/** The ticket was revoked. The current unit of work must be abandoned. */
export class PreemptedError extends CoordinationError {
  constructor(
    public readonly ticketId: string,
    public readonly resource: string,
    public readonly reason: string,
  ) {
    super(`Ticket ${ticketId} on ${resource} was preempted: ${reason}`);
    this.name = "PreemptedError";
  }
}
