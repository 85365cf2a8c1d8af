/**
 * Error raised by a handler for a problem the client caused.
 * The router reports `message` to the client verbatim.
 */
export class ProtocolError extends Error {
  readonly details?: string;

  constructor(message: string, details?: string) {
    super(message);
    this.name = "ProtocolError";
    this.details = details;
  }
}

/**
 * Error raised when an adapter call exceeds its time budget
 */
export class TimeoutError extends Error {
  readonly label: string;
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.label = label;
    this.timeoutMs = timeoutMs;
  }
}
