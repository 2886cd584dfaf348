/**
 * Error taxonomy for the simulation core.
 *
 * Only SetupFailureError is fatal to a run; everything else stays inside the
 * unit that raised it.
 */

export type SimulationErrorCode = "NOT_FOUND" | "TIMEOUT" | "BUS_CLOSED" | "SETUP_FAILURE" | "VALIDATION";

export class SimulationError extends Error {
  readonly code: SimulationErrorCode;

  constructor(code: SimulationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SimulationError";
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotFoundError extends SimulationError {
  readonly entity: "patient" | "agent" | "medication";
  readonly id: string;

  constructor(entity: "patient" | "agent" | "medication", id: string) {
    super("NOT_FOUND", `${entity} not found: ${id}`);
    this.name = "NotFoundError";
    this.entity = entity;
    this.id = id;
  }
}

export class DecisionTimeoutError extends SimulationError {
  readonly timeoutMs: number;

  constructor(role: string, timeoutMs: number) {
    super("TIMEOUT", `${role} decision exceeded ${timeoutMs}ms`);
    this.name = "DecisionTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** Shutdown signal, not a failure. */
export class BusClosedError extends SimulationError {
  constructor() {
    super("BUS_CLOSED", "message bus is closed");
    this.name = "BusClosedError";
  }
}

export class SetupFailureError extends SimulationError {
  constructor(message: string, cause?: unknown) {
    super("SETUP_FAILURE", message, { cause });
    this.name = "SetupFailureError";
  }
}

export class ValidationError extends SimulationError {
  readonly issues: string[];

  constructor(subject: string, issues: string[]) {
    super("VALIDATION", `invalid ${subject}: ${issues.join("; ")}`);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export function isBusClosed(err: unknown): err is BusClosedError {
  return err instanceof BusClosedError;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
