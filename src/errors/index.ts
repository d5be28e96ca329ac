/**
 * Error taxonomy for the orchestration core.
 *
 * Every fault the core raises extends OrchestratorError and carries a
 * stable `code` so callers can branch on the kind of failure without
 * relying on instanceof across module boundaries.
 *
 *   QUEUE_FULL               backpressure; caller retries with backoff
 *   TIMEOUT                  nothing arrived in time; deadline/retry policy applies
 *   STORE_UNAVAILABLE        infrastructure fault in the memory store
 *   NOT_FOUND                expected-absent read
 *   RESOLUTION_UNRESOLVABLE  every candidate rejected by resolver policy
 *   MERGE_CONFLICT           merge strategy hit contradictory fields
 *   INVALID_TRANSITION       state machine refused a stage change
 */

export type OrchestratorErrorCode =
  | "QUEUE_FULL"
  | "TIMEOUT"
  | "STORE_UNAVAILABLE"
  | "NOT_FOUND"
  | "RESOLUTION_UNRESOLVABLE"
  | "MERGE_CONFLICT"
  | "INVALID_TRANSITION";

export abstract class OrchestratorError extends Error {
  public abstract readonly code: OrchestratorErrorCode;
  /** Whether the fault is worth retrying locally */
  public abstract readonly transient: boolean;

  /**
   * Format the error for log output.
   */
  format(): string {
    return `[${this.code}] ${this.message}`;
  }
}

export class QueueFullError extends OrchestratorError {
  public readonly code = "QUEUE_FULL";
  public readonly transient = true;

  constructor(
    public readonly destination: string,
    public readonly capacity: number
  ) {
    super(`Queue destination ${destination} is at capacity (${capacity})`);
    this.name = "QueueFullError";
  }
}

export class QueueTimeoutError extends OrchestratorError {
  public readonly code = "TIMEOUT";
  public readonly transient = true;

  constructor(
    public readonly destination: string,
    public readonly timeoutMs: number
  ) {
    super(`No message for ${destination} within ${timeoutMs}ms`);
    this.name = "QueueTimeoutError";
  }
}

export class StoreUnavailableError extends OrchestratorError {
  public readonly code = "STORE_UNAVAILABLE";
  public readonly transient = true;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreUnavailableError";
  }
}

export class NotFoundError extends OrchestratorError {
  public readonly code = "NOT_FOUND";
  public readonly transient = false;

  constructor(
    public readonly runId: string,
    public readonly key: string
  ) {
    super(`No entry for key ${key} in run ${runId}`);
    this.name = "NotFoundError";
  }
}

export class ResolutionConflictUnresolvableError extends OrchestratorError {
  public readonly code = "RESOLUTION_UNRESOLVABLE";
  public readonly transient = false;

  constructor(
    public readonly subject: string,
    public readonly rejected: readonly string[]
  ) {
    super(
      rejected.length === 0
        ? `Subject ${subject} has no candidates to resolve`
        : `Every candidate for subject ${subject} was rejected: ${rejected.join(", ")}`
    );
    this.name = "ResolutionConflictUnresolvableError";
  }
}

export class MergeConflictError extends OrchestratorError {
  public readonly code = "MERGE_CONFLICT";
  public readonly transient = false;

  constructor(
    public readonly subject: string,
    public readonly fields: readonly string[]
  ) {
    super(`Cannot merge candidates for ${subject}: conflicting fields ${fields.join(", ")}`);
    this.name = "MergeConflictError";
  }
}

export class InvalidTransitionError extends OrchestratorError {
  public readonly code = "INVALID_TRANSITION";
  public readonly transient = false;

  constructor(
    public readonly from: string,
    public readonly to: string
  ) {
    super(`Invalid stage transition: ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
  }
}

/**
 * Narrow an unknown value to an orchestrator error, optionally of one code.
 */
export function isOrchestratorError(
  error: unknown,
  code?: OrchestratorErrorCode
): error is OrchestratorError {
  return error instanceof OrchestratorError && (code === undefined || error.code === code);
}

/**
 * Best-effort message extraction for logging unknown throwables.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
