import type { ScheduledEventLink } from "./types.js";

export type GoalErrorCode =
  | "not_found"
  | "validation"
  | "cycle"
  | "self_dependency"
  | "locked"
  | "invalid_transition"
  | "invalid_breakdown"
  | "step_limit_exceeded"
  | "duplicate_step_title"
  | "external_service_failure"
  | "partial_activation_failure";

/**
 * Base class for every error the goal engine surfaces. `status` follows HTTP
 * semantics so the server can hand it straight to the client.
 */
export class GoalError extends Error {
  constructor(
    message: string,
    readonly code: GoalErrorCode,
    readonly status: number
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class GoalNotFoundError extends GoalError {
  constructor(readonly goalId: string) {
    super(`Goal ${goalId} not found`, "not_found", 404);
  }
}

export class ValidationError extends GoalError {
  constructor(message: string) {
    super(message, "validation", 400);
  }
}

export class CycleError extends GoalError {
  constructor(message: string) {
    super(message, "cycle", 409);
  }
}

export class SelfDependencyError extends GoalError {
  constructor(readonly goalId: string) {
    super(`Goal ${goalId} cannot depend on itself`, "self_dependency", 409);
  }
}

export class LockedError extends GoalError {
  constructor(readonly goalId: string) {
    super("Goal is locked and cannot be modified", "locked", 423);
  }
}

export class InvalidTransitionError extends GoalError {
  constructor(message: string) {
    super(message, "invalid_transition", 409);
  }
}

export class InvalidBreakdownError extends GoalError {
  constructor(message: string) {
    super(message, "invalid_breakdown", 422);
  }
}

export class StepLimitExceeded extends GoalError {
  constructor(readonly limit: number) {
    super(
      `Roadmap already has ${limit} steps; complete or split the goal before adding more`,
      "step_limit_exceeded",
      409
    );
  }
}

/** Non-fatal: reported as a warning, never thrown out of the step engine. */
export class DuplicateStepTitle extends GoalError {
  constructor(readonly title: string) {
    super(`Skipped duplicate step "${title}"`, "duplicate_step_title", 409);
  }
}

export class ExternalServiceFailure extends GoalError {
  constructor(
    readonly service: "reasoning" | "calendar",
    message: string,
    readonly recoverable: boolean,
    options?: { cause?: unknown }
  ) {
    super(`${service} service failed: ${message}`, "external_service_failure", 502);
    if (options?.cause !== undefined) this.cause = options.cause;
  }

  static from(service: "reasoning" | "calendar", err: unknown): ExternalServiceFailure {
    if (err instanceof ExternalServiceFailure) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new ExternalServiceFailure(service, message, true, { cause: err });
  }
}

export class PartialActivationFailure extends GoalError {
  constructor(
    readonly succeeded: ScheduledEventLink[],
    options?: { cause?: unknown }
  ) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(
      `Activation incomplete; ${succeeded.length} session(s) were scheduled before the calendar failed${reason}`,
      "partial_activation_failure",
      502
    );
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export interface EngineWarning {
  code: GoalErrorCode | "step_soft_limit";
  message: string;
}

export function toWarning(err: GoalError): EngineWarning {
  return { code: err.code, message: err.message };
}
