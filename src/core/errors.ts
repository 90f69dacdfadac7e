// src/core/errors.ts

/**
 * Base class for every error raised by stepline itself.
 * `details` carries the structured values the message was built from.
 */
export class StepLineError extends Error {
  readonly details: Record<string, unknown>;

  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

/**
 * Raised while constructing a Workflow. Nothing has executed when this is thrown.
 */
export class WorkflowValidationError extends StepLineError {
  readonly workflowId: string;

  constructor(workflowId: string, message: string, details: Record<string, unknown> = {}) {
    super(message, { workflowId, ...details });
    this.workflowId = workflowId;
  }
}

/**
 * An operation returned a value that cannot be destructured into the step's return names.
 */
export class StepReturnArityError extends StepLineError {}

/**
 * A run-time condition that a validated workflow should make impossible.
 * The runner records it in the feedback and rethrows it.
 */
export class WorkflowInvariantError extends StepLineError {}

export class ConfigError extends StepLineError {}

export class OperationRegistryError extends StepLineError {}

export class WorkflowRegistryError extends StepLineError {}

export function isStepLineError(error: unknown): error is StepLineError {
  return error instanceof StepLineError;
}
