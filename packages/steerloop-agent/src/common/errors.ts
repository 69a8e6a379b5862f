import { ErrorPayload } from '@steerloop/shared';

export type AgentErrorCode =
  | 'UnroutableAction'
  | 'SafetyBlocked'
  | 'ExecutionTargetError'
  | 'SearchAttemptFailed'
  | 'SearchExhausted'
  | 'CancellationRequested'
  | 'TargetBusy'
  | 'InvalidArguments'
  | 'ModelRequestFailed'
  | 'InvalidConfiguration';

/**
 * Base class for every error the agent core raises on purpose. The code is
 * what the model sees in a failure outcome.
 */
export class AgentError extends Error {
  constructor(
    readonly code: AgentErrorCode,
    message: string,
    readonly details?: unknown,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnroutableActionError extends AgentError {
  constructor(message: string, details?: unknown) {
    super('UnroutableAction', message, details);
  }
}

export class SafetyBlockedError extends AgentError {
  constructor(message: string, details?: unknown) {
    super('SafetyBlocked', message, details);
  }
}

export class ExecutionTargetError extends AgentError {
  constructor(message: string, details?: unknown) {
    super('ExecutionTargetError', message, details);
  }
}

// Never leaves the search service; one engine failing only moves the
// search on to the next engine.
export class SearchAttemptFailedError extends AgentError {
  constructor(message: string, details?: unknown) {
    super('SearchAttemptFailed', message, details);
  }
}

export class SearchExhaustedError extends AgentError {
  constructor(message: string, details?: unknown) {
    super('SearchExhausted', message, details);
  }
}

export class InvalidArgumentsError extends AgentError {
  constructor(message: string, details?: unknown) {
    super('InvalidArguments', message, details);
  }
}

export class ModelRequestError extends AgentError {
  constructor(message: string, details?: unknown) {
    super('ModelRequestFailed', message, details);
  }
}

export class ConfigurationError extends AgentError {
  constructor(message: string, details?: unknown) {
    super('InvalidConfiguration', message, details);
  }
}

export class TargetBusyError extends AgentError {
  constructor() {
    super(
      'TargetBusy',
      'The execution target is already driven by another active turn',
    );
  }
}

/**
 * Raised when the turn is cancelled. Unwinds the turn loop and is never
 * turned into an action outcome.
 */
export class TurnInterrupt extends AgentError {
  constructor(reason = 'Turn cancelled') {
    super('CancellationRequested', reason);
  }
}

export function isTurnInterrupt(error: unknown): error is TurnInterrupt {
  return error instanceof TurnInterrupt;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Converts any thrown value into the payload carried by a failure outcome.
 */
export function errorToPayload(error: unknown): ErrorPayload {
  if (error instanceof AgentError) {
    return error.details === undefined
      ? { code: error.code, message: error.message }
      : { code: error.code, message: error.message, details: error.details };
  }
  if (error instanceof Error) {
    return { code: 'InternalError', message: error.message };
  }
  return { code: 'InternalError', message: String(error) };
}
