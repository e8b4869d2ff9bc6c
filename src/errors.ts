/**
 * Typed failures raised by coordinator operations
 */

export type CoordinatorErrorCode =
  | 'DUPLICATE_AGENT'
  | 'INVALID_TRANSITION'
  | 'UNKNOWN_TASK'
  | 'UNKNOWN_AGENT'
  | 'UNKNOWN_TEMPLATE'
  | 'VALIDATION_FAILED';

export class CoordinatorError extends Error {
  readonly code: CoordinatorErrorCode;

  constructor(code: CoordinatorErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = 'CoordinatorError';
  }
}

export class DuplicateAgentError extends CoordinatorError {
  readonly agentId: string;

  constructor(agentId: string) {
    super('DUPLICATE_AGENT', `Agent '${agentId}' is already registered`);
    this.agentId = agentId;
    this.name = 'DuplicateAgentError';
  }
}

export class InvalidTransitionError extends CoordinatorError {
  readonly entity: 'task' | 'agent';
  readonly id: string;
  readonly from: string;
  readonly to: string;

  constructor(entity: 'task' | 'agent', id: string, from: string, to: string, detail?: string) {
    super(
      'INVALID_TRANSITION',
      `Cannot move ${entity} '${id}' from ${from} to ${to}${detail ? `: ${detail}` : ''}`
    );
    this.entity = entity;
    this.id = id;
    this.from = from;
    this.to = to;
    this.name = 'InvalidTransitionError';
  }
}

export class UnknownTaskError extends CoordinatorError {
  constructor(taskId: string) {
    super('UNKNOWN_TASK', `Task '${taskId}' not found`);
    this.name = 'UnknownTaskError';
  }
}

export class UnknownAgentError extends CoordinatorError {
  constructor(agentId: string) {
    super('UNKNOWN_AGENT', `Agent '${agentId}' not found`);
    this.name = 'UnknownAgentError';
  }
}

export class UnknownTemplateError extends CoordinatorError {
  constructor(role: string) {
    super('UNKNOWN_TEMPLATE', `No agent template for role '${role}'`);
    this.name = 'UnknownTemplateError';
  }
}

export class ValidationError extends CoordinatorError {
  readonly issues: string[];

  constructor(subject: string, issues: string[]) {
    super('VALIDATION_FAILED', `Invalid ${subject}: ${issues.join('; ')}`);
    this.issues = issues;
    this.name = 'ValidationError';
  }
}

export function isCoordinatorError(error: unknown): error is CoordinatorError {
  return error instanceof CoordinatorError;
}

/**
 * Message text of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
