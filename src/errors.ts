import type { ZodError } from 'zod';

export type ErrorCode =
  | 'INVALID_FILTER'
  | 'INVALID_INPUT'
  | 'SKILL_NOT_FOUND'
  | 'CONTEXT_NOT_FOUND'
  | 'STORE_UNAVAILABLE';

/**
 * Base class for errors surfaced to callers. Recovered conditions (provider
 * failure, malformed installed versions) never become one of these.
 */
export class SkillPlaneError extends Error {
  readonly code: ErrorCode;
  readonly details?: string[];

  constructor(code: ErrorCode, message: string, details?: string[]) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class InvalidFilterError extends SkillPlaneError {
  constructor(message: string, details?: string[]) {
    super('INVALID_FILTER', message, details);
  }
}

export class InvalidInputError extends SkillPlaneError {
  constructor(message: string, details?: string[]) {
    super('INVALID_INPUT', message, details);
  }
}

export class SkillNotFoundError extends SkillPlaneError {
  readonly skillId: string;

  constructor(skillId: string) {
    super('SKILL_NOT_FOUND', `Skill ${skillId} not found`);
    this.skillId = skillId;
  }
}

export class ContextNotFoundError extends SkillPlaneError {
  readonly contextId: string;

  constructor(contextId: string) {
    super('CONTEXT_NOT_FOUND', `Context ${contextId} not found`);
    this.contextId = contextId;
  }
}

export class StoreUnavailableError extends SkillPlaneError {
  constructor(store: string, cause: unknown) {
    super('STORE_UNAVAILABLE', `${store} store unavailable: ${cause instanceof Error ? cause.message : String(cause)}`);
  }
}

/** Flattens zod issues into `path: message` lines */
export function describeZodError(error: ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
