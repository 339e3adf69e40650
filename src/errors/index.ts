import { ERROR_MESSAGES } from "../constants";

export class SubtreeCiError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
    if (cause && cause.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class ConfigError extends SubtreeCiError {
  constructor(message: string, code: string, cause?: Error) {
    super(message, `CONFIG_${code}`, cause);
  }
}

export class MissingEnvironmentVariableError extends ConfigError {
  constructor(
    public readonly variable: string,
    public readonly callSite: string,
  ) {
    super(`${callSite}: missing env var: ${variable}\n    ${ERROR_MESSAGES.ENV_VAR_HINT}`, "MISSING_ENV_VAR");
  }
}

export class ConfigValidationError extends ConfigError {
  constructor(
    public readonly field: string,
    public readonly reason: string,
  ) {
    super(`Invalid configuration for '${field}': ${reason}`, "VALIDATION_FAILED");
  }
}

export class GitError extends SubtreeCiError {
  constructor(message: string, code: string, cause?: Error) {
    super(message, `GIT_${code}`, cause);
  }
}

export class GitOperationError extends GitError {
  constructor(
    public readonly operation: string,
    details: string,
    cause?: Error,
  ) {
    super(`Git operation '${operation}' failed: ${details}`, "OPERATION_FAILED", cause);
  }
}

export class InvalidRefError extends GitError {
  constructor(
    public readonly ref: string,
    cause?: Error,
  ) {
    super(`invalid branch: ${ref}`, "INVALID_REF", cause);
  }
}

export function isNothingToCommitError(error: Error | string): boolean {
  const message = typeof error === "string" ? error : error.message;
  return ERROR_MESSAGES.NOTHING_TO_COMMIT.some((pattern) => message.includes(pattern));
}

/**
 * Pull and push failures are treated as transient; every other git failure is fatal.
 */
export function isRetryableGitError(error: unknown): error is GitOperationError {
  if (!(error instanceof GitOperationError)) {
    return false;
  }
  const { operation } = error;
  return ERROR_MESSAGES.RETRYABLE_OPERATIONS.some((candidate) => candidate === operation);
}
