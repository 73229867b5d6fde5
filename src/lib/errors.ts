/**
 * Structured Error Classes for kube-rollout
 *
 * Every error raised by the domain carries a stable code and optional details
 * so the CLI can print guidance and the workflow can record a precise message.
 */

export const ErrorCodes = {
  // Manifest errors
  MANIFEST_NOT_FOUND: 'MANIFEST_NOT_FOUND',
  MANIFEST_PARSE_FAILED: 'MANIFEST_PARSE_FAILED',
  MANIFEST_INVALID: 'MANIFEST_INVALID',
  DUPLICATE_RESOURCE: 'DUPLICATE_RESOURCE',

  // Plan errors
  PLAN_INVALID: 'PLAN_INVALID',
  TARGET_NOT_FOUND: 'TARGET_NOT_FOUND',
  TARGET_AMBIGUOUS: 'TARGET_AMBIGUOUS',

  // Rollout errors
  INVALID_TRANSITION: 'INVALID_TRANSITION',
  ROLLOUT_FAILED: 'ROLLOUT_FAILED',
  NO_PREVIOUS_REVISION: 'NO_PREVIOUS_REVISION',

  // Kubernetes errors
  KUBERNETES_CONNECTION_FAILED: 'KUBERNETES_CONNECTION_FAILED',
  KUBERNETES_APPLY_FAILED: 'KUBERNETES_APPLY_FAILED',
  RESOURCE_NOT_FOUND: 'RESOURCE_NOT_FOUND',

  // Store and configuration errors
  STORE_CORRUPT: 'STORE_CORRUPT',
  STORE_WRITE_FAILED: 'STORE_WRITE_FAILED',
  CONFIG_INVALID: 'CONFIG_INVALID',

  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error class for all rollout errors
 */
export class RolloutError extends Error {
  public readonly code: ErrorCode;
  public readonly details: Record<string, unknown>;
  public override readonly cause: Error | undefined;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.INTERNAL_ERROR,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message);
    this.name = 'RolloutError';
    this.code = code;
    this.details = details ?? {};
    this.cause = cause;
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      timestamp: this.timestamp,
      stack: this.stack,
      cause: this.cause
        ? {
            message: this.cause.message,
            stack: this.cause.stack,
          }
        : undefined,
    };
  }

  getUserMessage(): string {
    return `${this.message} (${this.code})`;
  }
}

/**
 * Raised when a manifest file cannot be read or parsed
 */
export class ManifestError extends RolloutError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.MANIFEST_PARSE_FAILED,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, code, details, cause);
    this.name = 'ManifestError';
  }
}

/**
 * Raised when a parsed document does not match its kind's shape
 */
export class ManifestValidationError extends ManifestError {
  public readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid manifest ${source}: ${issues.join('; ')}`, ErrorCodes.MANIFEST_INVALID, {
      source,
      issues,
    });
    this.name = 'ManifestValidationError';
    this.issues = issues;
  }
}

export class PlanError extends RolloutError {
  constructor(message: string, code: ErrorCode = ErrorCodes.PLAN_INVALID, details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = 'PlanError';
  }
}

export class InvalidTransitionError extends RolloutError {
  constructor(from: string, event: string) {
    super(`Cannot ${event} a rollout that is ${from}`, ErrorCodes.INVALID_TRANSITION, { from, event });
    this.name = 'InvalidTransitionError';
  }
}

export class ClusterError extends RolloutError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.KUBERNETES_APPLY_FAILED,
    details?: Record<string, unknown>,
  ) {
    super(message, code, details);
    this.name = 'ClusterError';
  }
}

export class StoreError extends RolloutError {
  constructor(message: string, code: ErrorCode = ErrorCodes.STORE_CORRUPT, details?: Record<string, unknown>, cause?: Error) {
    super(message, code, details, cause);
    this.name = 'StoreError';
  }
}

export class ConfigError extends RolloutError {
  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, ErrorCodes.CONFIG_INVALID, { issues });
    this.name = 'ConfigError';
  }
}

export function isRolloutError(error: unknown): error is RolloutError {
  return error instanceof RolloutError;
}

/**
 * Flatten zod issues into `path: message` strings
 */
export function formatIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string[] {
  return issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}
