/**
 * Error definitions for phasewright
 * Provides the structured error hierarchy used by every orchestration component
 */

/** Base error class for all phasewright errors */
export class PhasewrightError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'PhasewrightError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PhasewrightError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/**
 * Thrown when the checkpoint document exists but cannot be parsed or validated.
 * Never remediated automatically: the document may be recoverable from a backup.
 */
export class CorruptStateError extends PhasewrightError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CORRUPT_STATE', context)
    this.name = 'CorruptStateError'
  }
}

/** Thrown by callers that require a checkpoint when none exists */
export class CheckpointNotFoundError extends PhasewrightError {
  constructor(path: string) {
    super(`No checkpoint found at ${path}`, 'NOT_FOUND', { path })
    this.name = 'CheckpointNotFoundError'
  }
}

/** Thrown by `initialize` when a checkpoint already exists for the project */
export class CheckpointExistsError extends PhasewrightError {
  constructor(path: string) {
    super(`A checkpoint already exists at ${path}`, 'CHECKPOINT_EXISTS', { path })
    this.name = 'CheckpointExistsError'
  }
}

/** Thrown when another live process holds the checkpoint lock */
export class CheckpointLockedError extends PhasewrightError {
  constructor(lockPath: string, holder: Record<string, unknown>) {
    super(
      `Checkpoint is locked by another orchestration process (pid ${String(holder['pid'])})`,
      'CHECKPOINT_LOCKED',
      { lockPath, holder }
    )
    this.name = 'CheckpointLockedError'
  }
}

/** Thrown when the checkpoint and the live tracker cannot be reconciled */
export class ReconciliationConflictError extends PhasewrightError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'RECONCILIATION_CONFLICT', context)
    this.name = 'ReconciliationConflictError'
  }
}

/** Thrown when an item's estimate or running cost crosses the hard resource ceiling */
export class ResourceCeilingExceededError extends PhasewrightError {
  constructor(
    itemId: string,
    estimate: number,
    ceiling: number,
    context: Record<string, unknown> = {}
  ) {
    super(
      `Work item ${itemId} cannot be scheduled directly: estimate=${String(estimate)}, ceiling=${String(ceiling)}`,
      'RESOURCE_CEILING_EXCEEDED',
      { itemId, estimate, ceiling, ...context }
    )
    this.name = 'ResourceCeilingExceededError'
  }
}

/** Describes a verification loop that reached its attempt cap without passing */
export class VerificationDivergenceError extends PhasewrightError {
  constructor(attemptCount: number, maxAttempts: number, lastFailure: string) {
    super(
      `Verification diverged after ${String(attemptCount)} of ${String(maxAttempts)} attempts: ${lastFailure}`,
      'VERIFICATION_DIVERGENCE',
      { attemptCount, maxAttempts }
    )
    this.name = 'VerificationDivergenceError'
  }
}

/** Thrown when a complex item cannot be split below the complex threshold */
export class DecompositionError extends PhasewrightError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'DECOMPOSITION_FAILED', context)
    this.name = 'DecompositionError'
  }
}

/** Raised for callers that require an optimizer result when history is too small */
export class InsufficientSampleError extends PhasewrightError {
  constructor(sampleSize: number, required: number) {
    super(
      `Insufficient history: ${String(sampleSize)} project(s), at least ${String(required)} required`,
      'INSUFFICIENT_SAMPLE',
      { sampleSize, required }
    )
    this.name = 'InsufficientSampleError'
  }
}

/** Thrown when an agent capability or the work-item tracker fails */
export class ExternalCapabilityFailureError extends PhasewrightError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'EXTERNAL_CAPABILITY_FAILURE', context)
    this.name = 'ExternalCapabilityFailureError'
  }
}

/** Thrown when an operation needs an approval that has not been given */
export class ApprovalRequiredError extends PhasewrightError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'APPROVAL_REQUIRED', context)
    this.name = 'ApprovalRequiredError'
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends PhasewrightError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when a document uses a format version this build cannot read */
export class IncompatibleFormatError extends PhasewrightError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'INCOMPATIBLE_FORMAT', context)
    this.name = 'IncompatibleFormatError'
  }
}
