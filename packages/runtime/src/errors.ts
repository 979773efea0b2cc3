// Runtime error types

import type { AreaConfigIssue, AreaConfigErrorCode } from '@roomsense/protocol';

/**
 * Base class for all runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class RuntimeError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

/**
 * Validation error for malformed or invalid input.
 */
export class ValidationError extends RuntimeError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown>; code?: string }
  ) {
    super(options?.code ?? 'VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * An area configuration that must not become active.
 * Carries every validation error, not just the first.
 */
export class ConfigurationError extends RuntimeError {
  readonly areaId: string;
  readonly issues: AreaConfigIssue<AreaConfigErrorCode>[];

  constructor(areaId: string, issues: AreaConfigIssue<AreaConfigErrorCode>[]) {
    const summary = issues.map((i) => `${i.path}: ${i.message}`).join('; ');
    super('CONFIGURATION_ERROR', `Invalid configuration for area "${areaId}": ${summary}`);
    this.name = 'ConfigurationError';
    this.areaId = areaId;
    this.issues = issues;
  }
}

/**
 * Error when a referenced area does not exist.
 */
export class AreaNotFoundError extends RuntimeError {
  readonly areaId: string;

  constructor(areaId: string) {
    super('AREA_NOT_FOUND', `Area not found: ${areaId}`);
    this.name = 'AreaNotFoundError';
    this.areaId = areaId;
  }
}

/**
 * A sensor-state-change event that cannot be applied.
 */
export class InvalidSensorEventError extends ValidationError {
  constructor(reason: string, field?: string) {
    super(`Invalid sensor event: ${reason}`, { field, code: 'INVALID_SENSOR_EVENT' });
    this.name = 'InvalidSensorEventError';
  }
}

/**
 * Base error for a failed learning cycle.
 */
export class LearnerError extends RuntimeError {
  readonly areaId: string;

  constructor(areaId: string, message: string, code = 'LEARNER_ERROR') {
    super(code, message);
    this.name = 'LearnerError';
    this.areaId = areaId;
  }
}

/**
 * The learner exceeded its bounded duration.
 */
export class LearnerTimeoutError extends LearnerError {
  readonly timeoutMs: number;

  constructor(areaId: string, timeoutMs: number) {
    super(areaId, `Historical analysis for area "${areaId}" timed out after ${timeoutMs}ms`, 'LEARNER_TIMEOUT');
    this.name = 'LearnerTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The learner was cancelled by its caller.
 */
export class LearnerCancelledError extends LearnerError {
  constructor(areaId: string) {
    super(areaId, `Historical analysis for area "${areaId}" was cancelled`, 'LEARNER_CANCELLED');
    this.name = 'LearnerCancelledError';
  }
}

/**
 * A number that clamping should have kept finite was not.
 * Indicates a defect, never an input problem.
 */
export class InvariantViolationError extends RuntimeError {
  constructor(message: string) {
    super('INVARIANT_VIOLATION', message);
    this.name = 'InvariantViolationError';
  }
}
