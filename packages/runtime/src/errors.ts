// Runtime error types

import type { PropertyKind, ValueKind } from '@appstate/protocol';

/**
 * Base class for all runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class RuntimeError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

/**
 * Validation error for malformed input handed over by the host.
 */
export class ValidationError extends RuntimeError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * Error when a name is empty or whitespace-only.
 * Raised by every entry point before any lookup.
 */
export class InvalidNameError extends ValidationError {
  readonly variableName: string;

  constructor(variableName: string) {
    super('A variable name expected.', { field: 'name', details: { variableName } });
    this.name = 'InvalidNameError';
    this.variableName = variableName;
  }
}

/**
 * Error when a name is neither a typed property nor a known variable.
 */
export class NotFoundError extends RuntimeError {
  readonly variableName: string;

  constructor(variableName: string, message = `Variable '${variableName}' does not exist.`) {
    super('NOT_FOUND', message);
    this.name = 'NotFoundError';
    this.variableName = variableName;
  }
}

/**
 * Error when a value cannot be interpreted as the requested kind.
 */
export class CoercionError extends RuntimeError {
  readonly sourceKind: ValueKind;
  readonly targetKind: ValueKind | PropertyKind;

  constructor(sourceKind: ValueKind, targetKind: ValueKind | PropertyKind, reason: string) {
    super('COERCION_ERROR', `Cannot coerce ${sourceKind} to ${targetKind}: ${reason}`);
    this.name = 'CoercionError';
    this.sourceKind = sourceKind;
    this.targetKind = targetKind;
  }
}

/**
 * Error when a typed property declares a kind outside the supported set.
 */
export class UnsupportedCoercionError extends RuntimeError {
  readonly propertyName: string;
  readonly propertyKind: string;

  constructor(propertyName: string, propertyKind: string) {
    super(
      'UNSUPPORTED_COERCION',
      `Property '${propertyName}' has unsupported kind '${propertyKind}'.`
    );
    this.name = 'UnsupportedCoercionError';
    this.propertyName = propertyName;
    this.propertyKind = propertyKind;
  }
}

/**
 * Error when an operation is not valid for the target, such as
 * removing a typed property.
 */
export class InvalidOperationError extends RuntimeError {
  constructor(message: string) {
    super('INVALID_OPERATION', message);
    this.name = 'InvalidOperationError';
  }
}

/**
 * Error for operations the container does not provide at all.
 */
export class NotSupportedError extends RuntimeError {
  readonly operation: string;

  constructor(operation: string) {
    super('NOT_SUPPORTED', `Operation not supported: ${operation}`);
    this.name = 'NotSupportedError';
    this.operation = operation;
  }
}

/**
 * Error when two declarations fold to the same normalized name.
 */
export class DuplicatePropertyError extends RuntimeError {
  readonly normalizedName: string;

  constructor(normalizedName: string, firstName: string, secondName: string) {
    super(
      'DUPLICATE_PROPERTY',
      `Properties '${firstName}' and '${secondName}' share the name '${normalizedName}'.`
    );
    this.name = 'DuplicatePropertyError';
    this.normalizedName = normalizedName;
  }
}

/**
 * Error when a change handler fails and the notifier is configured to stop.
 * The store mutation that caused the event is already committed.
 */
export class ChangeHandlerError extends RuntimeError {
  readonly variableName: string;
  readonly eventType: string;

  constructor(variableName: string, eventType: string, reason: string, cause?: unknown) {
    super(
      'CHANGE_HANDLER_ERROR',
      `Handler for ${eventType} on '${variableName}' failed: ${reason}`,
      { cause }
    );
    this.name = 'ChangeHandlerError';
    this.variableName = variableName;
    this.eventType = eventType;
  }
}
