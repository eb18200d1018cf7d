/**
 * Error codes of the persistence engine
 */
export enum PersistenceErrorCode {
  FIELD_PROCESSING_FAILED = 'FIELD_PROCESSING_FAILED',
  UNSUPPORTED_FIELD_TYPE = 'UNSUPPORTED_FIELD_TYPE',
  INVALID_REFERENCE = 'INVALID_REFERENCE',
  REFERENCE_SAVING_FAILED = 'REFERENCE_SAVING_FAILED',
  RECORD_ALREADY_EXISTS = 'RECORD_ALREADY_EXISTS',
  RECORD_DOES_NOT_EXIST = 'RECORD_DOES_NOT_EXIST',
  RECORD_NOT_FOUND = 'RECORD_NOT_FOUND',
  MAPPING_ERROR = 'MAPPING_ERROR',
  CIRCULAR_REFERENCE_REJECTED = 'CIRCULAR_REFERENCE_REJECTED',
  STORE_OPERATION_FAILED = 'STORE_OPERATION_FAILED',
}

/**
 * Base class of every error raised by the engine
 *
 * Carries the field and type names where they apply, so a failure deep in a
 * dependent save can be located without inspecting internals.
 */
export class PersistenceError extends Error {
  public readonly code: PersistenceErrorCode;
  public readonly fieldName?: string;
  public readonly typeName?: string;

  /**
   * Original error, if exists
   */
  public readonly originalError?: Error;

  constructor(
    code: PersistenceErrorCode,
    message: string,
    details: { fieldName?: string; typeName?: string; originalError?: unknown } = {}
  ) {
    super(message);
    this.name = 'PersistenceError';
    this.code = code;
    this.fieldName = details.fieldName;
    this.typeName = details.typeName;
    this.originalError = toError(details.originalError);

    if (this.originalError?.stack) {
      this.stack = `${this.stack}\nCaused by: ${this.originalError.stack}`;
    }

    // For ES5 compatibility
    Object.setPrototypeOf(this, PersistenceError.prototype);
  }

  public override toString(): string {
    return `[${this.code}] ${this.message}`;
  }

  toJSON(): {
    readonly name: string;
    readonly code: PersistenceErrorCode;
    readonly message: string;
    readonly fieldName?: string;
    readonly typeName?: string;
    readonly originalError?: {
      readonly name: string;
      readonly message: string;
    };
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      fieldName: this.fieldName,
      typeName: this.typeName,
      originalError: this.originalError
        ? {
            name: this.originalError.name,
            message: this.originalError.message,
          }
        : undefined,
    };
  }
}

export class FieldProcessingFailedError extends PersistenceError {
  constructor(fieldName: string, typeName: string, originalError: unknown) {
    super(
      PersistenceErrorCode.FIELD_PROCESSING_FAILED,
      `Failed to process field '${fieldName}' in type '${typeName}': ${getErrorMessage(originalError)}`,
      { fieldName, typeName, originalError }
    );
    this.name = 'FieldProcessingFailedError';
    Object.setPrototypeOf(this, FieldProcessingFailedError.prototype);
  }
}

export class UnsupportedFieldTypeError extends PersistenceError {
  /**
   * Description of the offending runtime value
   */
  public readonly kind: string;

  constructor(fieldName: string, kind: string, typeName?: string) {
    super(
      PersistenceErrorCode.UNSUPPORTED_FIELD_TYPE,
      `Unsupported value of kind '${kind}' in field '${fieldName}'${typeName ? ` of type '${typeName}'` : ''}`,
      { fieldName, typeName }
    );
    this.name = 'UnsupportedFieldTypeError';
    this.kind = kind;
    Object.setPrototypeOf(this, UnsupportedFieldTypeError.prototype);
  }
}

export class InvalidReferenceError extends PersistenceError {
  constructor(fieldName: string, typeName: string, reason?: string) {
    super(
      PersistenceErrorCode.INVALID_REFERENCE,
      `Invalid reference in field '${fieldName}' of type '${typeName}'${reason ? `: ${reason}` : ''}`,
      { fieldName, typeName }
    );
    this.name = 'InvalidReferenceError';
    Object.setPrototypeOf(this, InvalidReferenceError.prototype);
  }
}

export class ReferenceSavingFailedError extends PersistenceError {
  constructor(fieldName: string, typeName: string, originalError: unknown) {
    super(
      PersistenceErrorCode.REFERENCE_SAVING_FAILED,
      `Failed to save reference for field '${fieldName}' in type '${typeName}': ${getErrorMessage(originalError)}`,
      { fieldName, typeName, originalError }
    );
    this.name = 'ReferenceSavingFailedError';
    Object.setPrototypeOf(this, ReferenceSavingFailedError.prototype);
  }
}

export class RecordAlreadyExistsError extends PersistenceError {
  public readonly identity: string;

  constructor(identity: string, typeName: string) {
    super(
      PersistenceErrorCode.RECORD_ALREADY_EXISTS,
      `Record already exists with identity '${identity}' for type '${typeName}'`,
      { typeName }
    );
    this.name = 'RecordAlreadyExistsError';
    this.identity = identity;
    Object.setPrototypeOf(this, RecordAlreadyExistsError.prototype);
  }
}

export class RecordDoesNotExistError extends PersistenceError {
  constructor(typeName: string, identity?: string) {
    super(
      PersistenceErrorCode.RECORD_DOES_NOT_EXIST,
      `Record does not exist with identity '${identity ?? 'nil'}' for type '${typeName}'`,
      { typeName }
    );
    this.name = 'RecordDoesNotExistError';
    Object.setPrototypeOf(this, RecordDoesNotExistError.prototype);
  }
}

export class RecordNotFoundError extends PersistenceError {
  public readonly identity: string;

  constructor(identity: string, typeName: string) {
    super(
      PersistenceErrorCode.RECORD_NOT_FOUND,
      `Record not found with identity '${identity}' for type '${typeName}'`,
      { typeName }
    );
    this.name = 'RecordNotFoundError';
    this.identity = identity;
    Object.setPrototypeOf(this, RecordNotFoundError.prototype);
  }
}

export class MappingError extends PersistenceError {
  constructor(typeName: string, message: string, fieldName?: string, originalError?: unknown) {
    super(
      PersistenceErrorCode.MAPPING_ERROR,
      `Cannot map record to '${typeName}'${fieldName ? ` at field '${fieldName}'` : ''}: ${message}`,
      { fieldName, typeName, originalError }
    );
    this.name = 'MappingError';
    Object.setPrototypeOf(this, MappingError.prototype);
  }
}

export class CircularReferenceRejectedError extends PersistenceError {
  public readonly identity: string;

  constructor(identity: string, typeName: string) {
    super(
      PersistenceErrorCode.CIRCULAR_REFERENCE_REJECTED,
      `Record '${identity}' of type '${typeName}' has a circular reference graph`,
      { typeName }
    );
    this.name = 'CircularReferenceRejectedError';
    this.identity = identity;
    Object.setPrototypeOf(this, CircularReferenceRejectedError.prototype);
  }
}

export class StoreOperationFailedError extends PersistenceError {
  public readonly operation: string;

  constructor(operation: string, typeName: string, originalError: unknown) {
    super(
      PersistenceErrorCode.STORE_OPERATION_FAILED,
      `Operation '${operation}' failed for type '${typeName}': ${getErrorMessage(originalError)}`,
      { typeName, originalError }
    );
    this.name = 'StoreOperationFailedError';
    this.operation = operation;
    Object.setPrototypeOf(this, StoreOperationFailedError.prototype);
  }
}

/**
 * Checks if object is PersistenceError instance
 */
export function isPersistenceError(error: unknown): error is PersistenceError {
  return error instanceof PersistenceError;
}

/**
 * Type guard for standard Error
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

/**
 * Safely extracts error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}

function toError(error: unknown): Error | undefined {
  if (error === undefined) {
    return undefined;
  }
  return isError(error) ? error : new Error(getErrorMessage(error));
}
