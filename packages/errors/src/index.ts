// factory-errors.ts - Error taxonomy shared by the factory packages

/**
 * Stable machine-readable codes for every factory error.
 */
export enum FactoryErrorCode {
  UNKNOWN_FIELD = 'UNKNOWN_FIELD',
  FACTORY_NOT_FOUND = 'FACTORY_NOT_FOUND',
  RELATION_NOT_FOUND = 'RELATION_NOT_FOUND',
  MODEL_NOT_FOUND = 'MODEL_NOT_FOUND',
  MODEL_LAYER_NOT_CONFIGURED = 'MODEL_LAYER_NOT_CONFIGURED',
  INVALID_IDENTIFIER = 'INVALID_IDENTIFIER',
  REGISTRY_SEALED = 'REGISTRY_SEALED',
  INVALID_BATCH = 'INVALID_BATCH',
  UNKNOWN = 'UNKNOWN',
}

/**
 * Options accepted by every FactoryError constructor.
 */
export interface FactoryErrorOptions {
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base class for errors raised while resolving factories.
 * Persistence errors coming from a model layer are never wrapped in it.
 *
 * @example
 * ```typescript
 * throw new FactoryError(FactoryErrorCode.UNKNOWN, 'Something went wrong', {
 *   details: { factory: 'PostFactory' },
 * });
 * ```
 */
export class FactoryError extends Error {
  /** Machine-readable error code */
  public readonly code: FactoryErrorCode;
  /** Type discriminator for runtime type checking */
  public readonly isFactoryError = true;
  /** Structured context for logging and assertions */
  public readonly details?: Record<string, unknown>;

  constructor(
    code: FactoryErrorCode,
    message: string,
    options: FactoryErrorOptions = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;

    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serializes the error to a JSON-compatible object.
   */
  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

/**
 * Raised when an override names a field the factory definition does not have.
 *
 * @example
 * ```typescript
 * throw new UnknownFieldError('PostFactory', ['titel'], ['title', 'content']);
 * // Error: PostFactory has no field(s) "titel". Known fields: title, content
 * ```
 */
export class UnknownFieldError extends FactoryError {
  constructor(
    readonly factory: string,
    readonly fields: string[],
    readonly knownFields: string[],
  ) {
    super(
      FactoryErrorCode.UNKNOWN_FIELD,
      `${factory} has no field(s) ${fields
        .map((field) => `"${field}"`)
        .join(', ')}. Known fields: ${knownFields.join(', ') || '(none)'}`,
      { details: { factory, fields, knownFields } },
    );
  }
}

/**
 * Raised when a factory identifier or model has no registered factory.
 */
export class FactoryNotFoundError extends FactoryError {
  constructor(readonly identifier: string) {
    super(
      FactoryErrorCode.FACTORY_NOT_FOUND,
      `Factory "${identifier}" is not registered. Register it with registry.register() or registry.registerAll() before use`,
      { details: { identifier } },
    );
  }
}

/**
 * Raised when `has()` names a relation the model layer does not know.
 */
export class RelationNotFoundError extends FactoryError {
  constructor(
    readonly model: string,
    readonly relation: string,
  ) {
    super(
      FactoryErrorCode.RELATION_NOT_FOUND,
      `"${relation}" is not a reverse relation of ${model}`,
      { details: { model, relation } },
    );
  }
}

/**
 * Raised when a model label cannot be resolved by the model layer.
 */
export class ModelNotFoundError extends FactoryError {
  constructor(readonly identifier: string) {
    super(
      FactoryErrorCode.MODEL_NOT_FOUND,
      `Model "${identifier}" is not known to the model layer`,
      { details: { identifier } },
    );
  }
}

/**
 * Raised when a factory is used before any model layer was configured.
 */
export class ModelLayerNotConfiguredError extends FactoryError {
  constructor(readonly factory: string) {
    super(
      FactoryErrorCode.MODEL_LAYER_NOT_CONFIGURED,
      `${factory} has no model layer. Pass { models } to the factory or call configureFactories({ models })`,
      { details: { factory } },
    );
  }
}

/**
 * Raised when a registry identifier is not of the form `<app>.<FactoryName>`.
 */
export class InvalidIdentifierError extends FactoryError {
  constructor(readonly identifier: string) {
    super(
      FactoryErrorCode.INVALID_IDENTIFIER,
      `"${identifier}" is not a valid identifier, expected "<app>.<Name>"`,
      { details: { identifier } },
    );
  }
}

/**
 * Raised when registering into a sealed registry.
 */
export class RegistrySealedError extends FactoryError {
  constructor(readonly identifier: string) {
    super(
      FactoryErrorCode.REGISTRY_SEALED,
      `Cannot register "${identifier}": the factory registry is sealed`,
      { details: { identifier } },
    );
  }
}

/**
 * Raised for invalid batch sizes, relation counts or empty sequences.
 */
export class InvalidBatchError extends FactoryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(FactoryErrorCode.INVALID_BATCH, message, { details });
  }
}

/**
 * Type guard to check if an error is a FactoryError.
 * Also recognises errors created by another copy of this package.
 *
 * @example
 * ```typescript
 * try {
 *   factory.make({ titel: 'x' });
 * } catch (error) {
 *   if (isFactoryError(error) && error.code === FactoryErrorCode.UNKNOWN_FIELD) {
 *     // typo in an override
 *   }
 * }
 * ```
 */
export function isFactoryError(error: unknown): error is FactoryError {
  return (
    error instanceof FactoryError ||
    (error !== null &&
      typeof error === 'object' &&
      'isFactoryError' in error &&
      error.isFactoryError === true)
  );
}

/**
 * Wraps an unknown error into a FactoryError.
 * If the error is already a FactoryError, returns it unchanged.
 *
 * @param error - The error to wrap
 * @param message - Optional message to use instead of the original one
 */
export function wrapError(error: unknown, message?: string): FactoryError {
  if (isFactoryError(error)) {
    return error;
  }

  const fallback = error instanceof Error ? error.message : String(error);

  return new FactoryError(FactoryErrorCode.UNKNOWN, message || fallback, {
    cause: error,
    details: { originalError: error },
  });
}
