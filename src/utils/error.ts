import type { Logger } from './logger.js';

// ============== Error classes ==============

export type ErrorDetails = Record<string, unknown>;

/**
 * Base error for everything the CLI reports to the user
 */
export class Params2EnvError extends Error {
  code: string;
  details?: ErrorDetails;

  constructor(message: string, code = 'PARAMS2ENV_ERROR', details?: ErrorDetails, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'Params2EnvError';
    this.code = code;
    this.details = details;
  }
}

export type ConfigurationErrorKind = 'unreadable' | 'unparseable' | 'invalid';

/**
 * A configuration file could not be read, parsed or validated
 */
export class ConfigurationError extends Params2EnvError {
  readonly kind: ConfigurationErrorKind;
  readonly file: string;

  constructor(kind: ConfigurationErrorKind, file: string, message: string, cause?: unknown) {
    super(message, 'CONFIGURATION_ERROR', { kind, file }, cause);
    this.name = 'ConfigurationError';
    this.kind = kind;
    this.file = file;
  }
}

/**
 * Malformed user input, always raised before any network call
 */
export class ValidationError extends Params2EnvError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class InvalidKmsArnError extends ValidationError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, details);
    this.code = 'INVALID_KMS_ARN';
    this.name = 'InvalidKmsArnError';
  }
}

export class MissingRegionError extends Params2EnvError {
  constructor(
    message = 'AWS region must be specified via --region, config file, or AWS_REGION environment variable',
  ) {
    super(message, 'MISSING_REGION');
    this.name = 'MissingRegionError';
  }
}

/**
 * The parameter store client could not be built (or the role not assumed)
 */
export class ClientError extends Params2EnvError {
  constructor(message: string, details?: ErrorDetails, cause?: unknown) {
    super(message, 'CLIENT_ERROR', details, cause);
    this.name = 'ClientError';
  }
}

export class ParameterNotFoundError extends Params2EnvError {
  constructor(path: string, region: string, cause?: unknown) {
    super(`parameter '${path}' not found in region '${region}'`, 'PARAMETER_NOT_FOUND', { path, region }, cause);
    this.name = 'ParameterNotFoundError';
  }
}

export class ParameterAlreadyExistsError extends Params2EnvError {
  constructor(path: string, region: string, cause?: unknown) {
    super(
      `parameter '${path}' already exists in region '${region}' (use --overwrite to replace it)`,
      'PARAMETER_ALREADY_EXISTS',
      { path, region },
      cause,
    );
    this.name = 'ParameterAlreadyExistsError';
  }
}

/**
 * Any other failure reported by AWS
 */
export class AWSError extends Params2EnvError {
  constructor(message: string, details?: ErrorDetails, cause?: unknown) {
    super(message, 'AWS_ERROR', details, cause);
    this.name = 'AWSError';
  }
}

/**
 * The replica step failed after the primary region was already written.
 * The primary write is kept; re-running the same command converges both regions.
 */
export class ReplicaSyncError extends Params2EnvError {
  constructor(message: string, details: ErrorDetails, cause: unknown) {
    super(message, 'REPLICA_SYNC_ERROR', details, cause);
    this.name = 'ReplicaSyncError';
  }
}

// ============== Error handler ==============

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Print one error line and flag the process as failed
 */
export function handleError(error: unknown, logger: Logger): void {
  logger.error(errorMessage(error));

  if (error instanceof Params2EnvError) {
    logger.debug('error details', { code: error.code, ...error.details });
  }

  process.exitCode = 1;
}

/**
 * Wrap a command action so failures are reported instead of thrown
 */
export function withErrorHandler<A extends unknown[]>(
  logger: Logger,
  fn: (...args: A) => Promise<void>,
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error, logger);
    }
  };
}
