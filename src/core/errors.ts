// Domain-specific error types for pin-actions

/**
 * Base error class for all pinning errors
 */
export abstract class PinError extends Error {
  abstract readonly code: string;
  abstract readonly exitCode: number;

  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

/**
 * Text that does not parse as an action reference
 */
export class InvalidFormatError extends PinError {
  readonly code = 'INVALID_FORMAT';
  readonly exitCode = 1;

  constructor(public readonly input: string) {
    super(`Invalid action format: ${input}`, { input });
  }
}

/**
 * A workflow file could not be read
 */
export class FileReadError extends PinError {
  readonly code = 'FILE_READ_ERROR';
  readonly exitCode = 1;

  constructor(public readonly path: string, cause: unknown) {
    super(`Failed to read workflow file: ${path}: ${describeCause(cause)}`, { path });
  }
}

/**
 * A workflow file (or its backup) could not be written
 */
export class FileWriteError extends PinError {
  readonly code = 'FILE_WRITE_ERROR';
  readonly exitCode = 1;

  constructor(public readonly path: string, cause: unknown) {
    super(`Failed to write ${path}: ${describeCause(cause)}`, { path });
  }
}

/**
 * No advertised remote ref matched any candidate name
 */
export class ReferenceNotFoundError extends PinError {
  readonly code = 'REFERENCE_NOT_FOUND';
  readonly exitCode = 1;

  constructor(public readonly locator: string, public readonly url: string) {
    super(`Could not resolve reference '${locator}' in repository '${url}'`, { locator, url });
  }
}

/**
 * The remote could not be reached or the listing failed
 */
export class NetworkError extends PinError {
  readonly code = 'NETWORK_ERROR';
  readonly exitCode = 1;

  constructor(public readonly url: string, cause: unknown) {
    super(`Failed to list references of ${url}: ${describeCause(cause)}`, { url });
  }
}

/**
 * Invalid options or target directory; fatal for the run
 */
export class ConfigurationError extends PinError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly exitCode = 2;

  constructor(message: string, public readonly field?: string, context?: Record<string, unknown>) {
    super(message, { ...context, field });
  }
}

export type ResolutionError = ReferenceNotFoundError | NetworkError;

/**
 * Extracts a printable message from anything thrown
 */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
