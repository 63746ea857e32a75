import { PkgdeckError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the pkgdeck CLI
 */

/**
 * The backend configuration value did not resolve to a known package manager.
 */
export class UnsupportedManagerError extends PkgdeckError {
  readonly raw: string;

  constructor(raw: string) {
    const shown = raw === '' ? '(empty)' : `'${raw}'`;
    super(
      `Unsupported package manager ${shown}. Set PKGDECK_MANAGER or --manager to one of: apt-get, pacman`,
      ErrorCodes.UNSUPPORTED_MANAGER,
      { raw }
    );
    this.name = 'UnsupportedManagerError';
    this.raw = raw;
  }
}

export class DialogUnavailableError extends PkgdeckError {
  constructor(provider: string, reason?: string) {
    super(
      `Interactive dialog '${provider}' is not available${reason ? `: ${reason}` : ''}`,
      ErrorCodes.DIALOG_UNAVAILABLE,
      { provider }
    );
    this.name = 'DialogUnavailableError';
  }
}

/**
 * One category's batched install call failed. Local to that category.
 */
export class PartialInstallFailure extends PkgdeckError {
  readonly category: string;
  readonly reason: string;

  constructor(category: string, reason: string) {
    super(`Installing category '${category}' failed: ${reason}`, ErrorCodes.PARTIAL_INSTALL_FAILURE, { category });
    this.name = 'PartialInstallFailure';
    this.category = category;
    this.reason = reason;
  }
}

export class CommandFailedError extends PkgdeckError {
  readonly exitCode: number | null;

  constructor(commandLine: string, exitCode: number | null, stderr?: string) {
    const status = exitCode === null ? 'was terminated by a signal' : `exited with code ${exitCode}`;
    super(`'${commandLine}' ${status}`, ErrorCodes.COMMAND_FAILED, { commandLine, exitCode, stderr });
    this.name = 'CommandFailedError';
    this.exitCode = exitCode;
  }
}

export class CatalogError extends PkgdeckError {
  constructor(message: string, details?: unknown) {
    super(`Invalid catalog: ${message}`, ErrorCodes.CATALOG_ERROR, details);
    this.name = 'CatalogError';
  }
}

export class FileSystemError extends PkgdeckError {
  constructor(message: string, details?: unknown) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
  }
}

export class ValidationError extends PkgdeckError {
  constructor(message: string, details?: unknown) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
  }
}

export class ConfigError extends PkgdeckError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof PkgdeckError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
