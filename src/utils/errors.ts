import { ModpmError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the failure kinds of the modpm engine
 */

/** An installed package (or dependency) is absent. Recoverable: triggers acquisition. */
export class PackageNotFoundError extends ModpmError {
  constructor(packageName: string, details?: Record<string, unknown>) {
    super(`Package "${packageName}" not found`, ErrorCodes.NOT_FOUND, { packageName, ...details });
    this.name = 'PackageNotFoundError';
  }
}

export class NoManifestError extends ModpmError {
  constructor(directory: string) {
    super(`Directory "${directory}" contains no package manifest`, ErrorCodes.NO_MANIFEST, { directory });
    this.name = 'NoManifestError';
  }
}

export class InvalidManifestError extends ModpmError {
  constructor(manifestPath: string, reason: string) {
    super(`Invalid package manifest "${manifestPath}": ${reason}`, ErrorCodes.INVALID_MANIFEST, { manifestPath, reason });
    this.name = 'InvalidManifestError';
  }
}

export class IdentityMismatchError extends ModpmError {
  constructor(expected: string, actual: string, directory: string) {
    super(
      `Expected to install "${expected}" but got "${actual}" in "${directory}"`,
      ErrorCodes.IDENTITY_MISMATCH,
      { expected, actual, directory }
    );
    this.name = 'IdentityMismatchError';
  }
}

/** No configured registry has a version matching the selector. */
export class RegistryPackageNotFoundError extends ModpmError {
  constructor(packageName: string, selector: string) {
    super(
      `Package "${packageName}@${selector}" could not be located`,
      ErrorCodes.PACKAGE_NOT_FOUND,
      { packageName, selector }
    );
    this.name = 'RegistryPackageNotFoundError';
  }
}

export class CloneFailedError extends ModpmError {
  constructor(url: string, exitCode: number | null, stderr?: string) {
    super(`Git clone of "${url}" failed (exit code ${exitCode ?? 'unknown'})`, ErrorCodes.CLONE_FAILED, {
      url,
      exitCode,
      stderr
    });
    this.name = 'CloneFailedError';
  }
}

export class DownloadFailedError extends ModpmError {
  constructor(url: string, reason: string, status?: number) {
    super(`Download of "${url}" failed: ${reason}`, ErrorCodes.DOWNLOAD_FAILED, { url, status });
    this.name = 'DownloadFailedError';
  }
}

export class BridgeInstallFailedError extends ModpmError {
  constructor(exitCode: number | null) {
    super(`\`pip install\` failed with exit code ${exitCode ?? 'unknown'}`, ErrorCodes.BRIDGE_INSTALL_FAILED, {
      exitCode
    });
    this.name = 'BridgeInstallFailedError';
  }
}

export class HookFailedError extends ModpmError {
  constructor(hook: string, packageId: string, cause: unknown, details?: Record<string, unknown>) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${hook} script of "${packageId}" failed: ${reason}`, ErrorCodes.HOOK_FAILED, {
      hook,
      packageId,
      stack: cause instanceof Error ? cause.stack : undefined,
      ...details
    });
    this.name = 'HookFailedError';
  }
}

export class UninstallFailedError extends ModpmError {
  constructor(directory: string, reason: string) {
    super(`Can not uninstall "${directory}": ${reason}`, ErrorCodes.UNINSTALL_FAILED, { directory });
    this.name = 'UninstallFailedError';
  }
}

export class FileSystemError extends ModpmError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
  }
}

export class ValidationError extends ModpmError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.VALIDATION_ERROR, details);
  }
}

export class ConfigError extends ModpmError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
  }
}

export class UserCancellationError extends Error {
  constructor(message: string = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancellationError';
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof ModpmError) {
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
      if (error instanceof UserCancellationError) {
        process.exit(0);
      }

      const result = handleError(error);
      console.error(`fatal: ${result.error}`);
      process.exit(1);
    }
  };
}
