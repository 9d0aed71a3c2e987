import { RewriterError, ErrorCodes, PackageReference } from '../types/index.js';

/**
 * Error classes raised by the dependency rewriter.
 * Everything here propagates to the host; nothing is recovered locally.
 */

export class FileSystemError extends RewriterError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ManifestError extends RewriterError {
  constructor(path: string, reason: string, details?: Record<string, unknown>) {
    super(`Invalid manifest ${path}: ${reason}`, ErrorCodes.MANIFEST_ERROR, { path, ...details });
    this.name = 'ManifestError';
  }
}

export class InstalledRepositoryError extends RewriterError {
  constructor(path: string, reason: string) {
    super(`Invalid installed repository ${path}: ${reason}`, ErrorCodes.INSTALLED_REPOSITORY_ERROR, { path });
    this.name = 'InstalledRepositoryError';
  }
}

export class LockUpdateError extends RewriterError {
  constructor(workingDir: string, cause: unknown) {
    super(
      `Updating the lock file in ${workingDir} failed: ${describeError(cause).message}. ` +
        `Run "composer update --lock" manually to bring it in line with the installed packages.`,
      ErrorCodes.LOCK_UPDATE_ERROR,
      { workingDir }
    );
    this.name = 'LockUpdateError';
    this.cause = cause;
  }
}

export class UninstallError extends RewriterError {
  readonly packages: PackageReference[];

  constructor(failures: Array<{ package: PackageReference; error: unknown }>) {
    const names = failures.map(f => `${f.package.name} (${f.package.version})`).join(', ');
    super(
      `Failed to uninstall deprecated packages: ${names}. ` +
        `Remove them and run "composer update --lock" manually.`,
      ErrorCodes.UNINSTALL_ERROR,
      { failures: failures.map(f => ({ name: f.package.name, error: describeError(f.error).message })) }
    );
    this.name = 'UninstallError';
    this.packages = failures.map(f => f.package);
  }
}

export class ConfigError extends RewriterError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

/**
 * Normalize anything thrown into a name/message pair suitable for log metadata
 */
export function describeError(error: unknown): { name: string; message: string; code?: string } {
  if (error instanceof RewriterError) {
    return { name: error.name, message: error.message, code: error.code };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: 'Unknown', message: String(error) };
}
