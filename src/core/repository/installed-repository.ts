import { join } from 'path';
import type { PackageReference } from '../../types/index.js';
import type { LocalRepository } from '../ports/host.js';
import { INSTALLED_REPOSITORY_RELATIVE } from '../../constants/index.js';
import { exists, readTextFile } from '../../utils/fs.js';
import { isRecord, parseStrictJson } from '../../utils/json.js';
import { InstalledRepositoryError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Read-only view of the host's installed-packages record
 * (<vendor-dir>/composer/installed.json).
 *
 * Both layouts are accepted: a bare array of packages, or an object with a
 * `packages` array. A missing file means nothing is installed yet.
 */
export class InstalledFilesystemRepository implements LocalRepository {
  constructor(private readonly filePath: string) {}

  static forVendorDir(vendorDir: string): InstalledFilesystemRepository {
    return new InstalledFilesystemRepository(join(vendorDir, INSTALLED_REPOSITORY_RELATIVE));
  }

  getPath(): string {
    return this.filePath;
  }

  async getPackages(): Promise<PackageReference[]> {
    if (!(await exists(this.filePath))) {
      logger.debug(`No installed repository at ${this.filePath}`);
      return [];
    }

    const { value, errors } = parseStrictJson(await readTextFile(this.filePath));
    if (errors.length > 0) {
      throw new InstalledRepositoryError(this.filePath, errors.join('; '));
    }

    const entries = Array.isArray(value)
      ? value
      : isRecord(value) && Array.isArray(value.packages)
        ? value.packages
        : null;
    if (entries === null) {
      throw new InstalledRepositoryError(this.filePath, 'expected an array of packages or an object with a "packages" array');
    }

    return entries.map((entry: unknown, index: number) => {
      if (!isRecord(entry) || typeof entry.name !== 'string' || typeof entry.version !== 'string') {
        throw new InstalledRepositoryError(this.filePath, `package #${index} needs a string "name" and "version"`);
      }
      return { name: entry.name, version: entry.version };
    });
  }
}
