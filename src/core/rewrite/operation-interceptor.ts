import type { PackageReference } from '../../types/index.js';
import type { PackageOperation, RepositoryManager } from '../ports/host.js';
import type { DeprecatedInstallRecord } from './deprecated-install-record.js';
import { isDeprecatedPackage } from './package-eligibility.js';
import { transformPackageName } from './package-name-transformer.js';
import { logger } from '../../utils/logger.js';

export interface OperationInterceptorDeps {
  repositoryManager: RepositoryManager;
  record: DeprecatedInstallRecord;
}

/**
 * Package an install or update operation is about to put on disk.
 * Other operation kinds carry nothing to rewrite.
 */
export function targetPackageOf(operation: PackageOperation): PackageReference | null {
  switch (operation.kind) {
    case 'install':
      return operation.package;
    case 'update':
      return operation.targetPackage;
    default:
      return null;
  }
}

/**
 * Safety net for deprecated packages the pool interception missed.
 *
 * The install itself goes ahead; when a replacement exists at the same
 * version the original is recorded so the post-install reconciler can swap it
 * out afterwards. Returns whether the package was recorded.
 */
export async function interceptPackageOperation(
  operation: PackageOperation,
  deps: OperationInterceptorDeps
): Promise<boolean> {
  const pkg = targetPackageOf(operation);
  if (pkg === null) {
    logger.debug(`Exiting; operation of type ${operation.kind} not supported`);
    return false;
  }

  const { name, version } = pkg;
  if (!isDeprecatedPackage(name)) {
    logger.debug(`Exiting; package "${name}" does not have a replacement`);
    return false;
  }

  const replacementName = transformPackageName(name);
  if (replacementName === name) {
    logger.debug(`Exiting; while package "${name}" is deprecated, it does not have a replacement`);
    return false;
  }

  const replacement = await deps.repositoryManager.findPackage(replacementName, version);
  if (replacement === null) {
    logger.debug(`Exiting; no replacement package found for package "${replacementName}" with version ${version}`);
    return false;
  }

  logger.info(`Could replace package ${name} with package ${replacementName}, using version ${version}`);
  deps.record.add(pkg);
  return true;
}
