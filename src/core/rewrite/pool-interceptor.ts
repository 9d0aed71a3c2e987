import type { PackageReference } from '../../types/index.js';
import type { LocalRepository, PoolCreateEvent, RepositoryManager } from '../ports/host.js';
import type { OutputPort } from '../ports/output.js';
import { isDeprecatedPackage } from './package-eligibility.js';
import { transformPackageName } from './package-name-transformer.js';
import { logger } from '../../utils/logger.js';

export interface PoolInterceptorDeps {
  /** Installed-packages record as it was before this run */
  installedRepository: LocalRepository;
  repositoryManager: RepositoryManager;
  output: OutputPort;
}

export interface PoolInterceptionResult {
  /** Original candidate -> the package slipstreamed in its place */
  replaced: Array<{ original: PackageReference; replacement: PackageReference }>;
}

/**
 * Swap candidates for deprecated packages that are already installed with
 * their replacement at the same version, before the host freezes the pool.
 *
 * The original is added to the unacceptable fixed packages so the solver
 * cannot keep it locked in. A candidate with no replacement at its exact
 * version is left alone.
 */
export async function interceptPool(event: PoolCreateEvent, deps: PoolInterceptorDeps): Promise<PoolInterceptionResult> {
  const result: PoolInterceptionResult = { replaced: [] };

  const installed = await deps.installedRepository.getPackages();
  const installedDeprecated = new Set(
    installed.map(pkg => pkg.name).filter(name => isDeprecatedPackage(name))
  );

  if (installedDeprecated.size === 0) {
    logger.debug('No deprecated packages installed; candidate pool left as is');
    return result;
  }

  const unacceptableFixedPackages = [...event.getUnacceptableFixedPackages()];
  const packages = [...event.getPackages()];

  for (const [index, pkg] of packages.entries()) {
    if (!installedDeprecated.has(pkg.name)) {
      continue;
    }

    const replacementName = transformPackageName(pkg.name);
    if (replacementName === pkg.name) {
      continue;
    }

    const replacement = await deps.repositoryManager.findPackage(replacementName, pkg.version);
    if (replacement === null) {
      logger.debug(`No ${replacementName} at version ${pkg.version}; keeping ${pkg.name} in the pool`);
      continue;
    }

    unacceptableFixedPackages.push(pkg);
    packages[index] = replacement;
    result.replaced.push({ original: pkg, replacement });
    deps.output.info(`Slipstreaming ${pkg.name} => ${replacementName}`);
  }

  event.setUnacceptableFixedPackages(unacceptableFixedPackages);
  event.setPackages(packages);

  return result;
}
