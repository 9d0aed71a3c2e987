import { dirname } from 'path';
import type { PackageReference } from '../../types/index.js';
import type { InstallationManager, LocalRepository } from '../ports/host.js';
import type { OutputPort } from '../ports/output.js';
import type { DeprecatedInstallRecord } from './deprecated-install-record.js';
import {
  ComposerJsonFile,
  isRootRequirement,
  requirementSectionsOf,
  updateRootRequirements
} from '../manifest/composer-json.js';
import { transformPackageName } from './package-name-transformer.js';
import { UninstallError, describeError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface PostInstallReconcilerDeps {
  record: DeprecatedInstallRecord;
  manifestFile: ComposerJsonFile;
  installationManager: InstallationManager;
  localRepository: LocalRepository;
  output: OutputPort;
  /** Lock-only update of the project in workingDir */
  updateLockFile(workingDir: string): Promise<void>;
}

export interface ReconciliationResult {
  uninstalled: PackageReference[];
  /** Root requirements that were renamed, as old -> new */
  rewrittenRequirements: Array<{ from: string; to: string }>;
  manifestWritten: boolean;
  lockUpdated: boolean;
}

/**
 * Clean up after deprecated packages that made it onto disk.
 *
 * Root requirements naming them are rewritten to the replacement, each is
 * uninstalled, the manifest is written once if anything changed, and a
 * lock-only update re-resolves the project so the replacements get
 * installed and locked.
 */
export async function reconcileAfterInstall(deps: PostInstallReconcilerDeps): Promise<ReconciliationResult> {
  const result: ReconciliationResult = {
    uninstalled: [],
    rewrittenRequirements: [],
    manifestWritten: false,
    lockUpdated: false
  };

  if (deps.record.isEmpty()) {
    return result;
  }

  const packages = deps.record.entries();
  let definition = await deps.manifestFile.read();
  let definitionChanged = false;
  const failures: Array<{ package: PackageReference; error: unknown }> = [];

  for (const pkg of packages) {
    const replacementName = transformPackageName(pkg.name);

    if (isRootRequirement(definition, pkg.name)) {
      const sections = requirementSectionsOf(definition, pkg.name);
      deps.output.info(
        `Package ${pkg.name} is a root requirement (${sections.join(', ')}); ` +
          `the manifest now requires ${replacementName} directly`
      );
      definition = updateRootRequirements(definition, pkg.name, replacementName);
      definitionChanged = true;
      result.rewrittenRequirements.push({ from: pkg.name, to: replacementName });
    }

    try {
      await deps.installationManager.uninstall(deps.localRepository, { kind: 'uninstall', package: pkg });
      result.uninstalled.push(pkg);
    } catch (error) {
      const described = describeError(error);
      logger.warn(`Failed to uninstall ${pkg.name} (${pkg.version})`, described);
      deps.output.warn(`Could not uninstall ${pkg.name} (${pkg.version}): ${described.message}`);
      failures.push({ package: pkg, error });
    }
  }

  if (definitionChanged) {
    await deps.manifestFile.write(definition);
    result.manifestWritten = true;
  }

  deps.record.clear();

  if (failures.length > 0) {
    throw new UninstallError(failures);
  }

  await deps.updateLockFile(dirname(deps.manifestFile.getPath()));
  result.lockUpdated = true;

  return result;
}
