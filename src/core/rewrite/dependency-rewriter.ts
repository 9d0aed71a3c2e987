import type { PackageReference } from '../../types/index.js';
import type { ApplicationFactory, PackageManagerHost, PackageOperation, PoolCreateEvent } from '../ports/host.js';
import type { OutputPort } from '../ports/output.js';
import { resolveOutput } from '../ports/resolve.js';
import { getComposerFile } from '../config.js';
import { ComposerJsonFile } from '../manifest/composer-json.js';
import { InstalledFilesystemRepository } from '../repository/installed-repository.js';
import { DeprecatedInstallRecord } from './deprecated-install-record.js';
import { interceptPool, type PoolInterceptionResult } from './pool-interceptor.js';
import { interceptPackageOperation } from './operation-interceptor.js';
import { reconcileAfterInstall, type ReconciliationResult } from './post-install-reconciler.js';
import { runLockOnlyUpdate } from './lock-file-updater.js';
import { logger } from '../../utils/logger.js';

export interface DependencyRewriterOptions {
  /** Builds the host CLI used for the nested lock-only update */
  applicationFactory: ApplicationFactory;
  /** Root manifest; defaults to $COMPOSER or ./composer.json */
  composerFile?: string;
  output?: OutputPort;
  /** State shared between the operation interceptor and the reconciler */
  record?: DeprecatedInstallRecord;
}

/**
 * Lifecycle callbacks for one dependency-resolution run.
 *
 * onPoolCreate slipstreams replacements into the candidate pool,
 * onPackageOperation records deprecated packages that still got installed,
 * and onPostInstall cleans them up. While the nested lock-only update runs,
 * every callback is a no-op so the plugin never re-enters itself.
 */
export class DependencyRewriter {
  private readonly applicationFactory: ApplicationFactory;
  private readonly composerFile: string;
  private readonly output: OutputPort;
  private readonly record: DeprecatedInstallRecord;
  private lockUpdateInProgress = false;

  constructor(private readonly host: PackageManagerHost, options: DependencyRewriterOptions) {
    this.applicationFactory = options.applicationFactory;
    this.composerFile = options.composerFile ?? getComposerFile(process.env, process.cwd());
    this.output = resolveOutput(options);
    this.record = options.record ?? new DeprecatedInstallRecord();
  }

  getComposerFile(): string {
    return this.composerFile;
  }

  getDeprecatedPackagesInstalled(): readonly PackageReference[] {
    return this.record.entries();
  }

  isLockUpdateInProgress(): boolean {
    return this.lockUpdateInProgress;
  }

  async onPoolCreate(event: PoolCreateEvent): Promise<PoolInterceptionResult> {
    if (this.skipNested('onPoolCreate')) {
      return { replaced: [] };
    }
    logger.debug('In onPoolCreate');

    const vendorDir = this.host.getConfig().get('vendor-dir');
    return interceptPool(event, {
      installedRepository: InstalledFilesystemRepository.forVendorDir(vendorDir),
      repositoryManager: this.host.getRepositoryManager(),
      output: this.output
    });
  }

  async onPackageOperation(operation: PackageOperation): Promise<boolean> {
    if (this.skipNested('onPackageOperation')) {
      return false;
    }
    logger.debug('In onPackageOperation');

    return interceptPackageOperation(operation, {
      repositoryManager: this.host.getRepositoryManager(),
      record: this.record
    });
  }

  async onPostInstall(): Promise<ReconciliationResult | null> {
    if (this.skipNested('onPostInstall')) {
      return null;
    }
    if (this.record.isEmpty()) {
      logger.debug('No deprecated packages were installed; nothing to reconcile');
      return null;
    }

    const repositoryManager = this.host.getRepositoryManager();
    return reconcileAfterInstall({
      record: this.record,
      manifestFile: new ComposerJsonFile(this.composerFile),
      installationManager: this.host.getInstallationManager(),
      localRepository: repositoryManager.getLocalRepository(),
      output: this.output,
      updateLockFile: workingDir => this.updateLockFile(workingDir)
    });
  }

  /**
   * With a lock-only update the host also installs whatever is missing, which
   * is how the replacements end up on disk.
   */
  private async updateLockFile(workingDir: string): Promise<void> {
    this.lockUpdateInProgress = true;
    try {
      await runLockOnlyUpdate(this.applicationFactory, workingDir);
    } finally {
      this.lockUpdateInProgress = false;
    }
  }

  private skipNested(hook: string): boolean {
    if (this.lockUpdateInProgress) {
      logger.debug(`Skipping ${hook} during the nested lock update`);
    }
    return this.lockUpdateInProgress;
  }
}
