/**
 * Dependency rewriter
 *
 * Slipstreams maintained successor packages in place of packages from
 * deprecated namespaces while the host package manager resolves and installs.
 */

export { DependencyRewriterPlugin } from './core/plugin.js';
export type { HookRegistrar, HostEventHandler, HostEventHandlers, HostEventName, HostEventPayloads, PluginActivationOptions } from './core/plugin.js';
export { DependencyRewriter } from './core/rewrite/dependency-rewriter.js';
export type { DependencyRewriterOptions } from './core/rewrite/dependency-rewriter.js';
export { DeprecatedInstallRecord } from './core/rewrite/deprecated-install-record.js';
export { transformPackageName } from './core/rewrite/package-name-transformer.js';
export { isDeprecatedPackage } from './core/rewrite/package-eligibility.js';
export { interceptPool } from './core/rewrite/pool-interceptor.js';
export type { PoolInterceptionResult } from './core/rewrite/pool-interceptor.js';
export { interceptPackageOperation, targetPackageOf } from './core/rewrite/operation-interceptor.js';
export { reconcileAfterInstall } from './core/rewrite/post-install-reconciler.js';
export type { ReconciliationResult } from './core/rewrite/post-install-reconciler.js';
export { runLockOnlyUpdate } from './core/rewrite/lock-file-updater.js';
export { ComposerJsonFile, isRootRequirement, updateRootRequirements } from './core/manifest/composer-json.js';
export { InstalledFilesystemRepository } from './core/repository/installed-repository.js';
export { resolveRewriterConfig, getComposerFile } from './core/config.js';
export * from './core/ports/index.js';
export * from './utils/errors.js';
export * from './types/index.js';
