/**
 * Host Package Manager Ports
 *
 * The narrow slices of the host package manager the rewriter consumes.
 * The host's resolver, repository format, lock-file writer and CLI stay on
 * the other side of these interfaces.
 */

import type { Command } from 'commander';
import type { PackageReference } from '../../types/index.js';

/**
 * Repository lookup across every repository the host knows about.
 */
export interface RepositoryManager {
  /** Concrete package with this name at exactly this version, or null */
  findPackage(name: string, version: string): Promise<PackageReference | null>;

  /** Repository of packages currently installed in the project */
  getLocalRepository(): LocalRepository;
}

export interface LocalRepository {
  getPackages(): Promise<PackageReference[]>;
}

/**
 * Fired once per resolution pass, before the candidate pool is frozen.
 */
export interface PoolCreateEvent {
  getPackages(): PackageReference[];
  setPackages(packages: PackageReference[]): void;
  getUnacceptableFixedPackages(): PackageReference[];
  setUnacceptableFixedPackages(packages: PackageReference[]): void;
}

export interface InstallOperation {
  readonly kind: 'install';
  readonly package: PackageReference;
}

export interface UpdateOperation {
  readonly kind: 'update';
  readonly initialPackage: PackageReference;
  readonly targetPackage: PackageReference;
}

export interface UninstallOperation {
  readonly kind: 'uninstall';
  readonly package: PackageReference;
}

export interface MarkAliasOperation {
  readonly kind: 'mark-alias-installed' | 'mark-alias-uninstalled';
  readonly package: PackageReference;
}

export type PackageOperation = InstallOperation | UpdateOperation | UninstallOperation | MarkAliasOperation;

export interface InstallationManager {
  /** Remove the package from the installed set and from disk */
  uninstall(repository: LocalRepository, operation: UninstallOperation): Promise<void>;
}

export interface HostConfig {
  get(key: 'vendor-dir'): string;
}

/**
 * The running host, as handed to the plugin on activation.
 */
export interface PackageManagerHost {
  getRepositoryManager(): RepositoryManager;
  getInstallationManager(): InstallationManager;
  getConfig(): HostConfig;
}

/**
 * Builds a fresh instance of the host's command-line application.
 * Each nested invocation gets its own program so option state never leaks
 * between runs.
 */
export type ApplicationFactory = () => Command;
