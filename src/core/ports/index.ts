/**
 * Core Ports
 *
 * Re-exports all port interfaces and default implementations.
 * These ports define the boundary between the rewriter and the host
 * package manager.
 */

export type { OutputPort } from './output.js';
export type {
  ApplicationFactory,
  HostConfig,
  InstallationManager,
  InstallOperation,
  LocalRepository,
  MarkAliasOperation,
  PackageManagerHost,
  PackageOperation,
  PoolCreateEvent,
  RepositoryManager,
  UninstallOperation,
  UpdateOperation
} from './host.js';
export { consoleOutput } from './console-output.js';
export { resolveOutput } from './resolve.js';
