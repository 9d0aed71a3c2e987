import path from 'node:path';
import os from 'node:os';
import fs from 'node:fs/promises';
import { Command } from 'commander';

import type { PackageReference } from '../src/types/index.js';
import type {
  HostConfig,
  InstallationManager,
  LocalRepository,
  PackageManagerHost,
  PoolCreateEvent,
  RepositoryManager,
  UninstallOperation
} from '../src/core/ports/host.js';
import type { OutputPort } from '../src/core/ports/output.js';

export function pkg(name: string, version: string): PackageReference {
  return { name, version };
}

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `dependency-rewriter-${prefix}-`));
}

export async function cleanup(paths: string[]): Promise<void> {
  await Promise.all(paths.map(p => fs.rm(p, { recursive: true, force: true })));
}

export async function writeJson(filePath: string, data: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, `${JSON.stringify(data, null, 4)}\n`, 'utf8');
}

export async function readJson(filePath: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(filePath, 'utf8'));
}

export class InMemoryLocalRepository implements LocalRepository {
  constructor(public packages: PackageReference[] = []) {}

  async getPackages(): Promise<PackageReference[]> {
    return [...this.packages];
  }
}

/**
 * Repository manager backed by a flat list of available packages
 */
export class FakeRepositoryManager implements RepositoryManager {
  readonly lookups: Array<{ name: string; version: string }> = [];

  constructor(
    private readonly available: PackageReference[],
    private readonly local: LocalRepository = new InMemoryLocalRepository()
  ) {}

  async findPackage(name: string, version: string): Promise<PackageReference | null> {
    this.lookups.push({ name, version });
    return this.available.find(p => p.name === name && p.version === version) ?? null;
  }

  getLocalRepository(): LocalRepository {
    return this.local;
  }
}

export class RecordingInstallationManager implements InstallationManager {
  readonly uninstalled: Array<{ repository: LocalRepository; operation: UninstallOperation }> = [];

  constructor(private readonly failFor: ReadonlySet<string> = new Set()) {}

  async uninstall(repository: LocalRepository, operation: UninstallOperation): Promise<void> {
    if (this.failFor.has(operation.package.name)) {
      throw new Error(`cannot remove ${operation.package.name}`);
    }
    this.uninstalled.push({ repository, operation });
  }
}

export class FakePoolEvent implements PoolCreateEvent {
  constructor(
    public packages: PackageReference[],
    public unacceptableFixedPackages: PackageReference[] = []
  ) {}

  getPackages(): PackageReference[] {
    return this.packages;
  }

  setPackages(packages: PackageReference[]): void {
    this.packages = packages;
  }

  getUnacceptableFixedPackages(): PackageReference[] {
    return this.unacceptableFixedPackages;
  }

  setUnacceptableFixedPackages(packages: PackageReference[]): void {
    this.unacceptableFixedPackages = packages;
  }
}

export function createHost(options: {
  vendorDir: string;
  repositoryManager: RepositoryManager;
  installationManager: InstallationManager;
}): PackageManagerHost {
  const config: HostConfig = {
    get: () => options.vendorDir
  };
  return {
    getRepositoryManager: () => options.repositoryManager,
    getInstallationManager: () => options.installationManager,
    getConfig: () => config
  };
}

export interface LockUpdateCall {
  lock: boolean;
  scripts: boolean;
  workingDir: string | undefined;
}

/**
 * Stand-in for the host CLI: an "update" command that records how it was
 * invoked and optionally runs extra work (or fails) inside its action.
 */
export function createHostApplication(
  calls: LockUpdateCall[],
  onUpdate?: () => Promise<void>
): () => Command {
  return () => {
    const program = new Command('composer');
    program
      .command('update')
      .option('--lock', 'only update the lock file hash')
      .option('--no-scripts', 'skip scripts')
      .option('--working-dir <dir>', 'working directory')
      .action(async (options: { lock?: boolean; scripts: boolean; workingDir?: string }) => {
        calls.push({ lock: options.lock === true, scripts: options.scripts, workingDir: options.workingDir });
        if (onUpdate) {
          await onUpdate();
        }
      });
    return program;
  };
}

export class RecordingOutput implements OutputPort {
  readonly messages: Array<{ level: 'info' | 'warn'; message: string }> = [];

  info(message: string): void {
    this.messages.push({ level: 'info', message });
  }

  warn(message: string): void {
    this.messages.push({ level: 'warn', message });
  }
}
