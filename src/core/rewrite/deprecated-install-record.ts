import type { PackageReference } from '../../types/index.js';

/**
 * Deprecated packages that were installed or updated during the current run
 * even though a replacement exists. Filled by the operation interceptor and
 * drained by the post-install reconciler.
 *
 * Entries keep arrival order; the same package may appear more than once.
 */
export class DeprecatedInstallRecord {
  private readonly packages: PackageReference[] = [];

  add(pkg: PackageReference): void {
    this.packages.push(pkg);
  }

  entries(): readonly PackageReference[] {
    return [...this.packages];
  }

  isEmpty(): boolean {
    return this.packages.length === 0;
  }

  clear(): void {
    this.packages.length = 0;
  }
}
