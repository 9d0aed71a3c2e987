import { DEPRECATED_VENDOR_PREFIXES } from './namespace-rules.js';

/**
 * Whether a package name belongs to one of the deprecated namespaces.
 * Matching is case-sensitive and anchored at the start of the name.
 * Packages that never got a successor still count; the transformer maps
 * them to themselves.
 */
export function isDeprecatedPackage(name: string): boolean {
  return DEPRECATED_VENDOR_PREFIXES.some(prefix => name.startsWith(prefix) && name.length > prefix.length);
}
