import { EXACT_RENAMES, IGNORED_PACKAGES, PREFIX_RULES } from './namespace-rules.js';

/**
 * Map a package name to its replacement in the maintained namespace.
 * Returns the name unchanged when no rule applies, which includes names
 * that are already in a replacement namespace and deprecated packages that
 * never got a successor.
 */
export function transformPackageName(name: string): string {
  if (IGNORED_PACKAGES.has(name)) {
    return name;
  }

  const exact = EXACT_RENAMES.get(name);
  if (exact !== undefined) {
    return exact;
  }

  for (const rule of PREFIX_RULES) {
    if (name.startsWith(rule.from)) {
      return rule.to + name.slice(rule.from.length);
    }
  }

  return name;
}
