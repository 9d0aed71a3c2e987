/**
 * Deprecated namespaces and their maintained successors.
 */

export interface PrefixRule {
  readonly from: string;
  readonly to: string;
}

/**
 * Organisations whose packages are candidates for substitution
 */
export const DEPRECATED_VENDOR_PREFIXES = ['zendframework/', 'zfcampus/'] as const;

/**
 * Packages under a deprecated vendor that were never migrated
 */
export const IGNORED_PACKAGES: ReadonlySet<string> = new Set([
  'zendframework/zend-debug',
  'zendframework/zend-version',
  'zendframework/zendservice-apple-apns',
  'zendframework/zendservice-google-gcm',
  'zfcampus/zf-apigility-example',
  'zfcampus/zf-angular',
  'zfcampus/zf-console'
]);

/**
 * Renames that don't follow the prefix scheme. Checked before PREFIX_RULES.
 */
export const EXACT_RENAMES: ReadonlyMap<string, string> = new Map([
  ['zendframework/zend-expressive-zendrouter', 'mezzio/mezzio-laminasrouter'],
  ['zendframework/zend-expressive-zendviewrenderer', 'mezzio/mezzio-laminasviewrenderer'],
  [
    'zendframework/zend-expressive-authentication-zendauthentication',
    'mezzio/mezzio-authentication-laminasauthentication'
  ]
]);

/**
 * First match wins, so more specific prefixes come first.
 */
export const PREFIX_RULES: readonly PrefixRule[] = [
  { from: 'zendframework/zend-problem-details', to: 'mezzio/mezzio-problem-details' },
  { from: 'zendframework/zend-expressive', to: 'mezzio/mezzio' },
  { from: 'zfcampus/zf-apigility', to: 'laminas-api-tools/api-tools' },
  { from: 'zfcampus/zf-composer-autoloading', to: 'laminas/laminas-composer-autoloading' },
  { from: 'zfcampus/zf-development-mode', to: 'laminas/laminas-development-mode' },
  { from: 'zfcampus/zf-deploy', to: 'laminas/laminas-deploy' },
  { from: 'zfcampus/zf-', to: 'laminas-api-tools/api-tools-' },
  { from: 'zendframework/zend-', to: 'laminas/laminas-' },
  { from: 'zendframework/', to: 'laminas/laminas-' }
];
