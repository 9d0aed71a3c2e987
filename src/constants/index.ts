/**
 * Shared constants for the dependency rewriter
 */

export const DEFAULT_MANIFEST_FILE = 'composer.json';

/**
 * Installed-packages record, relative to the configured vendor-dir
 */
export const INSTALLED_REPOSITORY_RELATIVE = 'composer/installed.json';

export const REQUIREMENT_SECTIONS = ['require', 'require-dev'] as const;

export const MANIFEST_INDENT = 4;

export const ENV_VARS = {
  COMPOSER: 'COMPOSER',
  LOG_LEVEL: 'DEPENDENCY_REWRITER_LOG_LEVEL',
  VERBOSE: 'DEPENDENCY_REWRITER_VERBOSE'
} as const;

/**
 * Host lifecycle events the plugin subscribes to
 */
export const HOST_EVENTS = {
  PRE_POOL_CREATE: 'pre-pool-create',
  PRE_PACKAGE_INSTALL: 'pre-package-install',
  PRE_PACKAGE_UPDATE: 'pre-package-update',
  POST_AUTOLOAD_DUMP: 'post-autoload-dump'
} as const;

/**
 * Arguments for the nested lock-only update. --working-dir is appended at call time.
 */
export const LOCK_UPDATE_ARGS = ['update', '--lock', '--no-scripts'] as const;
