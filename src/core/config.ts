import { resolve } from 'path';
import { LogLevel, RewriterConfig } from '../types/index.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_MANIFEST_FILE, ENV_VARS } from '../constants/index.js';

/**
 * Configuration for the dependency rewriter.
 * Everything comes from the environment the host was started in; the plugin
 * owns no configuration file.
 */

type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly string[] = Object.values(LogLevel);

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.includes(value);
}

/**
 * Level used before a configuration has been resolved.
 * Unlike resolveRewriterConfig this never throws; an unknown level is ignored.
 */
export function defaultLogLevel(env: Env): LogLevel {
  const explicit = env[ENV_VARS.LOG_LEVEL]?.trim().toLowerCase();
  if (explicit && isLogLevel(explicit)) {
    return explicit;
  }
  if (env[ENV_VARS.VERBOSE] === '1') {
    return LogLevel.DEBUG;
  }
  return env.NODE_ENV === 'development' ? LogLevel.INFO : LogLevel.ERROR;
}

/**
 * Manifest path the host is operating on: $COMPOSER, else composer.json,
 * resolved against the working directory.
 */
export function getComposerFile(env: Env, cwd: string): string {
  const fromEnv = env[ENV_VARS.COMPOSER]?.trim();
  return resolve(cwd, fromEnv || DEFAULT_MANIFEST_FILE);
}

export function resolveRewriterConfig(env: Env = process.env, cwd: string = process.cwd()): RewriterConfig {
  const rawLevel = env[ENV_VARS.LOG_LEVEL]?.trim().toLowerCase();
  if (rawLevel && !isLogLevel(rawLevel)) {
    throw new ConfigError(
      `${ENV_VARS.LOG_LEVEL} must be one of ${LOG_LEVELS.join(', ')} (got '${rawLevel}')`,
      { value: rawLevel }
    );
  }

  return {
    composerFile: getComposerFile(env, cwd),
    logLevel: defaultLogLevel(env)
  };
}
