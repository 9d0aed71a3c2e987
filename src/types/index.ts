/**
 * Common types and interfaces for the dependency rewriter
 */

// Package types

/**
 * A package as observed from the host resolver or installed repository.
 * Identity is the name; the version is whatever the host reported.
 */
export interface PackageReference {
  readonly name: string;
  readonly version: string;
}

// Manifest types

/** Package name -> version constraint */
export type RequirementMap = Record<string, string>;

export type RequirementSection = 'require' | 'require-dev';

export interface ManifestConfig {
  'sort-packages'?: boolean;
  [key: string]: unknown;
}

/**
 * Parsed root manifest (composer.json).
 * Only the keys the rewriter touches are typed; everything else is carried
 * through untouched and in its original order.
 */
export interface ManifestDefinition {
  require?: RequirementMap;
  'require-dev'?: RequirementMap;
  config?: ManifestConfig;
  [key: string]: unknown;
}

// Configuration types

export interface RewriterConfig {
  /** Absolute path to the root manifest */
  composerFile: string;
  logLevel: LogLevel;
}

// Error types
export class RewriterError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'RewriterError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  MANIFEST_ERROR = 'MANIFEST_ERROR',
  INSTALLED_REPOSITORY_ERROR = 'INSTALLED_REPOSITORY_ERROR',
  LOCK_UPDATE_ERROR = 'LOCK_UPDATE_ERROR',
  UNINSTALL_ERROR = 'UNINSTALL_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
