/**
 * Common types and interfaces for the modpm CLI application
 */

import type { PackageManifest } from '../core/manifest/manifest.js';

export * from './execution-context.js';

// Configuration types

export interface RegistryConfig {
  name: string;
  url: string;
}

export interface ModpmConfig {
  registries?: RegistryConfig[];
  python?: {
    executable?: string;
  };
  runtime?: {
    command?: string;
  };
  git?: {
    executable?: string;
  };
}

// Install location types

export type InstallLocation = 'local' | 'global' | 'root';

/**
 * Directory set derived from an install location.
 */
export interface InstallDirectories {
  packages: string;
  bin: string;
  pipPrefix: string;
  pipLib: string;
  pipBin: string;
  /** Parent of `packages`; entry scripts resolve modules relative to it. */
  referenceDir: string;
}

export interface InterpreterInfo {
  executable: string;
  version: [number, number, number];
  prefix: string;
  basePrefix: string;
  inVirtualEnv: boolean;
}

// Requirement types

interface RequirementFlags {
  /** Install nested inside the dependent package instead of the shared tree */
  internal: boolean;
  /** Do not generate entry-point scripts */
  pure: boolean;
}

export interface RegistryRequirement extends RequirementFlags {
  type: 'registry';
  name: string;
  selector: string;
}

export interface GitRequirement extends RequirementFlags {
  type: 'git';
  name?: string;
  url: string;
  ref?: string;
  /** Clone submodules too */
  recursive: boolean;
}

export interface PathRequirement extends RequirementFlags {
  type: 'path';
  name?: string;
  path: string;
  /** Develop-mode: write a link marker instead of copying files */
  link: boolean;
}

export type Requirement = RegistryRequirement | GitRequirement | PathRequirement;

/**
 * Object form of a dependency entry in modpm.yml.
 */
export interface RequirementObject {
  version?: string;
  git?: string;
  ref?: string;
  recursive?: boolean;
  path?: string;
  link?: boolean;
  internal?: boolean;
  pure?: boolean;
}

export type DependencySpec = string | RequirementObject;

// Manifest file types

export interface ManifestDist {
  include?: string[];
  exclude?: string[];
}

export interface ManifestData {
  name: string;
  version: string;
  description?: string;
  author?: string;
  license?: string;
  dependencies?: Record<string, DependencySpec>;
  'dev-dependencies'?: Record<string, DependencySpec>;
  'pip-dependencies'?: Record<string, string>;
  'dev-pip-dependencies'?: Record<string, string>;
  bin?: Record<string, string>;
  scripts?: Record<string, string>;
  dist?: ManifestDist;
  'resolve-root'?: string;
  [key: string]: unknown;
}

// Installer types

export interface PackageIdentity {
  name: string;
  version: string;
}

export interface InstallerOptions {
  location?: InstallLocation;
  /** Reinstall packages that are already present */
  upgrade?: boolean;
  /** Re-verify dependencies of already installed packages */
  recursive?: boolean;
  /** Remove directories without a manifest on uninstall */
  force?: boolean;
  /** Pass --verbose to pip */
  verbose?: boolean;
  /** Install pip packages with --target <pipLib> instead of --prefix */
  pipUseTargetOption?: boolean;
  pipIgnoreInstalled?: boolean;
}

export interface InstallFromDirectoryOptions {
  develop?: boolean;
  dev?: boolean;
  expect?: PackageIdentity;
  /** Rename the source directory into place instead of copying */
  move?: boolean;
  internal?: boolean;
  pure?: boolean;
}

// Result types

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class ModpmError extends Error {
  public code: ErrorCodes;
  public details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCodes, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ModpmError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  NOT_FOUND = 'NOT_FOUND',
  NO_MANIFEST = 'NO_MANIFEST',
  INVALID_MANIFEST = 'INVALID_MANIFEST',
  IDENTITY_MISMATCH = 'IDENTITY_MISMATCH',
  PACKAGE_NOT_FOUND = 'PACKAGE_NOT_FOUND',
  CLONE_FAILED = 'CLONE_FAILED',
  DOWNLOAD_FAILED = 'DOWNLOAD_FAILED',
  BRIDGE_INSTALL_FAILED = 'BRIDGE_INSTALL_FAILED',
  HOOK_FAILED = 'HOOK_FAILED',
  UNINSTALL_FAILED = 'UNINSTALL_FAILED',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

/**
 * Outcome of an engine operation. Expected failures are reported here rather
 * than thrown.
 */
export interface OperationResult {
  success: boolean;
  error?: ModpmError;
}

export interface InstallResult extends OperationResult {
  manifest?: PackageManifest;
}

export interface AcquireResult extends OperationResult {
  identity?: PackageIdentity;
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
