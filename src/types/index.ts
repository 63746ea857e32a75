/**
 * Common types and interfaces for the pkgdeck CLI application
 */

export * from './execution-context.js';

// Package manager types

/**
 * Backend package managers pkgdeck knows how to drive.
 * `unsupported` carries the configuration value that failed to resolve.
 */
export type ManagerKind =
  | { kind: 'apt-get' }
  | { kind: 'pacman' }
  | { kind: 'unsupported'; raw: string };

export type SupportedManagerName = Exclude<ManagerKind['kind'], 'unsupported'>;

/** Opaque token naming one installable unit. */
export type PackageId = string;

export interface Category {
  readonly id: string;
  readonly packages: readonly PackageId[];
}

/**
 * Category id → chosen subset of that category's packages.
 * Only the selection session writes to it.
 */
export type SelectionSet = Map<string, PackageId[]>;

export interface RemoveOrphansResult {
  removed: PackageId[];
}

// Install orchestration types

export type CategoryOutcome =
  | { status: 'skipped-empty' }
  | { status: 'succeeded'; packages: PackageId[] }
  | { status: 'failed'; packages: PackageId[]; reason: string };

export interface CategoryReportEntry {
  categoryId: string;
  outcome: CategoryOutcome;
}

export interface InstallReport {
  entries: CategoryReportEntry[];
}

// Configuration types

export type DialogBackend = 'clack' | 'dialog' | 'whiptail';

export interface PkgdeckConfigFile {
  manager?: string;
  catalog?: string;
  dialog?: string;
  assumeYes?: boolean;
  sudo?: string;
}

export interface PkgdeckConfig {
  readonly manager: ManagerKind;
  readonly catalogPath: string;
  readonly dialog: DialogBackend;
  readonly assumeYes: boolean;
  /** Command used to elevate privileged invocations; empty when already root. */
  readonly privilegeCommand: string;
}

export interface CommandResult {
  success: boolean;
  error?: string;
}

// Error types
export class PkgdeckError extends Error {
  public code: string;
  public details?: unknown;

  constructor(message: string, code: string, details?: unknown) {
    super(message);
    this.name = 'PkgdeckError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  UNSUPPORTED_MANAGER = 'UNSUPPORTED_MANAGER',
  DIALOG_UNAVAILABLE = 'DIALOG_UNAVAILABLE',
  PARTIAL_INSTALL_FAILURE = 'PARTIAL_INSTALL_FAILURE',
  COMMAND_FAILED = 'COMMAND_FAILED',
  CATALOG_ERROR = 'CATALOG_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
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
