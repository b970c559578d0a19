import { ManifestEntry } from '../types';

/**
 * Error taxonomy for the generator.
 *
 * Everything except IOFailure is raised while validating or planning, before
 * any file is touched.
 */
export type ErrorKind =
  | 'InvalidArgument'
  | 'NoOperationSelected'
  | 'InvalidEntityType'
  | 'ConflictingArtifact'
  | 'IOFailure'
  | 'InvalidConfiguration'
  | 'Internal';

export class LayergenError extends Error {
  public readonly kind: ErrorKind;
  public readonly code: string;
  public readonly details: Record<string, unknown>;

  constructor(message: string, kind: ErrorKind, code: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'LayergenError';
    this.kind = kind;
    this.code = code;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      kind: this.kind,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export class InvalidArgumentError extends LayergenError {
  constructor(message: string, argument: string, value: string) {
    super(message, 'InvalidArgument', 'E1001', { argument, value });
    this.name = 'InvalidArgumentError';
  }
}

export class NoOperationSelectedError extends LayergenError {
  constructor() {
    super(
      'No operations specified. Use --all or specify individual operations (--create, --read, --update, --delete)',
      'NoOperationSelected',
      'E1002',
    );
    this.name = 'NoOperationSelectedError';
  }
}

export class InvalidEntityTypeError extends LayergenError {
  constructor(value: string, allowed: readonly string[]) {
    super(
      `Invalid entity type: ${value}. Valid options: ${allowed.join(', ')}`,
      'InvalidEntityType',
      'E1003',
      { value, allowed: [...allowed] },
    );
    this.name = 'InvalidEntityTypeError';
  }
}

export class ConflictingArtifactError extends LayergenError {
  public readonly relativePath: string;

  constructor(relativePath: string, existingIntent: string, incomingIntent: string) {
    super(
      `Conflicting artifact at ${relativePath}: ${existingIntent} vs ${incomingIntent}`,
      'ConflictingArtifact',
      'E2001',
      { relativePath, existingIntent, incomingIntent },
    );
    this.name = 'ConflictingArtifactError';
    this.relativePath = relativePath;
  }
}

export class IOFailureError extends LayergenError {
  /** Per-artifact status at the moment emission stopped. */
  public readonly manifest: ManifestEntry[];

  constructor(relativePath: string, cause: string, manifest: ManifestEntry[]) {
    super(`Failed to write ${relativePath}: ${cause}`, 'IOFailure', 'E3001', { relativePath, cause });
    this.name = 'IOFailureError';
    this.manifest = manifest;
  }
}

export class InvalidConfigurationError extends LayergenError {
  public readonly issues: string[];

  constructor(configPath: string, issues: string[]) {
    super(
      `Invalid configuration in ${configPath}:\n${issues.map(i => `  - ${i}`).join('\n')}`,
      'InvalidConfiguration',
      'E4001',
      { configPath, issues },
    );
    this.name = 'InvalidConfigurationError';
    this.issues = issues;
  }
}

export class TemplateError extends LayergenError {
  constructor(message: string, template: string) {
    super(message, 'Internal', 'E9001', { template });
    this.name = 'TemplateError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
