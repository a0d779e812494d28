import type { ProviderIdentity } from './providers/types.js';

export type RecallErrorCode =
  | 'BACKEND_ERROR'
  | 'BACKEND_UNREACHABLE'
  | 'MODEL_UNAVAILABLE'
  | 'MALFORMED_RESPONSE'
  | 'CONFIGURATION'
  | 'CORPUS_EMPTY';

export interface RecallErrorOptions {
  cause?: unknown;
  /** Remediation shown under the message, e.g. "run 'ollama serve' manually" */
  hint?: string;
}

export class RecallError extends Error {
  readonly code: RecallErrorCode;
  readonly hint?: string;

  constructor(code: RecallErrorCode, message: string, options: RecallErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.hint = options.hint;
  }
}

export class BackendError extends RecallError {
  readonly provider: ProviderIdentity;
  readonly status?: number;

  constructor(
    provider: ProviderIdentity,
    message: string,
    options: RecallErrorOptions & { status?: number } = {},
    code: RecallErrorCode = 'BACKEND_ERROR'
  ) {
    super(code, message, options);
    this.provider = provider;
    this.status = options.status;
  }
}

export class BackendUnreachableError extends BackendError {
  constructor(provider: ProviderIdentity, message: string, options: RecallErrorOptions = {}) {
    super(provider, message, options, 'BACKEND_UNREACHABLE');
  }
}

export class ModelUnavailableError extends RecallError {
  readonly modelName: string;

  constructor(modelName: string, message: string, options: RecallErrorOptions = {}) {
    super('MODEL_UNAVAILABLE', message, options);
    this.modelName = modelName;
  }
}

export class MalformedResponseError extends RecallError {
  readonly issues: string[];
  /** Fields that were missing or invalid; empty when the text was not JSON at all */
  readonly fields: string[];

  constructor(message: string, issues: string[], fields: string[] = [], options: RecallErrorOptions = {}) {
    super('MALFORMED_RESPONSE', message, options);
    this.issues = issues;
    this.fields = fields;
  }
}

export class ConfigurationError extends RecallError {
  constructor(message: string, options: RecallErrorOptions = {}) {
    super('CONFIGURATION', message, options);
  }
}

export class CorpusEmptyError extends RecallError {
  readonly directory: string;

  constructor(directory: string, options: RecallErrorOptions = {}) {
    super('CORPUS_EMPTY', `No .md files found in ${directory}`, options);
    this.directory = directory;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
