// Error taxonomy shared by the store, photo handler and report generator.
// Every error carries enough context (record id, field, path) for the shell
// to build a user-facing message.

export type InspectionErrorCode =
  | 'VALIDATION_ERROR'
  | 'UNSUPPORTED_FORMAT'
  | 'TOO_LARGE'
  | 'NOT_FOUND'
  | 'STORAGE_ERROR'
  | 'RENDER_ERROR';

export interface ErrorContext {
  recordId?: number;
  field?: string;
  path?: string;
  [key: string]: unknown;
}

export class InspectionError extends Error {
  readonly code: InspectionErrorCode;
  readonly context: ErrorContext;

  constructor(code: InspectionErrorCode, message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InspectionError';
    this.code = code;
    this.context = context;
  }
}

export interface FieldIssue {
  field: string;
  message: string;
}

export class ValidationError extends InspectionError {
  readonly issues: FieldIssue[];

  constructor(issues: FieldIssue[], context: ErrorContext = {}) {
    const summary = issues.map((i) => `${i.field}: ${i.message}`).join('; ');
    super('VALIDATION_ERROR', `Validation failed (${summary})`, { field: issues[0]?.field, ...context });
    this.name = 'ValidationError';
    this.issues = issues;
  }

  static single(field: string, message: string, context: ErrorContext = {}) {
    return new ValidationError([{ field, message }], context);
  }
}

export class UnsupportedFormatError extends InspectionError {
  constructor(path: string, detail: string) {
    super('UNSUPPORTED_FORMAT', `Unsupported photo format: ${detail}`, { path });
    this.name = 'UnsupportedFormatError';
  }
}

export class TooLargeError extends InspectionError {
  readonly sizeBytes: number;
  readonly maxBytes: number;

  constructor(path: string, sizeBytes: number, maxBytes: number) {
    const mb = (sizeBytes / (1024 * 1024)).toFixed(1);
    super('TOO_LARGE', `Photo too large: ${mb}MB`, { path, sizeBytes, maxBytes });
    this.name = 'TooLargeError';
    this.sizeBytes = sizeBytes;
    this.maxBytes = maxBytes;
  }
}

export class NotFoundError extends InspectionError {
  constructor(recordId: number) {
    super('NOT_FOUND', `Inspection ${recordId} not found`, { recordId });
    this.name = 'NotFoundError';
  }
}

export class StorageError extends InspectionError {
  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super('STORAGE_ERROR', message, context, { cause });
    this.name = 'StorageError';
  }
}

export class RenderError extends InspectionError {
  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super('RENDER_ERROR', message, context, { cause });
    this.name = 'RenderError';
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
