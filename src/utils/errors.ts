import type { FailureKind, Violation } from '../ir/types.js';

export class StructuringError extends Error {
  constructor(
    message: string,
    public readonly code: string = 'malformed-query',
  ) {
    super(message);
    this.name = 'StructuringError';
  }
}

export class EmptyQueryError extends StructuringError {
  constructor() {
    super('Query is empty', 'empty-query');
    this.name = 'EmptyQueryError';
  }
}

export class GenerationError extends Error {
  constructor(
    message: string,
    public readonly ruleId: string,
    public readonly offendingToken: string = '',
  ) {
    super(message);
    this.name = 'GenerationError';
  }
}

/** Policy rejection. An expected outcome, recorded like any other. */
export class ValidationRejection extends Error {
  constructor(public readonly violations: readonly Violation[]) {
    super(`Code rejected: ${violations.map((v) => v.ruleId).join(', ')}`);
    this.name = 'ValidationRejection';
  }
}

export class ExecutionTimeout extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Execution exceeded ${timeoutMs}ms`);
    this.name = 'ExecutionTimeout';
  }
}

export class ExecutionRuntimeFailure extends Error {
  constructor(
    message: string,
    public readonly kind: FailureKind,
  ) {
    super(message);
    this.name = 'ExecutionRuntimeFailure';
  }
}

export class PersistenceError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly operation: 'read' | 'write' | 'lock',
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'PersistenceError';
  }
}

export class DatasetError extends Error {
  constructor(
    message: string,
    public readonly code: string = 'load-failed',
    public readonly path?: string,
  ) {
    super(message);
    this.name = 'DatasetError';
  }
}

export class UnsupportedFormatError extends DatasetError {
  constructor(public readonly extension: string, path?: string) {
    super(`Unsupported file format: ${extension || '(none)'}`, 'unsupported-format', path);
    this.name = 'UnsupportedFormatError';
  }
}

export class InvalidDataError extends DatasetError {
  constructor(message: string, path?: string) {
    super(message, 'invalid-data', path);
    this.name = 'InvalidDataError';
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class SessionBusyError extends Error {
  constructor() {
    super('A turn is already in progress');
    this.name = 'SessionBusyError';
  }
}

export class SnapshotError extends Error {
  constructor(
    message: string,
    public readonly step: 'init' | 'add' | 'commit',
  ) {
    super(message);
    this.name = 'SnapshotError';
  }
}

export class SessionClosedError extends Error {
  constructor() {
    super('The session has ended');
    this.name = 'SessionClosedError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
