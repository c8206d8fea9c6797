/**
 * Compile-time diagnostics raised while transpiling a workflow script.
 *
 * Every error is fatal for the current compilation: the pipeline stops at the first one and
 * nothing is written. The CLI renders them as `<ErrorKind>: <message> (<file>:<line>:<column>)`.
 */

export interface SourceLocation {
  file: string;
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
}

export type TranspileErrorKind =
  | 'SignatureError'
  | 'SlotContractError'
  | 'UnboundReferenceError'
  | 'UnsupportedExpressionError'
  | 'UnsupportedConstructError'
  | 'UnsupportedAccessPatternError'
  | 'DuplicateDeclarationError';

export function formatLocation(location: SourceLocation): string {
  return `${location.file}:${location.line}:${location.column}`;
}

export abstract class TranspileError extends Error {
  abstract readonly kind: TranspileErrorKind;
  readonly location?: SourceLocation;

  constructor(message: string, location?: SourceLocation) {
    super(message);
    this.location = location;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * One-line diagnostic as printed by the CLI
   */
  toDiagnostic(): string {
    const where = this.location ? ` (${formatLocation(this.location)})` : '';
    return `${this.kind}: ${this.message}${where}`;
  }
}

/** A step or entry function whose parameter list does not match the dialect. */
export class SignatureError extends TranspileError {
  readonly kind = 'SignatureError';
  name = 'SignatureError';
}

/** A slot read, written or provided in a way its declaration does not allow. */
export class SlotContractError extends TranspileError {
  readonly kind = 'SlotContractError';
  name = 'SlotContractError';
}

export class UnboundReferenceError extends TranspileError {
  readonly kind = 'UnboundReferenceError';
  name = 'UnboundReferenceError';
}

export class UnsupportedExpressionError extends TranspileError {
  readonly kind = 'UnsupportedExpressionError';
  name = 'UnsupportedExpressionError';
}

export class UnsupportedConstructError extends TranspileError {
  readonly kind = 'UnsupportedConstructError';
  name = 'UnsupportedConstructError';
}

/** Accessor usage the body transformer cannot match as a direct slot access chain. */
export class UnsupportedAccessPatternError extends TranspileError {
  readonly kind = 'UnsupportedAccessPatternError';
  name = 'UnsupportedAccessPatternError';
}

export class DuplicateDeclarationError extends TranspileError {
  readonly kind = 'DuplicateDeclarationError';
  name = 'DuplicateDeclarationError';
}

/**
 * Render any thrown value as a CLI diagnostic line
 */
export function formatDiagnostic(error: unknown): string {
  if (error instanceof TranspileError) {
    return error.toDiagnostic();
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}
