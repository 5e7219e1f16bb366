/**
 * Error taxonomy for generation and transformation.
 *
 * Every failure raised by the engine is a ModTableError carrying a stable `code`,
 * so drivers can branch on the kind of failure without string matching.
 */

import type { DimensionName } from '../types/dimensions';
import type { Selection, TransformedDataset } from '../types/dataset';

export type ModTableErrorCode =
  | 'INVALID_N'
  | 'DOMAIN_OVERFLOW'
  | 'OUT_OF_DOMAIN'
  | 'UNKNOWN_STRATEGY'
  | 'UNKNOWN_PARAMETER'
  | 'INVALID_PARAMETER'
  | 'NOT_REVERSIBLE'
  | 'INVALID_CONFIG'
  | 'BATCH_SELECTION'
  | 'CANCELLED';

export class ModTableError extends Error {
  readonly code: ModTableErrorCode;

  constructor(code: ModTableErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = 'ModTableError';
  }
}

export class InvalidNError extends ModTableError {
  constructor(readonly n: number) {
    super('INVALID_N', `N must be a non-negative integer, got ${n}`);
    this.name = 'InvalidNError';
  }
}

export class DomainOverflowError extends ModTableError {
  constructor(readonly n: number, readonly limit: number, reason: string) {
    super('DOMAIN_OVERFLOW', `N=${n} exceeds ${reason} (${limit})`);
    this.name = 'DomainOverflowError';
  }
}

export class OutOfDomainError extends ModTableError {
  constructor(readonly dimension: DimensionName | 'index', readonly value: unknown, readonly size: number) {
    super('OUT_OF_DOMAIN', `${dimension} value ${JSON.stringify(value)} is outside its domain [0, ${size})`);
    this.name = 'OutOfDomainError';
  }
}

export class UnknownStrategyError extends ModTableError {
  constructor(readonly strategy: string) {
    super('UNKNOWN_STRATEGY', `Unknown mod table strategy: ${strategy}`);
    this.name = 'UnknownStrategyError';
  }
}

export class UnknownParameterError extends ModTableError {
  constructor(readonly strategy: string, readonly parameter: string) {
    super('UNKNOWN_PARAMETER', `Strategy '${strategy}' has no parameter '${parameter}'`);
    this.name = 'UnknownParameterError';
  }
}

export class InvalidParameterError extends ModTableError {
  constructor(readonly strategy: string, readonly parameter: string, detail: string) {
    super('INVALID_PARAMETER', `Invalid value for '${strategy}.${parameter}': ${detail}`);
    this.name = 'InvalidParameterError';
  }
}

export class NotReversibleError extends ModTableError {
  constructor(readonly strategy: string) {
    super('NOT_REVERSIBLE', `Strategy '${strategy}' is not reversible`);
    this.name = 'NotReversibleError';
  }
}

export class InvalidConfigError extends ModTableError {
  constructor(readonly field: string, detail: string) {
    super('INVALID_CONFIG', `Invalid configuration '${field}': ${detail}`);
    this.name = 'InvalidConfigError';
  }
}

export class BatchSelectionError extends ModTableError {
  constructor(
    readonly selectionIndex: number,
    readonly selection: Selection,
    readonly cause: ModTableError,
    readonly completed: readonly TransformedDataset[]
  ) {
    super(
      'BATCH_SELECTION',
      `Selection #${selectionIndex} ('${selection.name}') failed: ${cause.message}`
    );
    this.name = 'BatchSelectionError';
  }
}

export class CancelledError extends ModTableError {
  constructor(readonly completed: readonly TransformedDataset[]) {
    super('CANCELLED', `Run aborted after ${completed.length} completed selection(s)`);
    this.name = 'CancelledError';
  }
}
