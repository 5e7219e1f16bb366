/**
 * Transformation core: applies mod tables to base datasets and inverts the results.
 *
 * Every selection is resolved (strategy + parameters) before a single row is touched,
 * and datasets are only returned once fully built, so a failed call never leaves
 * partial output behind.
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  BaseDataset,
  ParamInput,
  ResolvedParams,
  Row,
  Selection,
  TransformedDataset,
  TransformedRow,
} from '../types/dataset';
import type { RowCoordinates } from '../types/dimensions';
import { buildRow, capacityOf, composeIndex, coordinatesOf } from './baseBuilder';
import { createGenerators, type GeneratorSet } from './dimensions';
import {
  BatchSelectionError,
  ModTableError,
  NotReversibleError,
  OutOfDomainError,
} from './errors';
import { resolveStrategy } from './registry';
import { resolveParams, type ModTableStrategy } from './strategies';

/**
 * A selection whose strategy and parameters have been resolved and validated.
 */
export interface PreparedSelection {
  readonly strategy: ModTableStrategy;
  readonly params: ResolvedParams;
}

/**
 * Resolves a selection against the registry.
 *
 * @throws UnknownStrategyError, UnknownParameterError or InvalidParameterError
 */
export function prepareSelection(selection: Selection): PreparedSelection {
  const strategy = resolveStrategy(selection.name);
  return { strategy, params: resolveParams(strategy, selection.params) };
}

/**
 * Resolves every selection in order; the first failure aborts with its index.
 */
export function prepareSelections(selections: readonly Selection[]): PreparedSelection[] {
  return selections.map((selection, index) => {
    try {
      return prepareSelection(selection);
    } catch (error) {
      if (error instanceof ModTableError) {
        throw new BatchSelectionError(index, selection, error, []);
      }
      throw error;
    }
  });
}

/**
 * Applies a prepared selection to one row.
 */
export function transformRow(row: Row, prepared: PreparedSelection, generators: GeneratorSet): TransformedRow {
  const { strategy, params } = prepared;
  const source = coordinatesOf(row);
  const target = strategy.transform(source, params, generators.sizes);
  const annotations = strategy.annotate?.(source, params, generators.sizes);

  const transformed: TransformedRow = {
    ...buildRow(row.index, target, generators),
    strategy: strategy.name,
    params,
    ...(annotations?.chord
      ? { chord: Object.freeze(annotations.chord.map((position) => generators.theta.valueAt(position))) }
      : {}),
  };
  return Object.freeze(transformed);
}

/**
 * Wraps fully built rows into a dataset tagged with its provenance.
 */
export function assembleDataset(
  base: BaseDataset,
  prepared: PreparedSelection,
  rows: readonly TransformedRow[]
): TransformedDataset {
  return Object.freeze({
    id: uuidv4(),
    n: base.n,
    strategy: prepared.strategy.name,
    params: prepared.params,
    reversible: prepared.strategy.reversible,
    config: base.config,
    sizes: base.sizes,
    rows: Object.freeze([...rows]),
  });
}

function transformDataset(base: BaseDataset, prepared: PreparedSelection): TransformedDataset {
  const generators = createGenerators(base.config);
  const rows = base.rows.map((row) => transformRow(row, prepared, generators));
  return assembleDataset(base, prepared, rows);
}

// ============================================================================
// Public operations
// ============================================================================

/**
 * Applies one mod table to every row of a base dataset.
 *
 * @throws UnknownStrategyError, UnknownParameterError or InvalidParameterError before any row is processed
 */
export function applyStrategy(base: BaseDataset, name: string, params: ParamInput = {}): TransformedDataset {
  return transformDataset(base, prepareSelection({ name, params }));
}

/**
 * Applies several selections independently; results follow input order.
 *
 * @throws BatchSelectionError naming the first failing selection and the datasets completed before it
 */
export function applyBatch(base: BaseDataset, selections: readonly Selection[]): TransformedDataset[] {
  const prepared = prepareSelections(selections);
  const completed: TransformedDataset[] = [];

  prepared.forEach((selection, index) => {
    try {
      completed.push(transformDataset(base, selection));
    } catch (error) {
      if (error instanceof ModTableError) {
        throw new BatchSelectionError(index, selections[index], error, [...completed]);
      }
      throw error;
    }
  });

  return completed;
}

function coordinatesFromValues(row: Row, generators: GeneratorSet): RowCoordinates {
  return {
    chi: generators.chi.indexOf(row.chi),
    theta: generators.theta.indexOf(row.theta),
    lambda: generators.lambda.indexOf(row.lambda),
    epsilon: generators.epsilon.indexOf(row.epsilon),
  };
}

/**
 * Recovers the base dataset from a dataset produced by a reversible strategy.
 *
 * @throws NotReversibleError if the originating strategy has no inverse
 * @throws OutOfDomainError if a row holds foreign values or does not map back onto its index
 */
export function invert(transformed: TransformedDataset): BaseDataset {
  const strategy = resolveStrategy(transformed.strategy);
  const inverse = strategy.inverse;
  if (!transformed.reversible || !strategy.reversible || !inverse) {
    throw new NotReversibleError(transformed.strategy);
  }

  const params = resolveParams(strategy, transformed.params);
  const generators = createGenerators(transformed.config);
  const capacity = capacityOf(generators.sizes);

  const rows = transformed.rows.map((row) => {
    const source = inverse(coordinatesFromValues(row, generators), params, generators.sizes);
    if (composeIndex(source, generators.sizes) !== row.index) {
      throw new OutOfDomainError('index', row.index, capacity);
    }
    return buildRow(row.index, source, generators);
  });

  return Object.freeze({
    n: transformed.n,
    config: generators.config,
    sizes: generators.sizes,
    rows: Object.freeze(rows),
  });
}

export interface ReversibilityReport {
  strategy: string;
  params: ResolvedParams;
  checkedRows: number;
  /** Indices of rows where inverse(transform(row)) differs from the row */
  mismatches: number[];
}

/**
 * Mechanically checks inverse(transform(row)) === row over a dataset.
 *
 * @throws NotReversibleError for strategies without an inverse
 */
export function checkReversibility(base: BaseDataset, name: string, params: ParamInput = {}): ReversibilityReport {
  const { strategy, params: resolved } = prepareSelection({ name, params });
  const inverse = strategy.inverse;
  if (!strategy.reversible || !inverse) {
    throw new NotReversibleError(strategy.name);
  }

  const mismatches: number[] = [];
  for (const row of base.rows) {
    const source = coordinatesOf(row);
    const restored = inverse(strategy.transform(source, resolved, base.sizes), resolved, base.sizes);
    if (composeIndex(restored, base.sizes) !== row.index) {
      mismatches.push(row.index);
    }
  }

  return { strategy: strategy.name, params: resolved, checkedRows: base.rows.length, mismatches };
}
