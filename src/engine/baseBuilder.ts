/**
 * Combinatorial Base Builder.
 *
 * Composition rule: the base dataset for N is an N-step walk, stride 1, through the
 * mixed-radix cross product of the four domains. Row i decomposes as
 *
 *   index = ((chi * T + theta) * L + lambda) * E + epsilon
 *
 * with Epsilon varying fastest. rowCount(N) = N, bounded by the capacity C * T * L * E.
 */

import type { BaseDataset, Row } from '../types/dataset';
import type { DomainSizes, RowCoordinates } from '../types/dimensions';
import type { GeneratorConfig } from './config';
import { createGenerators, type GeneratorSet } from './dimensions';
import { DomainOverflowError, InvalidNError, OutOfDomainError } from './errors';

/**
 * Number of distinct rows the configuration can address.
 */
export function capacityOf(sizes: DomainSizes): number {
  return sizes.chi * sizes.theta * sizes.lambda * sizes.epsilon;
}

export function rowCount(n: number): number {
  return n;
}

/**
 * Recomposes a row index from its four domain positions.
 */
export function composeIndex(coords: RowCoordinates, sizes: DomainSizes): number {
  const checks: Array<[keyof RowCoordinates, number]> = [
    ['chi', sizes.chi],
    ['theta', sizes.theta],
    ['lambda', sizes.lambda],
    ['epsilon', sizes.epsilon],
  ];
  for (const [dimension, size] of checks) {
    const value = coords[dimension];
    if (!Number.isInteger(value) || value < 0 || value >= size) {
      throw new OutOfDomainError(dimension, value, size);
    }
  }

  return ((coords.chi * sizes.theta + coords.theta) * sizes.lambda + coords.lambda) * sizes.epsilon + coords.epsilon;
}

/**
 * Splits a row index into its four domain positions.
 */
export function decomposeIndex(index: number, sizes: DomainSizes): RowCoordinates {
  const capacity = capacityOf(sizes);
  if (!Number.isInteger(index) || index < 0 || index >= capacity) {
    throw new OutOfDomainError('index', index, capacity);
  }

  let rest = index;
  const epsilon = rest % sizes.epsilon;
  rest = Math.floor(rest / sizes.epsilon);
  const lambda = rest % sizes.lambda;
  rest = Math.floor(rest / sizes.lambda);
  const theta = rest % sizes.theta;
  const chi = Math.floor(rest / sizes.theta);

  return { chi, theta, lambda, epsilon };
}

export function coordinatesOf(row: Row): RowCoordinates {
  return {
    chi: row.chi.position,
    theta: row.theta.position,
    lambda: row.lambda.position,
    epsilon: row.epsilon.position,
  };
}

/**
 * Materializes the row at `index` from its coordinates.
 */
export function buildRow(index: number, coords: RowCoordinates, generators: GeneratorSet): Row {
  return Object.freeze({
    index,
    chi: generators.chi.valueAt(coords.chi),
    theta: generators.theta.valueAt(coords.theta),
    lambda: generators.lambda.valueAt(coords.lambda),
    epsilon: generators.epsilon.valueAt(coords.epsilon),
  });
}

/**
 * Generates the base dataset for N.
 *
 * @throws InvalidNError if N is negative or not an integer
 * @throws DomainOverflowError if N exceeds the combinatorial capacity or the configured row limit
 */
export function generateBase(n: number, config: Partial<GeneratorConfig> = {}): BaseDataset {
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidNError(n);
  }

  const generators = createGenerators(config);
  const capacity = capacityOf(generators.sizes);
  if (n > capacity) {
    throw new DomainOverflowError(n, capacity, 'the combinatorial capacity');
  }
  if (n > generators.config.maxRows) {
    throw new DomainOverflowError(n, generators.config.maxRows, 'the configured row limit');
  }

  const count = rowCount(n);
  const rows: Row[] = new Array<Row>(count);
  for (let index = 0; index < count; index++) {
    rows[index] = buildRow(index, decomposeIndex(index, generators.sizes), generators);
  }

  return Object.freeze({
    n,
    config: generators.config,
    sizes: generators.sizes,
    rows: Object.freeze(rows),
  });
}
