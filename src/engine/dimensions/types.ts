/**
 * Dimension generator contract.
 *
 * Each generator enumerates a closed domain: positions [0, size) map one-to-one
 * onto values, and values map back onto their positions.
 */

import type { DimensionName } from '../../types/dimensions';
import { OutOfDomainError } from '../errors';

export interface DimensionGenerator<T extends { position: number }> {
  readonly dimension: DimensionName;
  readonly size: number;

  /** Returns the value at a position; throws OutOfDomainError outside [0, size). */
  valueAt(position: number): T;

  /** Returns the position of a value; throws OutOfDomainError for foreign values. */
  indexOf(value: T): number;

  /** All domain values in position order. */
  values(): readonly T[];
}

export function assertPosition(dimension: DimensionName, position: number, size: number): number {
  if (!Number.isInteger(position) || position < 0 || position >= size) {
    throw new OutOfDomainError(dimension, position, size);
  }
  return position;
}

/**
 * Builds a generator over a precomputed, frozen value table.
 * `matches` decides whether a value handed to indexOf is the canonical one at its position.
 */
export function createTableGenerator<T extends { position: number }>(
  dimension: DimensionName,
  table: readonly T[],
  matches: (candidate: T, canonical: T) => boolean
): DimensionGenerator<T> {
  table.forEach((value) => Object.freeze(value));
  const frozen: readonly T[] = Object.freeze([...table]);
  const size = frozen.length;

  return {
    dimension,
    size,
    valueAt(position: number): T {
      return frozen[assertPosition(dimension, position, size)];
    },
    indexOf(value: T): number {
      const position = assertPosition(dimension, value.position, size);
      if (!matches(value, frozen[position])) {
        throw new OutOfDomainError(dimension, value, size);
      }
      return position;
    },
    values(): readonly T[] {
      return frozen;
    },
  };
}
