/**
 * Mod Table Strategy Types
 *
 * Defines the Strategy Pattern interface for pluggable mod tables. Every strategy works
 * on domain positions (RowCoordinates), so the engine can materialize, verify and
 * invert rows without knowing what a strategy does musically.
 */

import type { DimensionName, DomainSizes, RowCoordinates } from '../../types/dimensions';
import type { ResolvedParams, StrategyName } from '../../types/dataset';

// ============================================================================
// Parameter Schema
// ============================================================================

export interface IntegerParameterSpec {
  kind: 'integer';
  name: string;
  description: string;
  default: number;
  min: number;
  max: number;
}

export interface OptionParameterSpec {
  kind: 'option';
  name: string;
  description: string;
  default: string;
  options: readonly string[];
}

export type ParameterSpec = IntegerParameterSpec | OptionParameterSpec;

// ============================================================================
// Strategy Interface
// ============================================================================

/**
 * Extra provenance attached to a transformed row.
 * `chord` holds Theta positions of a chord built on the source pitch.
 */
export interface RowAnnotations {
  chord?: readonly number[];
}

/**
 * ModTableStrategy: a named, pure transformation over row coordinates.
 */
export interface ModTableStrategy {
  readonly name: StrategyName;
  readonly description: string;
  /** Dimension the table is weighted towards, or 'all' for uniform tables */
  readonly focus: DimensionName | 'all';
  /** When true, `inverse` is defined and undoes `transform` exactly */
  readonly reversible: boolean;
  readonly parameters: readonly ParameterSpec[];

  /** Must be total over any coordinates within `sizes`. */
  transform(coords: RowCoordinates, params: ResolvedParams, sizes: DomainSizes): RowCoordinates;

  inverse?(coords: RowCoordinates, params: ResolvedParams, sizes: DomainSizes): RowCoordinates;

  /** Provenance computed from the source coordinates. */
  annotate?(source: RowCoordinates, params: ResolvedParams, sizes: DomainSizes): RowAnnotations;

  /** Cross-parameter checks run at selection time; throws InvalidParameterError. */
  validate?(params: ResolvedParams): void;
}

/**
 * Public description of a strategy, as returned by listStrategies().
 */
export interface StrategyDescriptor {
  name: StrategyName;
  description: string;
  focus: DimensionName | 'all';
  reversible: boolean;
  parameters: readonly ParameterSpec[];
}
