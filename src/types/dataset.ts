/**
 * Dataset models shared by the base builder, the transformation engine and exporters.
 */

import type { GeneratorConfig } from '../engine/config';
import type {
  ChiValue,
  DomainSizes,
  EpsilonValue,
  LambdaValue,
  ThetaValue,
} from './dimensions';

export type StrategyName =
  | 'default'
  | 'increment'
  | 'custom'
  | 'chromatic'
  | 'rhythmic'
  | 'harmonic'
  | 'modal'
  | 'octave';

export type ParamValue = number | string;

/** Parameters as supplied by a caller; validated against the strategy schema. */
export type ParamInput = Readonly<Record<string, ParamValue>>;

/** Parameters after validation, with every schema entry filled in. */
export type ResolvedParams = Readonly<Record<string, ParamValue>>;

export interface Row {
  readonly index: number;
  readonly chi: ChiValue;
  readonly theta: ThetaValue;
  readonly lambda: LambdaValue;
  readonly epsilon: EpsilonValue;
}

export interface BaseDataset {
  readonly n: number;
  readonly config: GeneratorConfig;
  readonly sizes: DomainSizes;
  readonly rows: readonly Row[];
}

export interface TransformedRow extends Row {
  readonly strategy: StrategyName;
  readonly params: ResolvedParams;
  /** Chord built on the source pitch (harmonic strategy only) */
  readonly chord?: readonly ThetaValue[];
}

export interface TransformedDataset {
  /** UUID identifying this transformation run */
  readonly id: string;
  readonly n: number;
  readonly strategy: StrategyName;
  readonly params: ResolvedParams;
  readonly reversible: boolean;
  readonly config: GeneratorConfig;
  readonly sizes: DomainSizes;
  readonly rows: readonly TransformedRow[];
}

/**
 * A single (strategy, params) choice in a batch run.
 */
export interface Selection {
  name: string;
  params?: ParamInput;
}
