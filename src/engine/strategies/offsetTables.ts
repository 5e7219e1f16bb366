/**
 * Offset tables: `default` and `increment`.
 *
 * Each dimension is shifted by a fixed offset (scaled by `step`) modulo its domain size,
 * which is a bijection on every dimension.
 */

import type { DomainSizes, RowCoordinates } from '../../types/dimensions';
import type { ResolvedParams, StrategyName } from '../../types/dataset';
import { mod, readInteger } from './params';
import type { ModTableStrategy, ParameterSpec } from './types';

const STEP_PARAMETER: ParameterSpec = {
  kind: 'integer',
  name: 'step',
  description: 'Multiplier applied to every offset',
  default: 1,
  min: 1,
  max: 64,
};

function shift(coords: RowCoordinates, offsets: RowCoordinates, factor: number, sizes: DomainSizes): RowCoordinates {
  return {
    chi: mod(coords.chi + offsets.chi * factor, sizes.chi),
    theta: mod(coords.theta + offsets.theta * factor, sizes.theta),
    lambda: mod(coords.lambda + offsets.lambda * factor, sizes.lambda),
    epsilon: mod(coords.epsilon + offsets.epsilon * factor, sizes.epsilon),
  };
}

function createOffsetStrategy(name: StrategyName, description: string, offsets: RowCoordinates): ModTableStrategy {
  return {
    name,
    description,
    focus: 'all',
    reversible: true,
    parameters: [STEP_PARAMETER],
    transform(coords: RowCoordinates, params: ResolvedParams, sizes: DomainSizes): RowCoordinates {
      return shift(coords, offsets, readInteger(params, name, 'step'), sizes);
    },
    inverse(coords: RowCoordinates, params: ResolvedParams, sizes: DomainSizes): RowCoordinates {
      return shift(coords, offsets, -readInteger(params, name, 'step'), sizes);
    },
  };
}

export function createDefaultStrategy(): ModTableStrategy {
  return createOffsetStrategy(
    'default',
    'Standard offsets (chi -1, theta +1, lambda +2, epsilon +3)',
    { chi: -1, theta: 1, lambda: 2, epsilon: 3 }
  );
}

export function createIncrementStrategy(): ModTableStrategy {
  return createOffsetStrategy(
    'increment',
    'Incremental offsets (chi +0, theta +2, lambda +4, epsilon +6)',
    { chi: 0, theta: 2, lambda: 4, epsilon: 6 }
  );
}
