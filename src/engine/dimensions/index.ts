/**
 * Dimension generators for a configuration.
 */

import type {
  ChiValue,
  DomainSizes,
  EpsilonValue,
  LambdaValue,
  ThetaValue,
} from '../../types/dimensions';
import { resolveGeneratorConfig, type GeneratorConfig } from '../config';
import { createChiGenerator } from './chi';
import { createEpsilonGenerator } from './epsilon';
import { createLambdaGenerator } from './lambda';
import { createThetaGenerator } from './theta';
import type { DimensionGenerator } from './types';

export interface GeneratorSet {
  readonly config: GeneratorConfig;
  readonly sizes: DomainSizes;
  readonly chi: DimensionGenerator<ChiValue>;
  readonly theta: DimensionGenerator<ThetaValue>;
  readonly lambda: DimensionGenerator<LambdaValue>;
  readonly epsilon: DimensionGenerator<EpsilonValue>;
}

type DomainGenerators = Omit<GeneratorSet, 'config'>;

const cache = new Map<string, DomainGenerators>();

function buildDomainGenerators(config: GeneratorConfig): DomainGenerators {
  const chi = createChiGenerator(config.chiDomainSize);
  const theta = createThetaGenerator();
  const lambda = createLambdaGenerator();
  const epsilon = createEpsilonGenerator(config.epsilonCatalogSize);

  return Object.freeze({
    sizes: Object.freeze({ chi: chi.size, theta: theta.size, lambda: lambda.size, epsilon: epsilon.size }),
    chi,
    theta,
    lambda,
    epsilon,
  });
}

/**
 * Creates the four generators for a configuration.
 * Generators depend only on the domain sizes and are shared between calls; the
 * resolved config is attached per call.
 */
export function createGenerators(partial: Partial<GeneratorConfig> = {}): GeneratorSet {
  const config = resolveGeneratorConfig(partial);
  const key = `${config.chiDomainSize}:${config.epsilonCatalogSize}`;
  let generators = cache.get(key);
  if (!generators) {
    generators = buildDomainGenerators(config);
    cache.set(key, generators);
  }
  return Object.freeze({ ...generators, config });
}

export type { DimensionGenerator } from './types';
export { createChiGenerator } from './chi';
export { createThetaGenerator, lineOfFifthsIndex, positionFromLineOfFifths, shiftByFifths, NOTE_LETTERS } from './theta';
export { createLambdaGenerator } from './lambda';
export { createEpsilonGenerator, epsilonPositionOf, MODIFIER_CATALOG } from './epsilon';
