/**
 * Mod Table Registry.
 *
 * A closed catalog of strategies resolved by name. Strategies are created once at
 * module load and never change afterwards, so the registry can be read from any
 * number of concurrent selections without coordination.
 */

import type { StrategyName } from '../types/dataset';
import { UnknownStrategyError } from './errors';
import {
  createChromaticStrategy,
  createCustomStrategy,
  createDefaultStrategy,
  createHarmonicStrategy,
  createIncrementStrategy,
  createModalStrategy,
  createOctaveStrategy,
  createRhythmicStrategy,
  type ModTableStrategy,
  type StrategyDescriptor,
} from './strategies';

// ============================================================================
// Strategy Factory
// ============================================================================

/**
 * Creates a strategy instance by name.
 *
 * @throws UnknownStrategyError if the name is not in the catalog
 */
export function createStrategy(name: string): ModTableStrategy {
  switch (name) {
    case 'default':
      return createDefaultStrategy();

    case 'increment':
      return createIncrementStrategy();

    case 'custom':
      return createCustomStrategy();

    case 'chromatic':
      return createChromaticStrategy();

    case 'rhythmic':
      return createRhythmicStrategy();

    case 'harmonic':
      return createHarmonicStrategy();

    case 'modal':
      return createModalStrategy();

    case 'octave':
      return createOctaveStrategy();

    default:
      throw new UnknownStrategyError(name);
  }
}

/**
 * Returns all catalog names in menu order.
 */
export function getAvailableStrategyNames(): StrategyName[] {
  return ['default', 'increment', 'custom', 'chromatic', 'rhythmic', 'harmonic', 'modal', 'octave'];
}

/**
 * Strategies that transform a single musical dimension.
 */
export function getMusicalStrategyNames(): StrategyName[] {
  return ['chromatic', 'rhythmic', 'harmonic', 'modal', 'octave'];
}

export function isStrategyName(name: string): name is StrategyName {
  return getAvailableStrategyNames().some((candidate) => candidate === name);
}

const REGISTRY: ReadonlyMap<StrategyName, ModTableStrategy> = new Map(
  getAvailableStrategyNames().map((name): [StrategyName, ModTableStrategy] => [name, Object.freeze(createStrategy(name))])
);

/**
 * Resolves a registered strategy by name.
 *
 * @throws UnknownStrategyError if the name is not registered
 */
export function resolveStrategy(name: string): ModTableStrategy {
  const strategy = isStrategyName(name) ? REGISTRY.get(name) : undefined;
  if (!strategy) {
    throw new UnknownStrategyError(name);
  }
  return strategy;
}

/**
 * Lists the catalog with reversibility flags and parameter schemas.
 */
export function listStrategies(): StrategyDescriptor[] {
  return getAvailableStrategyNames().map((name) => {
    const strategy = resolveStrategy(name);
    return {
      name: strategy.name,
      description: strategy.description,
      focus: strategy.focus,
      reversible: strategy.reversible,
      parameters: strategy.parameters,
    };
  });
}
