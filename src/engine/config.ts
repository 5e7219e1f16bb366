/**
 * Generator and engine configuration.
 * Domain sizes for Theta and Lambda are fixed; Chi and Epsilon are configurable.
 */

import { InvalidConfigError } from './errors';

/** Spelled pitches: 7 letters x 5 alterations */
export const THETA_DOMAIN_SIZE = 35;

/** Octave registers */
export const LAMBDA_DOMAIN_SIZE = 8;

/** Number of note-length classes in the Chi catalog (10 plain + 10 dotted) */
export const CHI_CATALOG_SIZE = 20;

/** Largest Epsilon base catalog; keeps subset masks within 31-bit integer math */
export const MAX_EPSILON_CATALOG_SIZE = 30;

/**
 * GeneratorConfig controls the shape of the combinatorial space.
 */
export interface GeneratorConfig {
  /** Number of Chi classes in use, taken from the start of the catalog (1-20) */
  chiDomainSize: number;
  /** Number of modifier tags in the Epsilon base catalog (1-30) */
  epsilonCatalogSize: number;
  /** Upper bound on rows materialized by a single generateBase call */
  maxRows: number;
}

export const DEFAULT_GENERATOR_CONFIG: GeneratorConfig = {
  chiDomainSize: CHI_CATALOG_SIZE,
  epsilonCatalogSize: 4,   // tie, slur, phrase, glissando -> 15 subsets
  maxRows: 2_000_000,
};

/**
 * EngineOptions for the async transformation façade.
 */
export interface EngineOptions {
  /** Maximum work items in flight */
  concurrency: number;
  /** Rows per work item */
  chunkSize: number;
  /** Log batch lifecycle to the console */
  verbose: boolean;
}

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  concurrency: 4,
  chunkSize: 1024,
  verbose: false,
};

function requireIntegerInRange(field: string, value: number, min: number, max: number): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new InvalidConfigError(field, `expected an integer in [${min}, ${max}], got ${value}`);
  }
  return value;
}

/**
 * Merges a partial configuration over the defaults and validates every field.
 */
export function resolveGeneratorConfig(partial: Partial<GeneratorConfig> = {}): GeneratorConfig {
  const merged: GeneratorConfig = { ...DEFAULT_GENERATOR_CONFIG, ...partial };
  return Object.freeze({
    chiDomainSize: requireIntegerInRange('chiDomainSize', merged.chiDomainSize, 1, CHI_CATALOG_SIZE),
    epsilonCatalogSize: requireIntegerInRange(
      'epsilonCatalogSize',
      merged.epsilonCatalogSize,
      1,
      MAX_EPSILON_CATALOG_SIZE
    ),
    maxRows: requireIntegerInRange('maxRows', merged.maxRows, 0, Number.MAX_SAFE_INTEGER),
  });
}

export function resolveEngineOptions(partial: Partial<EngineOptions> = {}): EngineOptions {
  const merged: EngineOptions = { ...DEFAULT_ENGINE_OPTIONS, ...partial };
  return {
    concurrency: requireIntegerInRange('concurrency', merged.concurrency, 1, 256),
    chunkSize: requireIntegerInRange('chunkSize', merged.chunkSize, 1, Number.MAX_SAFE_INTEGER),
    verbose: merged.verbose,
  };
}
