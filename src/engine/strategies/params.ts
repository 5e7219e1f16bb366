/**
 * Parameter resolution and typed readers for strategy implementations.
 */

import type { ParamInput, ParamValue, ResolvedParams } from '../../types/dataset';
import { InvalidParameterError, UnknownParameterError } from '../errors';
import type { ModTableStrategy, ParameterSpec } from './types';

function resolveOne(strategy: string, spec: ParameterSpec, value: ParamValue | undefined): ParamValue {
  if (value === undefined) {
    return spec.default;
  }

  if (spec.kind === 'integer') {
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      throw new InvalidParameterError(strategy, spec.name, `expected an integer, got ${JSON.stringify(value)}`);
    }
    if (value < spec.min || value > spec.max) {
      throw new InvalidParameterError(strategy, spec.name, `${value} is outside [${spec.min}, ${spec.max}]`);
    }
    return value;
  }

  if (typeof value !== 'string' || !spec.options.includes(value)) {
    throw new InvalidParameterError(
      strategy,
      spec.name,
      `expected one of ${spec.options.join(', ')}, got ${JSON.stringify(value)}`
    );
  }
  return value;
}

/**
 * Validates caller parameters against a strategy's schema and fills in defaults.
 * Keys of the result follow schema order.
 *
 * @throws UnknownParameterError for names outside the schema
 * @throws InvalidParameterError for wrong types, ranges, options or combinations
 */
export function resolveParams(strategy: ModTableStrategy, input: ParamInput = {}): ResolvedParams {
  for (const name of Object.keys(input)) {
    if (!strategy.parameters.some((spec) => spec.name === name)) {
      throw new UnknownParameterError(strategy.name, name);
    }
  }

  const resolved: Record<string, ParamValue> = {};
  for (const spec of strategy.parameters) {
    resolved[spec.name] = resolveOne(strategy.name, spec, input[spec.name]);
  }

  const frozen = Object.freeze(resolved);
  strategy.validate?.(frozen);
  return frozen;
}

export function readInteger(params: ResolvedParams, strategy: string, name: string): number {
  const value = params[name];
  if (typeof value !== 'number') {
    throw new InvalidParameterError(strategy, name, 'missing integer parameter');
  }
  return value;
}

export function readOption<T extends string>(
  params: ResolvedParams,
  strategy: string,
  name: string,
  options: readonly T[]
): T {
  const value = params[name];
  const match = options.find((option) => option === value);
  if (match === undefined) {
    throw new InvalidParameterError(strategy, name, `expected one of ${options.join(', ')}`);
  }
  return match;
}

/** Non-negative remainder. */
export function mod(value: number, modulus: number): number {
  return ((value % modulus) + modulus) % modulus;
}
