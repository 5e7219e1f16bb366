/**
 * Custom table: doubling, powers, subtraction and addition per dimension.
 * Doubling and powers collapse positions together, so this table has no inverse.
 */

import type { DomainSizes, RowCoordinates } from '../../types/dimensions';
import type { ResolvedParams } from '../../types/dataset';
import { mod, readInteger } from './params';
import type { ModTableStrategy } from './types';

/** Modular exponentiation that stays within safe integers for any domain size */
function powMod(base: number, exponent: number, modulus: number): number {
  let result = 1 % modulus;
  for (let i = 0; i < exponent; i++) {
    result = (result * base) % modulus;
  }
  return result;
}

export function createCustomStrategy(): ModTableStrategy {
  return {
    name: 'custom',
    description: 'Custom transformations (chi x2, theta ^exponent, lambda -3, epsilon +5)',
    focus: 'all',
    reversible: false,
    parameters: [
      {
        kind: 'integer',
        name: 'exponent',
        description: 'Power applied to the Theta position',
        default: 2,
        min: 1,
        max: 4,
      },
    ],
    transform(coords: RowCoordinates, params: ResolvedParams, sizes: DomainSizes): RowCoordinates {
      const exponent = readInteger(params, 'custom', 'exponent');
      return {
        chi: mod(coords.chi * 2, sizes.chi),
        theta: powMod(coords.theta, exponent, sizes.theta),
        lambda: mod(coords.lambda - 3, sizes.lambda),
        epsilon: mod(coords.epsilon + 5, sizes.epsilon),
      };
    },
  };
}
