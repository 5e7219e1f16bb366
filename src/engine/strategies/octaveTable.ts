/**
 * Octave table (Lambda-weighted): register transposition and inversion.
 */

import type { DomainSizes, RowCoordinates } from '../../types/dimensions';
import type { ResolvedParams } from '../../types/dataset';
import { mod, readInteger, readOption } from './params';
import type { ModTableStrategy } from './types';

export const OCTAVE_OPERATIONS = ['identity', 'up', 'down', 'invert'] as const;
export type OctaveOperation = (typeof OCTAVE_OPERATIONS)[number];

function moveRegister(lambda: number, params: ResolvedParams, sizes: DomainSizes, direction: 1 | -1): number {
  const operation = readOption(params, 'octave', 'operation', OCTAVE_OPERATIONS);
  const steps = readInteger(params, 'octave', 'steps');

  switch (operation) {
    case 'identity':
      return lambda;
    case 'up':
      return mod(lambda + direction * steps, sizes.lambda);
    case 'down':
      return mod(lambda - direction * steps, sizes.lambda);
    case 'invert':
      // Self-inverse: high becomes low
      return sizes.lambda - 1 - lambda;
  }
}

export function createOctaveStrategy(): ModTableStrategy {
  return {
    name: 'octave',
    description: 'Octave transformations (register shifts, inversions)',
    focus: 'lambda',
    reversible: true,
    parameters: [
      {
        kind: 'option',
        name: 'operation',
        description: 'Register operation',
        default: 'up',
        options: OCTAVE_OPERATIONS,
      },
      {
        kind: 'integer',
        name: 'steps',
        description: 'Octaves to move for up/down',
        default: 1,
        min: 1,
        max: 7,
      },
    ],
    transform(coords: RowCoordinates, params: ResolvedParams, sizes: DomainSizes): RowCoordinates {
      return { ...coords, lambda: moveRegister(coords.lambda, params, sizes, 1) };
    },
    inverse(coords: RowCoordinates, params: ResolvedParams, sizes: DomainSizes): RowCoordinates {
      return { ...coords, lambda: moveRegister(coords.lambda, params, sizes, -1) };
    },
  };
}
