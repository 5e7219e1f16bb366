/**
 * Rhythmic table (Chi-weighted).
 *
 * Diminution moves each duration one position forward in the Chi catalog, augmentation
 * one position back, cycling over the configured Chi domain. Within the plain and the
 * dotted block that is one class shorter or longer; the last plain class steps to the
 * Dotted Whole.
 */

import type { DomainSizes, RowCoordinates } from '../../types/dimensions';
import type { ResolvedParams } from '../../types/dataset';
import { mod, readInteger, readOption } from './params';
import type { ModTableStrategy } from './types';

export const RHYTHMIC_MODES = ['identity', 'diminish', 'augment'] as const;
export type RhythmicMode = (typeof RHYTHMIC_MODES)[number];

const DIRECTION: Record<RhythmicMode, number> = {
  identity: 0,
  diminish: 1,
  augment: -1,
};

function delta(params: ResolvedParams): number {
  const mode = readOption(params, 'rhythmic', 'mode', RHYTHMIC_MODES);
  return DIRECTION[mode] * readInteger(params, 'rhythmic', 'steps');
}

export function createRhythmicStrategy(): ModTableStrategy {
  return {
    name: 'rhythmic',
    description: 'Rhythmic transformations (diminution and augmentation of durations)',
    focus: 'chi',
    reversible: true,
    parameters: [
      {
        kind: 'option',
        name: 'mode',
        description: 'Direction of the duration change',
        default: 'diminish',
        options: RHYTHMIC_MODES,
      },
      {
        kind: 'integer',
        name: 'steps',
        description: 'Number of duration classes to move',
        default: 1,
        min: 1,
        max: 32,
      },
    ],
    transform(coords: RowCoordinates, params: ResolvedParams, sizes: DomainSizes): RowCoordinates {
      return { ...coords, chi: mod(coords.chi + delta(params), sizes.chi) };
    },
    inverse(coords: RowCoordinates, params: ResolvedParams, sizes: DomainSizes): RowCoordinates {
      return { ...coords, chi: mod(coords.chi - delta(params), sizes.chi) };
    },
  };
}
