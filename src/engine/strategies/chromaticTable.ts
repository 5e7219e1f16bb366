/**
 * Chromatic table (Theta-weighted).
 *
 * Transposes the spelled pitch by an interval, moving along the line of fifths so that
 * spelling follows the interval (A♭ up a fifth is E♭, not D♯). The 35 spellings form a
 * cycle, so transposition past B♯♯ wraps to F♭♭.
 */

import type { RowCoordinates } from '../../types/dimensions';
import type { ResolvedParams } from '../../types/dataset';
import { shiftByFifths } from '../dimensions/theta';
import { readOption } from './params';
import type { ModTableStrategy } from './types';

export const CHROMATIC_INTERVALS = ['unison', 'fifth', 'fourth', 'major-third', 'minor-third'] as const;
export type ChromaticInterval = (typeof CHROMATIC_INTERVALS)[number];

/** Interval size measured in fifths */
export const INTERVAL_FIFTHS: Record<ChromaticInterval, number> = {
  unison: 0,
  fifth: 1,
  fourth: -1,
  'major-third': 4,
  'minor-third': -3,
};

function fifthsFor(params: ResolvedParams): number {
  return INTERVAL_FIFTHS[readOption(params, 'chromatic', 'interval', CHROMATIC_INTERVALS)];
}

export function createChromaticStrategy(): ModTableStrategy {
  return {
    name: 'chromatic',
    description: 'Chromatic transformations (spelled transposition on the line of fifths)',
    focus: 'theta',
    reversible: true,
    parameters: [
      {
        kind: 'option',
        name: 'interval',
        description: 'Interval to transpose by',
        default: 'fifth',
        options: CHROMATIC_INTERVALS,
      },
    ],
    transform(coords: RowCoordinates, params: ResolvedParams): RowCoordinates {
      return { ...coords, theta: shiftByFifths(coords.theta, fifthsFor(params)) };
    },
    inverse(coords: RowCoordinates, params: ResolvedParams): RowCoordinates {
      return { ...coords, theta: shiftByFifths(coords.theta, -fifthsFor(params)) };
    },
  };
}
