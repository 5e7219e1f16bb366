/**
 * Modal table (Theta scale variants).
 *
 * Re-inflects each pitch as if the major scale on `tonic` were turned into `mode`:
 * the letter stays, the alteration moves by the difference between the mode's scale
 * degree and the major scale's. Alterations wrap within double flat..double sharp.
 */

import type { NoteLetter, RowCoordinates } from '../../types/dimensions';
import type { ResolvedParams } from '../../types/dataset';
import { letterIndexOf, NOTE_LETTERS } from '../dimensions/theta';
import { mod, readOption } from './params';
import type { ModTableStrategy } from './types';

export const MODES = ['ionian', 'dorian', 'phrygian', 'lydian', 'mixolydian', 'aeolian', 'locrian'] as const;
export type Mode = (typeof MODES)[number];

const MODE_SEMITONES: Record<Mode, readonly number[]> = {
  ionian: [0, 2, 4, 5, 7, 9, 11],
  dorian: [0, 2, 3, 5, 7, 9, 10],
  phrygian: [0, 1, 3, 5, 7, 8, 10],
  lydian: [0, 2, 4, 6, 7, 9, 11],
  mixolydian: [0, 2, 4, 5, 7, 9, 10],
  aeolian: [0, 2, 3, 5, 7, 8, 10],
  locrian: [0, 1, 3, 5, 6, 8, 10],
};

const ALTERATION_COUNT = 5;

/**
 * Alteration change for the letter at a Theta position under the given mode and tonic.
 */
export function modalInflection(position: number, mode: Mode, tonic: NoteLetter): number {
  const degree = mod(letterIndexOf(position) - NOTE_LETTERS.indexOf(tonic), 7);
  return MODE_SEMITONES[mode][degree] - MODE_SEMITONES.ionian[degree];
}

function inflect(position: number, params: ResolvedParams, direction: 1 | -1): number {
  const mode = readOption(params, 'modal', 'mode', MODES);
  const tonic = readOption(params, 'modal', 'tonic', NOTE_LETTERS);
  const letterIndex = letterIndexOf(position);
  const alterSlot = position - letterIndex * ALTERATION_COUNT;
  const shifted = mod(alterSlot + direction * modalInflection(position, mode, tonic), ALTERATION_COUNT);
  return letterIndex * ALTERATION_COUNT + shifted;
}

export function createModalStrategy(): ModTableStrategy {
  return {
    name: 'modal',
    description: 'Modal transformations (church modes relative to a tonic)',
    focus: 'theta',
    reversible: true,
    parameters: [
      {
        kind: 'option',
        name: 'mode',
        description: 'Target mode',
        default: 'aeolian',
        options: MODES,
      },
      {
        kind: 'option',
        name: 'tonic',
        description: 'Tonic letter of the mode',
        default: 'C',
        options: NOTE_LETTERS,
      },
    ],
    transform(coords: RowCoordinates, params: ResolvedParams): RowCoordinates {
      return { ...coords, theta: inflect(coords.theta, params, 1) };
    },
    inverse(coords: RowCoordinates, params: ResolvedParams): RowCoordinates {
      return { ...coords, theta: inflect(coords.theta, params, -1) };
    },
  };
}
