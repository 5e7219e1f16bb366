/**
 * Harmonic table (Theta chord construction).
 *
 * Builds a chord on each row's pitch and replaces the pitch with one of its chord tones.
 * The whole chord travels with the transformed row as provenance.
 */

import type { RowCoordinates } from '../../types/dimensions';
import type { ResolvedParams } from '../../types/dataset';
import { shiftByFifths } from '../dimensions/theta';
import { InvalidParameterError } from '../errors';
import { readOption } from './params';
import type { ModTableStrategy, RowAnnotations } from './types';

export const CHORD_QUALITIES = ['major', 'minor', 'dominant7', 'major7', 'minor7'] as const;
export type ChordQuality = (typeof CHORD_QUALITIES)[number];

export const CHORD_TONES = ['root', 'third', 'fifth', 'seventh'] as const;
export type ChordTone = (typeof CHORD_TONES)[number];

/** Chord tones above the root, in fifths: major third +4, minor third -3, fifth +1, m7 -2, M7 +5 */
const CHORD_FIFTHS: Record<ChordQuality, readonly number[]> = {
  major: [0, 4, 1],
  minor: [0, -3, 1],
  dominant7: [0, 4, 1, -2],
  major7: [0, 4, 1, 5],
  minor7: [0, -3, 1, -2],
};

function chordToneOffset(params: ResolvedParams): number {
  const quality = readOption(params, 'harmonic', 'quality', CHORD_QUALITIES);
  const tone = readOption(params, 'harmonic', 'chordTone', CHORD_TONES);
  const offsets = CHORD_FIFTHS[quality];
  const toneIndex = CHORD_TONES.indexOf(tone);
  if (toneIndex >= offsets.length) {
    throw new InvalidParameterError('harmonic', 'chordTone', `'${tone}' is not a tone of a ${quality} chord`);
  }
  return offsets[toneIndex];
}

export function createHarmonicStrategy(): ModTableStrategy {
  return {
    name: 'harmonic',
    description: 'Harmonic transformations (chord building: root, 3rd, 5th, 7th)',
    focus: 'theta',
    reversible: true,
    parameters: [
      {
        kind: 'option',
        name: 'quality',
        description: 'Chord built on each pitch',
        default: 'dominant7',
        options: CHORD_QUALITIES,
      },
      {
        kind: 'option',
        name: 'chordTone',
        description: 'Chord tone that replaces the pitch',
        default: 'root',
        options: CHORD_TONES,
      },
    ],
    validate(params: ResolvedParams): void {
      chordToneOffset(params);
    },
    transform(coords: RowCoordinates, params: ResolvedParams): RowCoordinates {
      return { ...coords, theta: shiftByFifths(coords.theta, chordToneOffset(params)) };
    },
    inverse(coords: RowCoordinates, params: ResolvedParams): RowCoordinates {
      return { ...coords, theta: shiftByFifths(coords.theta, -chordToneOffset(params)) };
    },
    annotate(source: RowCoordinates, params: ResolvedParams): RowAnnotations {
      const quality = readOption(params, 'harmonic', 'quality', CHORD_QUALITIES);
      return { chord: CHORD_FIFTHS[quality].map((fifths) => shiftByFifths(source.theta, fifths)) };
    },
  };
}
