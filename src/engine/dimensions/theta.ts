/**
 * Theta: spelled pitches.
 *
 * Ordered letter by letter (A..G), each letter from double flat to double sharp:
 * position = letterIndex * 5 + (alter + 2).
 */

import type { Alteration, NoteLetter, ThetaValue } from '../../types/dimensions';
import { THETA_DOMAIN_SIZE } from '../config';
import { assertPosition, createTableGenerator, type DimensionGenerator } from './types';

export const NOTE_LETTERS: readonly NoteLetter[] = ['A', 'B', 'C', 'D', 'E', 'F', 'G'];

const ALTERATIONS: readonly Alteration[] = [-2, -1, 0, 1, 2];

/** Pitch class of each natural letter, C = 0 */
export const NATURAL_PITCH_CLASS: Readonly<Record<NoteLetter, number>> = {
  A: 9,
  B: 11,
  C: 0,
  D: 2,
  E: 4,
  F: 5,
  G: 7,
};

/** Position of each natural letter on the line of fifths, F = 0 ... B = 6 */
const FIFTHS_INDEX: Record<NoteLetter, number> = {
  F: 0,
  C: 1,
  G: 2,
  D: 3,
  A: 4,
  E: 5,
  B: 6,
};

const LETTERS_BY_FIFTHS: readonly NoteLetter[] = ['F', 'C', 'G', 'D', 'A', 'E', 'B'];

/** Indexed by alter + 2 */
const ACCIDENTAL_SYMBOLS = ['♭♭', '♭', '♮', '♯', '♯♯'] as const;
const ACCIDENTAL_NAMES = ['Double Flat', 'Flat', 'Natural', 'Sharp', 'Double Sharp'] as const;

function buildThetaCatalog(): ThetaValue[] {
  const catalog: ThetaValue[] = [];
  NOTE_LETTERS.forEach((letter, letterIndex) => {
    ALTERATIONS.forEach((alter) => {
      catalog.push({
        position: letterIndex * ALTERATIONS.length + (alter + 2),
        letter,
        alter,
        spelling: `${letter}${ACCIDENTAL_SYMBOLS[alter + 2]}`,
        name: `${letter} ${ACCIDENTAL_NAMES[alter + 2]}`,
        pitchClass: (((NATURAL_PITCH_CLASS[letter] + alter) % 12) + 12) % 12,
      });
    });
  });
  return catalog;
}

const THETA_CATALOG = buildThetaCatalog();

export function createThetaGenerator(): DimensionGenerator<ThetaValue> {
  return createTableGenerator(
    'theta',
    buildThetaCatalog(),
    (candidate, canonical) => candidate.letter === canonical.letter && candidate.alter === canonical.alter
  );
}

// ============================================================================
// Line of fifths
// ============================================================================

/**
 * Maps a Theta position onto the line of fifths (F♭♭ = 0 ... B♯♯ = 34).
 * Moving +1 along the line transposes up a perfect fifth with correct spelling.
 */
export function lineOfFifthsIndex(position: number): number {
  const { letter, alter } = THETA_CATALOG[assertPosition('theta', position, THETA_DOMAIN_SIZE)];
  return FIFTHS_INDEX[letter] + 7 * alter + 14;
}

/**
 * Inverse of lineOfFifthsIndex.
 */
export function positionFromLineOfFifths(index: number): number {
  const lof = assertPosition('theta', index, THETA_DOMAIN_SIZE);
  const letter = LETTERS_BY_FIFTHS[lof % 7];
  const alter = Math.floor(lof / 7) - 2;
  return NOTE_LETTERS.indexOf(letter) * ALTERATIONS.length + (alter + 2);
}

/**
 * Shifts a Theta position by `steps` fifths, wrapping cyclically over the 35 spellings.
 */
export function shiftByFifths(position: number, steps: number): number {
  const shifted = (((lineOfFifthsIndex(position) + steps) % THETA_DOMAIN_SIZE) + THETA_DOMAIN_SIZE) % THETA_DOMAIN_SIZE;
  return positionFromLineOfFifths(shifted);
}

export function letterIndexOf(position: number): number {
  return Math.floor(assertPosition('theta', position, THETA_DOMAIN_SIZE) / ALTERATIONS.length);
}
