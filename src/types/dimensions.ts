/**
 * Dimension value models.
 *
 * TERMINOLOGY:
 * - Chi: note-length class (duration)
 * - Theta: spelled pitch, 35 positions including double flats and double sharps
 * - Lambda: octave register, 8 positions
 * - Epsilon: non-empty set of modifier tags applied at once
 */

export type DimensionName = 'chi' | 'theta' | 'lambda' | 'epsilon';

export type NoteLetter = 'A' | 'B' | 'C' | 'D' | 'E' | 'F' | 'G';

/** Alteration in semitones: -2 (double flat) to +2 (double sharp). */
export type Alteration = -2 | -1 | 0 | 1 | 2;

export interface ChiValue {
  position: number;
  /** e.g. "Quarter", "Dotted Eighth" */
  name: string;
  dotted: boolean;
  /** Duration as a fraction of a whole note */
  numerator: number;
  denominator: number;
  /** Duration in quarter-note beats */
  beats: number;
}

export interface ThetaValue {
  position: number;
  letter: NoteLetter;
  alter: Alteration;
  /** Symbolic spelling, e.g. "B♭", "F♯♯", "C♮" */
  spelling: string;
  /** e.g. "B Flat", "F Double Sharp" */
  name: string;
  /** 0-11 with C = 0 */
  pitchClass: number;
}

export interface LambdaValue {
  position: number;
  /** 1-based octave number */
  octave: number;
  name: string;
}

export type ModifierCategory = 'relationship' | 'dynamic' | 'articulation' | 'ornament';

export interface ModifierTag {
  id: string;
  name: string;
  category: ModifierCategory;
}

export interface EpsilonValue {
  position: number;
  /** Bit mask over the base catalog; always position + 1 */
  mask: number;
  /** Selected tags in catalog order */
  modifiers: readonly ModifierTag[];
}

/**
 * Domain positions of a single row, one per dimension.
 */
export interface RowCoordinates {
  chi: number;
  theta: number;
  lambda: number;
  epsilon: number;
}

/**
 * Size of each dimension's domain for a given configuration.
 */
export interface DomainSizes {
  chi: number;
  theta: number;
  lambda: number;
  epsilon: number;
}
