/**
 * Tests for the mod table registry and each strategy's mapping.
 */

import { describe, it, expect } from 'vitest';
import { generateBase } from '../baseBuilder';
import { createThetaGenerator } from '../dimensions';
import { InvalidParameterError, UnknownParameterError, UnknownStrategyError } from '../errors';
import { getMusicalStrategyNames, listStrategies, resolveStrategy } from '../registry';
import { modalInflection, resolveParams } from '../strategies';
import { applyStrategy } from '../transform';

const SMALL = { chiDomainSize: 4, epsilonCatalogSize: 3 };
const theta = createThetaGenerator();

/** Base N=1 whose only row sits at the given Theta position (chi, lambda, epsilon all 0) */
function baseAtTheta(position: number) {
  // theta advances every lambda * epsilon = 56 rows
  const base = generateBase(position * 56 + 1, SMALL);
  return { ...base, n: 1, rows: [base.rows[position * 56]] };
}

describe('registry', () => {
  it('should list all eight tables in menu order', () => {
    expect(listStrategies().map((s) => s.name)).toEqual([
      'default',
      'increment',
      'custom',
      'chromatic',
      'rhythmic',
      'harmonic',
      'modal',
      'octave',
    ]);
  });

  it('should flag only the custom table as one-way', () => {
    const oneWay = listStrategies()
      .filter((s) => !s.reversible)
      .map((s) => s.name);
    expect(oneWay).toEqual(['custom']);
  });

  it('should name the musical tables', () => {
    expect(getMusicalStrategyNames()).toEqual(['chromatic', 'rhythmic', 'harmonic', 'modal', 'octave']);
  });

  it('should throw for unknown names', () => {
    expect(() => resolveStrategy('retrograde')).toThrow(UnknownStrategyError);
  });
});

describe('parameter resolution', () => {
  it('should fill defaults in schema order', () => {
    const params = resolveParams(resolveStrategy('modal'), { tonic: 'D' });
    expect(Object.keys(params)).toEqual(['mode', 'tonic']);
    expect(params).toEqual({ mode: 'aeolian', tonic: 'D' });
  });

  it('should reject unknown parameter names', () => {
    expect(() => resolveParams(resolveStrategy('default'), { stride: 2 })).toThrow(UnknownParameterError);
  });

  it('should reject out-of-range and mistyped values', () => {
    const strategy = resolveStrategy('default');
    expect(() => resolveParams(strategy, { step: 0 })).toThrow(InvalidParameterError);
    expect(() => resolveParams(strategy, { step: 65 })).toThrow(InvalidParameterError);
    expect(() => resolveParams(strategy, { step: 'two' })).toThrow(InvalidParameterError);
    expect(() => resolveParams(resolveStrategy('chromatic'), { interval: 'tritone' })).toThrow(InvalidParameterError);
  });

  it('should reject a seventh on a triad', () => {
    expect(() => resolveParams(resolveStrategy('harmonic'), { quality: 'major', chordTone: 'seventh' })).toThrow(
      InvalidParameterError
    );
  });
});

describe('uniform tables', () => {
  const base = generateBase(1, SMALL);

  it('default should shift by (-1, +1, +2, +3)', () => {
    const [row] = applyStrategy(base, 'default').rows;
    expect(row.chi.name).toBe('Eighth');
    expect(row.theta.spelling).toBe('A♭');
    expect(row.lambda.name).toBe('Third Octave');
    expect(row.epsilon.modifiers.map((m) => m.id)).toEqual(['phrase']);
  });

  it('default should scale its offsets by step', () => {
    const [row] = applyStrategy(base, 'default', { step: 2 }).rows;
    expect([row.chi.position, row.theta.position, row.lambda.position, row.epsilon.position]).toEqual([2, 2, 4, 6]);
  });

  it('increment should shift by (0, +2, +4, +6)', () => {
    const [row] = applyStrategy(base, 'increment').rows;
    expect([row.chi.position, row.theta.position, row.lambda.position, row.epsilon.position]).toEqual([0, 2, 4, 6]);
    expect(row.theta.spelling).toBe('A♮');
  });

  it('custom should double, square, subtract and add', () => {
    const [row] = applyStrategy(base, 'custom').rows;
    expect([row.chi.position, row.theta.position, row.lambda.position, row.epsilon.position]).toEqual([0, 0, 5, 5]);

    // B flat (6) squared is 36, which wraps to 1
    const [flat] = applyStrategy(baseAtTheta(6), 'custom').rows;
    expect(flat.theta.position).toBe(1);
  });
});

describe('musical tables', () => {
  it('chromatic should transpose along the line of fifths', () => {
    expect(applyStrategy(baseAtTheta(0), 'chromatic').rows[0].theta.spelling).toBe('E♭♭');
    expect(applyStrategy(baseAtTheta(12), 'chromatic').rows[0].theta.spelling).toBe('G♮');
    expect(applyStrategy(baseAtTheta(12), 'chromatic', { interval: 'fourth' }).rows[0].theta.spelling).toBe('F♮');
    expect(applyStrategy(baseAtTheta(12), 'chromatic', { interval: 'minor-third' }).rows[0].theta.spelling).toBe('E♭');
  });

  it('chromatic should leave other dimensions untouched', () => {
    const base = generateBase(30, SMALL);
    const transformed = applyStrategy(base, 'chromatic', { interval: 'major-third' });
    transformed.rows.forEach((row, i) => {
      expect(row.chi).toBe(base.rows[i].chi);
      expect(row.lambda).toBe(base.rows[i].lambda);
      expect(row.epsilon).toEqual(base.rows[i].epsilon);
    });
  });

  it('rhythmic should diminish and augment durations cyclically', () => {
    const base = generateBase(1, SMALL);
    expect(applyStrategy(base, 'rhythmic').rows[0].chi.name).toBe('Half');
    expect(applyStrategy(base, 'rhythmic', { mode: 'augment' }).rows[0].chi.name).toBe('Eighth');
    expect(applyStrategy(base, 'rhythmic', { mode: 'identity' }).rows[0].chi.name).toBe('Whole');
    expect(applyStrategy(base, 'rhythmic', { steps: 5 }).rows[0].chi.name).toBe('Half');
  });

  it('rhythmic should step from the plain block into the dotted block and wrap at the end', () => {
    // chi advances every 35 * 8 * 1 = 280 rows
    const base = generateBase(19 * 280 + 1, { epsilonCatalogSize: 1 });
    const diminished = applyStrategy(base, 'rhythmic');
    expect(base.rows[9 * 280].chi.name).toBe('Five-hundred-twelfth');
    expect(diminished.rows[9 * 280].chi.name).toBe('Dotted Whole');
    expect(base.rows[19 * 280].chi.name).toBe('Dotted Five-hundred-twelfth');
    expect(diminished.rows[19 * 280].chi.name).toBe('Whole');
  });

  it('harmonic should attach the chord built on the source pitch', () => {
    const [row] = applyStrategy(baseAtTheta(0), 'harmonic').rows;
    expect(row.theta.spelling).toBe('A♭♭');
    expect(row.chord?.map((tone) => tone.spelling)).toEqual(['A♭♭', 'C♭', 'E♭♭', 'G♭♭']);
  });

  it('harmonic should replace the pitch with the chosen chord tone', () => {
    const [third] = applyStrategy(baseAtTheta(12), 'harmonic', { quality: 'major', chordTone: 'third' }).rows;
    expect(third.theta.spelling).toBe('E♮');
    expect(third.chord?.map((tone) => tone.spelling)).toEqual(['C♮', 'E♮', 'G♮']);

    const [minorThird] = applyStrategy(baseAtTheta(12), 'harmonic', { quality: 'minor', chordTone: 'third' }).rows;
    expect(minorThird.theta.spelling).toBe('E♭');
  });

  it('modal should inflect scale degrees relative to the tonic', () => {
    // C aeolian lowers the third, sixth and seventh degrees
    expect(modalInflection(22, 'aeolian', 'C')).toBe(-1);
    expect(modalInflection(12, 'aeolian', 'C')).toBe(0);
    expect(modalInflection(2, 'aeolian', 'C')).toBe(-1);
    expect(modalInflection(27, 'lydian', 'C')).toBe(1);

    expect(applyStrategy(baseAtTheta(22), 'modal').rows[0].theta.spelling).toBe('E♭');
    expect(applyStrategy(baseAtTheta(2), 'modal').rows[0].theta.spelling).toBe('A♭');
    expect(applyStrategy(baseAtTheta(27), 'modal', { mode: 'lydian' }).rows[0].theta.spelling).toBe('F♯');
  });

  it('modal should wrap alterations past double flat', () => {
    expect(applyStrategy(baseAtTheta(0), 'modal').rows[0].theta.spelling).toBe('A♯♯');
  });

  it('octave should shift and invert registers', () => {
    const base = generateBase(1, SMALL);
    expect(applyStrategy(base, 'octave').rows[0].lambda.name).toBe('Second Octave');
    expect(applyStrategy(base, 'octave', { operation: 'down', steps: 2 }).rows[0].lambda.octave).toBe(7);
    expect(applyStrategy(base, 'octave', { operation: 'invert' }).rows[0].lambda.octave).toBe(8);
    expect(applyStrategy(base, 'octave', { operation: 'identity' }).rows[0].lambda.octave).toBe(1);
  });

  it('every table should stay inside the domain', () => {
    const base = generateBase(600, SMALL);
    for (const { name } of listStrategies()) {
      for (const row of applyStrategy(base, name).rows) {
        expect(theta.indexOf(row.theta)).toBe(row.theta.position);
        expect(row.chi.position).toBeLessThan(4);
        expect(row.epsilon.position).toBeLessThan(7);
      }
    }
  });
});
