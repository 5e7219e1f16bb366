/**
 * Tests for the four dimension generators.
 */

import { describe, it, expect } from 'vitest';
import {
  createChiGenerator,
  createEpsilonGenerator,
  createGenerators,
  createLambdaGenerator,
  createThetaGenerator,
  epsilonPositionOf,
  lineOfFifthsIndex,
  MODIFIER_CATALOG,
  positionFromLineOfFifths,
  shiftByFifths,
} from '../dimensions';
import { OutOfDomainError } from '../errors';

describe('Chi generator', () => {
  const chi = createChiGenerator();

  it('should enumerate 10 plain and 10 dotted durations', () => {
    expect(chi.size).toBe(20);
    expect(chi.valueAt(0)).toMatchObject({ name: 'Whole', dotted: false, numerator: 1, denominator: 1, beats: 4 });
    expect(chi.valueAt(2)).toMatchObject({ name: 'Quarter', beats: 1 });
    expect(chi.valueAt(9)).toMatchObject({ name: 'Five-hundred-twelfth', denominator: 512 });
  });

  it('should give dotted values three halves of the plain length', () => {
    expect(chi.valueAt(10)).toMatchObject({ name: 'Dotted Whole', dotted: true, numerator: 3, denominator: 2, beats: 6 });
    expect(chi.valueAt(12)).toMatchObject({ name: 'Dotted Quarter', beats: 1.5 });
  });

  it('should restrict the domain to the configured size', () => {
    const small = createChiGenerator(4);
    expect(small.size).toBe(4);
    expect(small.values().map((value) => value.name)).toEqual(['Whole', 'Half', 'Quarter', 'Eighth']);
    expect(() => small.valueAt(4)).toThrow(OutOfDomainError);
  });

  it('should map values back onto their positions', () => {
    chi.values().forEach((value, position) => {
      expect(chi.indexOf(value)).toBe(position);
    });
  });

  it('should reject values that do not belong to the domain', () => {
    expect(() => chi.indexOf({ ...chi.valueAt(2), dotted: true })).toThrow(OutOfDomainError);
    expect(() => chi.valueAt(-1)).toThrow(OutOfDomainError);
    expect(() => chi.valueAt(1.5)).toThrow(OutOfDomainError);
  });
});

describe('Theta generator', () => {
  const theta = createThetaGenerator();

  it('should enumerate 35 spellings letter by letter', () => {
    expect(theta.size).toBe(35);
    expect(theta.valueAt(0)).toMatchObject({ letter: 'A', alter: -2, spelling: 'A♭♭', name: 'A Double Flat', pitchClass: 7 });
    expect(theta.valueAt(12)).toMatchObject({ letter: 'C', alter: 0, spelling: 'C♮', pitchClass: 0 });
    expect(theta.valueAt(34)).toMatchObject({ letter: 'G', alter: 2, spelling: 'G♯♯', pitchClass: 9 });
  });

  it('should keep enharmonic spellings distinct', () => {
    const bSharp = theta.valueAt(8);
    const cFlat = theta.valueAt(11);
    expect(bSharp.spelling).toBe('B♯');
    expect(bSharp.pitchClass).toBe(0);
    expect(cFlat.spelling).toBe('C♭');
    expect(cFlat.pitchClass).toBe(11);
  });

  it('should reject a value whose spelling does not match its position', () => {
    expect(() => theta.indexOf({ ...theta.valueAt(12), letter: 'D' })).toThrow(OutOfDomainError);
  });
});

describe('line of fifths', () => {
  it('should run from F double flat to B double sharp', () => {
    expect(lineOfFifthsIndex(25)).toBe(0);
    expect(lineOfFifthsIndex(9)).toBe(34);
    expect(positionFromLineOfFifths(0)).toBe(25);
  });

  it('should be a bijection over the 35 positions', () => {
    for (let position = 0; position < 35; position++) {
      expect(positionFromLineOfFifths(lineOfFifthsIndex(position))).toBe(position);
    }
  });

  it('should transpose with correct spelling', () => {
    // C -> G
    expect(shiftByFifths(12, 1)).toBe(32);
    // A double flat -> E double flat
    expect(shiftByFifths(0, 1)).toBe(20);
    // B double sharp wraps to F double flat
    expect(shiftByFifths(9, 1)).toBe(25);
  });
});

describe('Lambda generator', () => {
  it('should enumerate octaves 1 to 8', () => {
    const lambda = createLambdaGenerator();
    expect(lambda.size).toBe(8);
    expect(lambda.valueAt(0)).toEqual({ position: 0, octave: 1, name: 'First Octave' });
    expect(lambda.valueAt(7)).toEqual({ position: 7, octave: 8, name: 'Eighth Octave' });
  });
});

describe('Epsilon generator', () => {
  it('should load the full modifier catalog', () => {
    expect(MODIFIER_CATALOG).toHaveLength(35);
    expect(MODIFIER_CATALOG[0]).toEqual({ id: 'tie', name: 'Tie', category: 'relationship' });
    expect(MODIFIER_CATALOG[10].id).toBe('piano');
  });

  it('should enumerate every non-empty subset of the base catalog', () => {
    const epsilon = createEpsilonGenerator(3);
    expect(epsilon.size).toBe(7);
    expect(epsilon.valueAt(0).modifiers.map((m) => m.id)).toEqual(['tie']);
    expect(epsilon.valueAt(2).modifiers.map((m) => m.id)).toEqual(['tie', 'slur']);
    expect(epsilon.valueAt(6).modifiers.map((m) => m.id)).toEqual(['tie', 'slur', 'phrase']);
    expect(epsilon.valueAt(6).mask).toBe(7);
    expect(() => epsilon.valueAt(7)).toThrow(OutOfDomainError);
  });

  it('should have 2^k - 1 positions for a k-tag catalog', () => {
    expect(createEpsilonGenerator(1).size).toBe(1);
    expect(createEpsilonGenerator(4).size).toBe(15);
    expect(createEpsilonGenerator(10).size).toBe(1023);
  });

  it('should find positions from modifier ids in any order', () => {
    expect(epsilonPositionOf(['phrase', 'tie'], 3)).toBe(4);
    expect(() => epsilonPositionOf(['glissando'], 3)).toThrow(OutOfDomainError);
    expect(() => epsilonPositionOf([], 3)).toThrow(OutOfDomainError);
  });

  it('should reject subsets whose modifiers do not match the mask', () => {
    const epsilon = createEpsilonGenerator(3);
    const value = epsilon.valueAt(2);
    expect(epsilon.indexOf(value)).toBe(2);
    expect(() => epsilon.indexOf({ ...value, modifiers: value.modifiers.slice(0, 1) })).toThrow(OutOfDomainError);
  });
});

describe('createGenerators', () => {
  it('should share generators across row limits and keep each config', () => {
    const small = createGenerators({ chiDomainSize: 4, epsilonCatalogSize: 3, maxRows: 10 });
    const large = createGenerators({ chiDomainSize: 4, epsilonCatalogSize: 3, maxRows: 5000 });

    expect(large.chi).toBe(small.chi);
    expect(large.epsilon).toBe(small.epsilon);
    expect(large.sizes).toBe(small.sizes);
    expect(small.config.maxRows).toBe(10);
    expect(large.config.maxRows).toBe(5000);
  });

  it('should build separate generators for different domain sizes', () => {
    const narrow = createGenerators({ chiDomainSize: 4 });
    const wide = createGenerators({ chiDomainSize: 6 });
    expect(wide.chi).not.toBe(narrow.chi);
    expect(wide.sizes.chi).toBe(6);
  });
});
