/**
 * Chi: note-length classes.
 *
 * Positions 0-9 are plain values (whole down to 1/512), positions 10-19 the
 * dotted forms of the same values in the same order.
 */

import type { ChiValue } from '../../types/dimensions';
import { CHI_CATALOG_SIZE } from '../config';
import { createTableGenerator, type DimensionGenerator } from './types';

const PLAIN_NAMES = [
  'Whole',
  'Half',
  'Quarter',
  'Eighth',
  'Sixteenth',
  'Thirty-second',
  'Sixty-fourth',
  'Hundred-twenty-eighth',
  'Two-hundred-fifty-sixth',
  'Five-hundred-twelfth',
] as const;

function buildChiCatalog(): ChiValue[] {
  const catalog: ChiValue[] = [];

  PLAIN_NAMES.forEach((name, k) => {
    const denominator = 2 ** k;
    catalog.push({
      position: k,
      name,
      dotted: false,
      numerator: 1,
      denominator,
      beats: 4 / denominator,
    });
  });

  // Dotted value = 1/2^k + 1/2^(k+1) = 3/2^(k+1)
  PLAIN_NAMES.forEach((name, k) => {
    const denominator = 2 ** (k + 1);
    catalog.push({
      position: PLAIN_NAMES.length + k,
      name: `Dotted ${name}`,
      dotted: true,
      numerator: 3,
      denominator,
      beats: (4 * 3) / denominator,
    });
  });

  return catalog;
}

/**
 * Creates the Chi generator over the first `domainSize` catalog entries.
 */
export function createChiGenerator(domainSize: number = CHI_CATALOG_SIZE): DimensionGenerator<ChiValue> {
  const table = buildChiCatalog().slice(0, domainSize);
  return createTableGenerator(
    'chi',
    table,
    (candidate, canonical) =>
      candidate.dotted === canonical.dotted &&
      candidate.numerator === canonical.numerator &&
      candidate.denominator === canonical.denominator
  );
}
