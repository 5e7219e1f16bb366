/**
 * Lambda: octave registers 1-8.
 */

import type { LambdaValue } from '../../types/dimensions';
import { LAMBDA_DOMAIN_SIZE } from '../config';
import { createTableGenerator, type DimensionGenerator } from './types';

const ORDINALS = ['First', 'Second', 'Third', 'Fourth', 'Fifth', 'Sixth', 'Seventh', 'Eighth'] as const;

export function createLambdaGenerator(): DimensionGenerator<LambdaValue> {
  const table: LambdaValue[] = ORDINALS.slice(0, LAMBDA_DOMAIN_SIZE).map((ordinal, position) => ({
    position,
    octave: position + 1,
    name: `${ordinal} Octave`,
  }));

  return createTableGenerator('lambda', table, (candidate, canonical) => candidate.octave === canonical.octave);
}
