/**
 * Epsilon: simultaneous modifiers.
 *
 * The domain is every non-empty subset of the base catalog (the first `catalogSize`
 * entries of modifiers.json). Position p selects the subset whose bit mask is p + 1;
 * bit j selects catalog entry j. Subsets are enumerated, never materialized up front,
 * since a 30-tag catalog has over a billion of them.
 */

import type { EpsilonValue, ModifierCategory, ModifierTag } from '../../types/dimensions';
import { OutOfDomainError } from '../errors';
import modifierCatalog from '../../data/modifiers.json';
import { assertPosition, type DimensionGenerator } from './types';

const MODIFIER_CATEGORIES: readonly ModifierCategory[] = ['relationship', 'dynamic', 'articulation', 'ornament'];

function isModifierCategory(value: string): value is ModifierCategory {
  return MODIFIER_CATEGORIES.some((category) => category === value);
}

/**
 * Full modifier catalog, validated once at load time.
 */
export const MODIFIER_CATALOG: readonly ModifierTag[] = Object.freeze(
  modifierCatalog.map((entry): ModifierTag => {
    if (!isModifierCategory(entry.category)) {
      throw new Error(`modifiers.json: unknown category '${entry.category}' for '${entry.id}'`);
    }
    return Object.freeze({ id: entry.id, name: entry.name, category: entry.category });
  })
);

export function createEpsilonGenerator(catalogSize: number): DimensionGenerator<EpsilonValue> {
  const catalog = MODIFIER_CATALOG.slice(0, catalogSize);
  const size = 2 ** catalog.length - 1;

  const valueAt = (position: number): EpsilonValue => {
    const mask = assertPosition('epsilon', position, size) + 1;
    const modifiers = catalog.filter((_, bit) => (mask & (1 << bit)) !== 0);
    return Object.freeze({ position, mask, modifiers: Object.freeze(modifiers) });
  };

  return {
    dimension: 'epsilon',
    size,
    valueAt,
    indexOf(value: EpsilonValue): number {
      const position = assertPosition('epsilon', value.position, size);
      const ids = value.modifiers.map((modifier) => modifier.id);
      const canonical = valueAt(position).modifiers.map((modifier) => modifier.id);
      if (value.mask !== position + 1 || ids.join('|') !== canonical.join('|')) {
        throw new OutOfDomainError('epsilon', value, size);
      }
      return position;
    },
    values(): readonly EpsilonValue[] {
      return Array.from({ length: size }, (_, position) => valueAt(position));
    },
  };
}

/**
 * Finds the Epsilon position for a set of modifier ids, in any order.
 */
export function epsilonPositionOf(ids: readonly string[], catalogSize: number): number {
  const catalog = MODIFIER_CATALOG.slice(0, catalogSize);
  const size = 2 ** catalog.length - 1;
  let mask = 0;
  for (const id of ids) {
    const bit = catalog.findIndex((modifier) => modifier.id === id);
    if (bit < 0) {
      throw new OutOfDomainError('epsilon', id, size);
    }
    mask |= 1 << bit;
  }
  return assertPosition('epsilon', mask - 1, size);
}
