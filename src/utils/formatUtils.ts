/**
 * Formatting utilities for display purposes.
 */

import type { Row, TransformedDataset } from '../types/dataset';
import type { StrategyDescriptor } from '../engine/strategies';

/**
 * Formats Epsilon modifiers as "tie+slur".
 */
export function formatModifiers(row: Row): string {
  return row.epsilon.modifiers.map((modifier) => modifier.id).join('+');
}

/**
 * Formats a row as "#3 Quarter | C♯ | Fourth Octave | tie+slur".
 */
export function formatRow(row: Row): string {
  return `#${row.index} ${row.chi.name} | ${row.theta.spelling} | ${row.lambda.name} | ${formatModifiers(row)}`;
}

/**
 * Formats resolved parameters as "interval=fifth, steps=2"; empty when there are none.
 */
export function formatParams(params: Readonly<Record<string, number | string>>): string {
  return Object.entries(params)
    .map(([key, value]) => `${key}=${value}`)
    .join(', ');
}

/**
 * One-line summary of a transformed dataset.
 */
export function formatDatasetSummary(dataset: TransformedDataset): string {
  const params = formatParams(dataset.params);
  const reversible = dataset.reversible ? 'reversible' : 'one-way';
  return `${dataset.strategy}${params ? ` (${params})` : ''}: ${dataset.rows.length} row(s), ${reversible}`;
}

/**
 * Numbered menu line for a catalog entry, e.g. "4. chromatic [theta, reversible]".
 */
export function formatStrategyMenuLine(descriptor: StrategyDescriptor, menuNumber: number): string {
  const reversible = descriptor.reversible ? 'reversible' : 'one-way';
  return `${menuNumber}. ${descriptor.name} [${descriptor.focus}, ${reversible}] - ${descriptor.description}`;
}
