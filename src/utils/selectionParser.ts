/**
 * Selection parsing for the pipeline driver.
 *
 * A selection string is a comma-separated list of tokens. Each token is a menu number
 * (1-8 in catalog order), a strategy name, `music`, `all`, or a name with parameters:
 *
 *   chromatic:interval=fourth, octave:operation=down;steps=2
 */

import type { ParamValue, Selection } from '../types/dataset';
import { InvalidParameterError, UnknownStrategyError } from '../engine/errors';
import { getAvailableStrategyNames, getMusicalStrategyNames, isStrategyName } from '../engine/registry';

const INTEGER_PATTERN = /^-?\d+$/;

function parseValue(raw: string): ParamValue {
  return INTEGER_PATTERN.test(raw) ? Number(raw) : raw;
}

function parseParams(name: string, raw: string): Record<string, ParamValue> {
  const params: Record<string, ParamValue> = {};
  for (const pair of raw.split(';')) {
    const trimmed = pair.trim();
    if (trimmed === '') {
      continue;
    }
    const separator = trimmed.indexOf('=');
    if (separator <= 0) {
      throw new InvalidParameterError(name, trimmed, 'expected key=value');
    }
    params[trimmed.slice(0, separator).trim()] = parseValue(trimmed.slice(separator + 1).trim());
  }
  return params;
}

function expandToken(token: string): Selection[] {
  const separator = token.indexOf(':');
  if (separator >= 0) {
    const name = token.slice(0, separator).trim().toLowerCase();
    if (!isStrategyName(name)) {
      throw new UnknownStrategyError(name);
    }
    return [{ name, params: parseParams(name, token.slice(separator + 1)) }];
  }

  const word = token.toLowerCase();
  const catalog = getAvailableStrategyNames();

  if (word === 'all') {
    return catalog.map((name) => ({ name }));
  }
  if (word === 'music') {
    return getMusicalStrategyNames().map((name) => ({ name }));
  }
  if (INTEGER_PATTERN.test(word)) {
    const choice = catalog[Number(word) - 1];
    if (choice === undefined) {
      throw new UnknownStrategyError(word);
    }
    return [{ name: choice }];
  }
  if (!isStrategyName(word)) {
    throw new UnknownStrategyError(word);
  }
  return [{ name: word }];
}

function selectionKey(selection: Selection): string {
  const params = Object.entries(selection.params ?? {})
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([key, value]) => `${key}=${value}`)
    .join(';');
  return `${selection.name}:${params}`;
}

/**
 * Parses a selection string into an ordered, de-duplicated list of selections.
 *
 * @throws UnknownStrategyError for tokens naming no strategy
 * @throws InvalidParameterError for malformed key=value pairs
 */
export function parseSelection(input: string): Selection[] {
  const seen = new Set<string>();
  const selections: Selection[] = [];

  for (const token of input.split(',')) {
    const trimmed = token.trim();
    if (trimmed === '') {
      continue;
    }
    for (const selection of expandToken(trimmed)) {
      const key = selectionKey(selection);
      if (!seen.has(key)) {
        seen.add(key);
        selections.push(selection);
      }
    }
  }

  return selections;
}
