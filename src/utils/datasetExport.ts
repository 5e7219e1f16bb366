/**
 * Dataset Export Utilities
 *
 * Serializes transformed datasets to a versioned JSON document and reads them back,
 * so an exported run can be inspected or inverted later.
 */

import { v4 as uuidv4 } from 'uuid';
import type { ParamValue, TransformedDataset, TransformedRow } from '../types/dataset';
import type { DomainSizes, RowCoordinates } from '../types/dimensions';
import { buildRow } from '../engine/baseBuilder';
import { createGenerators } from '../engine/dimensions';
import { InvalidConfigError } from '../engine/errors';
import { resolveStrategy } from '../engine/registry';
import { resolveParams } from '../engine/strategies';

export const EXPORT_FORMAT_VERSION = '1.0';

export interface ExportedRow {
  index: number;
  chi: { position: number; name: string; beats: number };
  theta: { position: number; spelling: string; pitchClass: number };
  lambda: { position: number; octave: number };
  epsilon: { position: number; modifiers: string[] };
  chord?: Array<{ position: number; spelling: string }>;
}

export interface DatasetDocument {
  version: string;
  exportDate: string;
  metadata: {
    id: string;
    n: number;
    strategy: string;
    params: Record<string, ParamValue>;
    reversible: boolean;
    config: { chiDomainSize: number; epsilonCatalogSize: number; maxRows: number };
    sizes: DomainSizes;
    rowCount: number;
  };
  rows: ExportedRow[];
}

function exportRow(row: TransformedRow): ExportedRow {
  return {
    index: row.index,
    chi: { position: row.chi.position, name: row.chi.name, beats: row.chi.beats },
    theta: { position: row.theta.position, spelling: row.theta.spelling, pitchClass: row.theta.pitchClass },
    lambda: { position: row.lambda.position, octave: row.lambda.octave },
    epsilon: {
      position: row.epsilon.position,
      modifiers: row.epsilon.modifiers.map((modifier) => modifier.id),
    },
    ...(row.chord
      ? { chord: row.chord.map((tone) => ({ position: tone.position, spelling: tone.spelling })) }
      : {}),
  };
}

/**
 * Builds the export document for a transformed dataset.
 */
export function toDatasetDocument(dataset: TransformedDataset, exportDate: Date = new Date()): DatasetDocument {
  return {
    version: EXPORT_FORMAT_VERSION,
    exportDate: exportDate.toISOString(),
    metadata: {
      id: dataset.id,
      n: dataset.n,
      strategy: dataset.strategy,
      params: { ...dataset.params },
      reversible: dataset.reversible,
      config: { ...dataset.config },
      sizes: { ...dataset.sizes },
      rowCount: dataset.rows.length,
    },
    rows: dataset.rows.map(exportRow),
  };
}

/**
 * Export a transformed dataset to JSON
 *
 * @returns JSON string ready to be written to disk
 */
export function exportDatasetToJson(dataset: TransformedDataset, exportDate: Date = new Date()): string {
  return JSON.stringify(toDatasetDocument(dataset, exportDate), null, 2);
}

/**
 * Builds `transformed_N{n}_{strategy}[_{param}-{value}...].{ext}`, parameters in schema order.
 */
export function buildExportFileName(dataset: TransformedDataset, extension: string): string {
  const strategy = resolveStrategy(dataset.strategy);
  const suffix = strategy.parameters
    .filter((spec) => dataset.params[spec.name] !== undefined)
    .map((spec) => `_${spec.name}-${dataset.params[spec.name]}`)
    .join('');
  return `transformed_N${dataset.n}_${dataset.strategy}${suffix}.${extension.replace(/^\./, '')}`;
}

// ============================================================================
// Import
// ============================================================================

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireObject(value: unknown, field: string): JsonObject {
  if (!isObject(value)) {
    throw new InvalidConfigError(field, 'expected an object');
  }
  return value;
}

function requireArray(value: unknown, field: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new InvalidConfigError(field, 'expected an array');
  }
  return value;
}

function requireInteger(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new InvalidConfigError(field, `expected an integer, got ${JSON.stringify(value)}`);
  }
  return value;
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== 'string') {
    throw new InvalidConfigError(field, `expected a string, got ${JSON.stringify(value)}`);
  }
  return value;
}

function readParams(value: unknown): Record<string, ParamValue> {
  const params: Record<string, ParamValue> = {};
  for (const [name, raw] of Object.entries(requireObject(value, 'metadata.params'))) {
    if (typeof raw !== 'number' && typeof raw !== 'string') {
      throw new InvalidConfigError(`metadata.params.${name}`, 'expected a number or string');
    }
    params[name] = raw;
  }
  return params;
}

function readPosition(row: JsonObject, dimension: keyof RowCoordinates, field: string): number {
  return requireInteger(requireObject(row[dimension], `${field}.${dimension}`).position, `${field}.${dimension}.position`);
}

/**
 * Reads a document produced by exportDatasetToJson back into a TransformedDataset.
 * Rows are rebuilt from their positions, so values always match the generators.
 *
 * @throws InvalidConfigError for structural problems, naming the offending field
 * @throws OutOfDomainError for positions outside their domain
 * @throws UnknownStrategyError, UnknownParameterError or InvalidParameterError for bad provenance
 */
export function parseTransformedDatasetJson(json: string): TransformedDataset {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new InvalidConfigError('document', error instanceof Error ? error.message : String(error));
  }

  const document = requireObject(parsed, 'document');
  const version = requireString(document.version, 'version');
  if (version !== EXPORT_FORMAT_VERSION) {
    throw new InvalidConfigError('version', `unsupported export version '${version}'`);
  }

  const metadata = requireObject(document.metadata, 'metadata');
  const strategy = resolveStrategy(requireString(metadata.strategy, 'metadata.strategy'));
  const params = resolveParams(strategy, readParams(metadata.params));
  const config = requireObject(metadata.config, 'metadata.config');
  const generators = createGenerators({
    chiDomainSize: requireInteger(config.chiDomainSize, 'metadata.config.chiDomainSize'),
    epsilonCatalogSize: requireInteger(config.epsilonCatalogSize, 'metadata.config.epsilonCatalogSize'),
    maxRows: requireInteger(config.maxRows, 'metadata.config.maxRows'),
  });

  const n = requireInteger(metadata.n, 'metadata.n');
  const rawRows = requireArray(document.rows, 'rows');
  if (rawRows.length !== n) {
    throw new InvalidConfigError('rows', `expected ${n} rows, got ${rawRows.length}`);
  }

  const rows = rawRows.map((raw, i): TransformedRow => {
    const field = `rows[${i}]`;
    const row = requireObject(raw, field);
    const index = requireInteger(row.index, `${field}.index`);
    if (index !== i) {
      throw new InvalidConfigError(`${field}.index`, `expected ${i}, got ${index}`);
    }

    const coords: RowCoordinates = {
      chi: readPosition(row, 'chi', field),
      theta: readPosition(row, 'theta', field),
      lambda: readPosition(row, 'lambda', field),
      epsilon: readPosition(row, 'epsilon', field),
    };
    const chord =
      row.chord === undefined
        ? undefined
        : requireArray(row.chord, `${field}.chord`).map((tone, t) =>
            generators.theta.valueAt(
              requireInteger(requireObject(tone, `${field}.chord[${t}]`).position, `${field}.chord[${t}].position`)
            )
          );

    return Object.freeze({
      ...buildRow(index, coords, generators),
      strategy: strategy.name,
      params,
      ...(chord ? { chord: Object.freeze(chord) } : {}),
    });
  });

  const id = typeof metadata.id === 'string' && metadata.id.length > 0 ? metadata.id : uuidv4();

  return Object.freeze({
    id,
    n,
    strategy: strategy.name,
    params,
    reversible: strategy.reversible,
    config: generators.config,
    sizes: generators.sizes,
    rows: Object.freeze(rows),
  });
}
