/**
 * Commands behind the pipeline driver. Output goes through a `log` callback so the
 * commands can run without a terminal.
 */

import path from 'node:path';
import type { BaseDataset, TransformedDataset } from '../types/dataset';
import { TransformationEngine } from '../engine/core';
import { generateBase } from '../engine/baseBuilder';
import { InvalidNError, ModTableError } from '../engine/errors';
import { listStrategies } from '../engine/registry';
import { applyStrategy, checkReversibility, invert } from '../engine/transform';
import { ExportService, exportService, isExportFormat, type ExportFormat } from '../services/ExportService';
import { formatDatasetSummary, formatRow, formatStrategyMenuLine } from '../utils/formatUtils';
import { parseSelection } from '../utils/selectionParser';

export type Log = (message: string) => void;

const defaultLog: Log = (message) => console.log(message);

export const TEST_ROW_COUNT = 6;
export const DEMO_ROW_COUNT = 8;
export const IMPORT_PREVIEW_ROWS = 10;

export interface RunArgs {
  n: number;
  selection: string;
  outputDir?: string;
  format: ExportFormat;
}

export interface ImportArgs {
  file?: string;
  outputDir?: string;
}

export interface ImportResult {
  dataset: TransformedDataset;
  /** Present when the table is reversible */
  decoded?: BaseDataset;
  matchesBase?: boolean;
}

/** The part of a readline interface the interactive mode uses */
export interface Prompt {
  question(query: string, options: { signal: AbortSignal }): Promise<string>;
  on(event: 'SIGINT', listener: () => void): unknown;
  close(): void;
}

export interface RunContext {
  engine?: TransformationEngine;
  exporter?: ExportService;
  signal?: AbortSignal;
  log?: Log;
}

/**
 * Parses N the way the driver accepts it: a non-negative decimal integer.
 *
 * @throws InvalidNError
 */
export function parseN(raw: string): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidNError(Number(trimmed));
  }
  return Number(trimmed);
}

/**
 * Parses `<N> <selection> [--out <dir>] [--format json|midi|both]`.
 */
export function parseRunArgs(args: readonly string[]): RunArgs {
  const positionals: string[] = [];
  let outputDir: string | undefined;
  let format: ExportFormat = 'json';

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--out' || arg === '--format') {
      const value = args[i + 1];
      if (value === undefined) {
        throw new Error(`${arg} requires a value`);
      }
      i++;
      if (arg === '--out') {
        outputDir = value;
      } else if (isExportFormat(value)) {
        format = value;
      } else {
        throw new Error(`Unknown format '${value}' (expected json, midi or both)`);
      }
    } else {
      positionals.push(arg);
    }
  }

  if (positionals.length !== 2) {
    throw new Error('Usage: run <N> <selection> [--out <dir>] [--format json|midi|both]');
  }

  return { n: parseN(positionals[0]), selection: positionals[1], outputDir, format };
}

/**
 * Parses `[file] [--out <dir>]`.
 */
export function parseImportArgs(args: readonly string[]): ImportArgs {
  const positionals: string[] = [];
  let outputDir: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--out') {
      const value = args[i + 1];
      if (value === undefined) {
        throw new Error('--out requires a value');
      }
      outputDir = value;
      i++;
    } else {
      positionals.push(arg);
    }
  }

  if (positionals.length > 1) {
    throw new Error('Usage: import [file] [--out <dir>]');
  }
  return { file: positionals[0], outputDir };
}

export function printHelp(log: Log = defaultLog): void {
  log('Musical mod table pipeline');
  log('');
  log('Usage:');
  log('  pipeline run <N> <selection> [--out <dir>] [--format json|midi|both]');
  log('  pipeline import [file] [--out <dir>]');
  log('                    load an exported dataset and decode it, or list exports');
  log('  pipeline test     transform N=6 with every table and check reversibility');
  log('  pipeline demo     show N=8 through every table');
  log('  pipeline help     show this message');
  log('  pipeline          interactive mode');
  log('');
  log('Mod tables:');
  listStrategies().forEach((descriptor, i) => log(`  ${formatStrategyMenuLine(descriptor, i + 1)}`));
  log('');
  log('Selection: comma-separated menu numbers, names, "music" or "all";');
  log('parameters as name:key=value;key=value, e.g. chromatic:interval=fourth');
}

/**
 * Generates the base for N, applies the selection and exports every dataset.
 * Returns the written file paths.
 */
export async function runCommand(args: RunArgs, context: RunContext = {}): Promise<string[]> {
  const log = context.log ?? defaultLog;
  const engine = context.engine ?? new TransformationEngine();
  const exporter = context.exporter ?? exportService;

  const selections = parseSelection(args.selection);
  if (selections.length === 0) {
    throw new Error('Selection is empty');
  }

  const base = generateBase(args.n);
  log(`[pipeline] Generated base dataset: ${base.rows.length} row(s)`);

  const datasets = await engine.applyBatchAsync(base, selections, { signal: context.signal });
  datasets.forEach((dataset) => log(`[pipeline] ${formatDatasetSummary(dataset)}`));

  const written = await exporter.exportAll(datasets, args.format, args.outputDir ? { outputDir: args.outputDir } : {});
  log(`[pipeline] Exported ${written.length} file(s)`);
  return written;
}

function sameRows(a: BaseDataset, b: BaseDataset): boolean {
  return (
    a.rows.length === b.rows.length &&
    a.rows.every((row, i) => {
      const other = b.rows[i];
      return (
        row.index === other.index &&
        row.chi.position === other.chi.position &&
        row.theta.position === other.theta.position &&
        row.lambda.position === other.lambda.position &&
        row.epsilon.position === other.epsilon.position
      );
    })
  );
}

/**
 * Aborts the run, reporting that in-flight work is finishing.
 */
export function interrupt(controller: AbortController, log: Log = defaultLog): void {
  log('[pipeline] Interrupted, finishing in-flight work...');
  controller.abort();
}

/**
 * Prompts for N and a selection, then runs them. Ctrl-C at a prompt reaches readline
 * rather than the process, so the prompt's SIGINT aborts the run as well.
 */
export async function interactiveCommand(
  prompt: Prompt,
  controller: AbortController,
  context: RunContext = {}
): Promise<string[]> {
  const log = context.log ?? defaultLog;
  const { signal } = controller;
  prompt.on('SIGINT', () => interrupt(controller, log));
  try {
    printHelp(log);
    const n = parseN(await prompt.question('\nN: ', { signal }));
    const selection = await prompt.question('Selection: ', { signal });
    return await runCommand({ n, selection, format: 'json' }, { ...context, signal });
  } finally {
    prompt.close();
  }
}

/**
 * Lists the JSON exports in the output directory. Returns their paths.
 */
export async function listCommand(outputDir: string | undefined, context: RunContext = {}): Promise<string[]> {
  const log = context.log ?? defaultLog;
  const exporter = context.exporter ?? exportService;

  const files = await exporter.listExports(outputDir);
  if (files.length === 0) {
    log('[pipeline] No exported datasets found');
    return files;
  }

  log(`[pipeline] ${files.length} exported dataset(s):`);
  files.forEach((file, i) => log(`  ${i + 1}. ${path.basename(file)}`));
  log('Load one with: pipeline import <file>');
  return files;
}

/**
 * Loads an exported dataset, shows its provenance and rows, and decodes it back to
 * the base dataset when the table is reversible.
 */
export async function importCommand(file: string, context: RunContext = {}): Promise<ImportResult> {
  const log = context.log ?? defaultLog;
  const exporter = context.exporter ?? exportService;

  const dataset = await exporter.readJson(file);
  const { sizes } = dataset;
  log(`[pipeline] Loaded ${file}`);
  log(formatDatasetSummary(dataset));
  log(`  id: ${dataset.id}`);
  log(`  N=${dataset.n}, domain ${sizes.chi} x ${sizes.theta} x ${sizes.lambda} x ${sizes.epsilon}`);
  dataset.rows.slice(0, IMPORT_PREVIEW_ROWS).forEach((row) => log(`  ${formatRow(row)}`));
  if (dataset.rows.length > IMPORT_PREVIEW_ROWS) {
    log(`  ... ${dataset.rows.length - IMPORT_PREVIEW_ROWS} more row(s)`);
  }

  if (!dataset.reversible) {
    log('[pipeline] One-way table: nothing to decode');
    return { dataset };
  }

  const decoded = invert(dataset);
  const matchesBase = sameRows(generateBase(dataset.n, dataset.config), decoded);
  log(
    matchesBase
      ? `[pipeline] Decoded ${decoded.rows.length} row(s) back to the base dataset`
      : `[pipeline] Decoded rows differ from the base dataset for N=${dataset.n}`
  );
  return { dataset, decoded, matchesBase };
}

/**
 * Applies every table to N=6 and verifies that reversible tables invert exactly.
 * Returns the number of failed checks.
 */
export function testCommand(log: Log = defaultLog): number {
  const base = generateBase(TEST_ROW_COUNT);
  let failures = 0;

  for (const descriptor of listStrategies()) {
    const dataset = applyStrategy(base, descriptor.name);
    log(`--- ${formatDatasetSummary(dataset)} ---`);
    dataset.rows.slice(0, 2).forEach((row) => log(`  ${formatRow(row)}`));

    if (!descriptor.reversible) {
      log('  SKIP: one-way table');
      continue;
    }

    const report = checkReversibility(base, descriptor.name);
    const restored = invert(dataset);
    if (report.mismatches.length === 0 && sameRows(base, restored)) {
      log(`  PASS: inverse restores all ${report.checkedRows} row(s)`);
    } else {
      failures++;
      log(`  FAIL: ${report.mismatches.length} row(s) do not invert`);
    }
  }

  log(failures === 0 ? 'All reversibility checks passed.' : `${failures} reversibility check(s) failed.`);
  return failures;
}

/**
 * Shows how N=8 looks through every table.
 */
export function demoCommand(log: Log = defaultLog): TransformedDataset[] {
  const base = generateBase(DEMO_ROW_COUNT);
  log(`Base dataset, N=${base.n}:`);
  base.rows.forEach((row) => log(`  ${formatRow(row)}`));

  return listStrategies().map((descriptor) => {
    const dataset = applyStrategy(base, descriptor.name);
    log('');
    log(formatDatasetSummary(dataset));
    dataset.rows.slice(0, 3).forEach((row) => log(`  ${formatRow(row)}`));
    return dataset;
  });
}

/**
 * Prints a failure the way the driver reports it.
 */
export function describeFailure(error: unknown): string {
  if (error instanceof ModTableError) {
    return `[pipeline] ${error.name} (${error.code}): ${error.message}`;
  }
  if (error instanceof Error) {
    return `[pipeline] ${error.name}: ${error.message}`;
  }
  return `[pipeline] ${String(error)}`;
}
