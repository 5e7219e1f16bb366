/**
 * TransformationEngine - facade over the generation and transformation core.
 *
 * Wraps the synchronous operations with an async batch runner that spreads
 * (selection, chunk) work items over a bounded pool. Each work item writes a
 * disjoint slice of a preallocated output array, so results are identical to
 * the synchronous path regardless of scheduling.
 */

import type { BaseDataset, ParamInput, Selection, TransformedDataset, TransformedRow } from '../types/dataset';
import { generateBase } from './baseBuilder';
import { resolveEngineOptions, type EngineOptions, type GeneratorConfig } from './config';
import { createGenerators } from './dimensions';
import { BatchSelectionError, CancelledError, ModTableError } from './errors';
import { listStrategies } from './registry';
import type { StrategyDescriptor } from './strategies';
import {
  applyBatch,
  applyStrategy,
  assembleDataset,
  invert,
  prepareSelections,
  transformRow,
} from './transform';
import { WorkerPool } from './workerPool';

export interface ChunkProgress {
  selectionIndex: number;
  rowsDone: number;
  totalRows: number;
}

export interface RunOptions {
  /** Aborts the run; checked before every work item */
  signal?: AbortSignal;
  /** Called after each completed work item */
  onChunk?: (progress: ChunkProgress) => void;
}

export class TransformationEngine {
  readonly options: EngineOptions;

  constructor(options: Partial<EngineOptions> = {}) {
    this.options = resolveEngineOptions(options);
  }

  generate(n: number, config: Partial<GeneratorConfig> = {}): BaseDataset {
    return generateBase(n, config);
  }

  listStrategies(): StrategyDescriptor[] {
    return listStrategies();
  }

  apply(base: BaseDataset, name: string, params: ParamInput = {}): TransformedDataset {
    return applyStrategy(base, name, params);
  }

  applyBatch(base: BaseDataset, selections: readonly Selection[]): TransformedDataset[] {
    return applyBatch(base, selections);
  }

  invert(transformed: TransformedDataset): BaseDataset {
    return invert(transformed);
  }

  /**
   * Runs a batch on the worker pool.
   *
   * Output matches applyBatch for the same inputs.
   *
   * @throws BatchSelectionError for the lowest-indexed failing selection
   * @throws CancelledError if the signal aborts before every selection completes
   */
  public async applyBatchAsync(
    base: BaseDataset,
    selections: readonly Selection[],
    runOptions: RunOptions = {}
  ): Promise<TransformedDataset[]> {
    const { signal, onChunk } = runOptions;
    const prepared = prepareSelections(selections);
    if (signal?.aborted) {
      throw new CancelledError([]);
    }

    const generators = createGenerators(base.config);
    const total = base.rows.length;
    const { chunkSize, concurrency } = this.options;
    const chunksPerSelection = Math.ceil(total / chunkSize);

    const outputs: TransformedRow[][] = prepared.map(() => new Array<TransformedRow>(total));
    const remaining: number[] = prepared.map(() => chunksPerSelection);
    const rowsDone: number[] = prepared.map(() => 0);
    const failures = new Map<number, unknown>();
    let cancelled = false;

    this.log(`batch started: ${prepared.length} selection(s), ${total} row(s), ${chunksPerSelection} chunk(s) each`);

    const pool = new WorkerPool(concurrency);
    const jobs: Promise<void>[] = [];

    prepared.forEach((selection, selectionIndex) => {
      for (let start = 0; start < total; start += chunkSize) {
        const end = Math.min(start + chunkSize, total);
        const job = pool.run(() => {
          if (cancelled || failures.has(selectionIndex)) {
            return;
          }
          if (signal?.aborted) {
            cancelled = true;
            return;
          }
          const rows = outputs[selectionIndex];
          for (let index = start; index < end; index++) {
            rows[index] = transformRow(base.rows[index], selection, generators);
          }
          remaining[selectionIndex] -= 1;
          rowsDone[selectionIndex] += end - start;
          onChunk?.({ selectionIndex, rowsDone: rowsDone[selectionIndex], totalRows: total });
        });
        jobs.push(
          job.catch((error: unknown) => {
            if (!failures.has(selectionIndex)) {
              failures.set(selectionIndex, error);
            }
          })
        );
      }
    });

    await Promise.all(jobs);

    const completed: TransformedDataset[] = [];
    for (let index = 0; index < prepared.length; index++) {
      if (failures.has(index)) {
        const failure = failures.get(index);
        this.log(`selection #${index} ('${selections[index].name}') failed`);
        if (failure instanceof ModTableError) {
          throw new BatchSelectionError(index, selections[index], failure, completed);
        }
        throw failure;
      }
      if (remaining[index] === 0) {
        completed.push(assembleDataset(base, prepared[index], outputs[index]));
      }
    }

    if (cancelled || completed.length < prepared.length) {
      this.log(`batch cancelled after ${completed.length} selection(s)`);
      throw new CancelledError(completed);
    }

    this.log(`batch finished: ${completed.length} dataset(s)`);
    return completed;
  }

  /**
   * Async single-strategy convenience over applyBatchAsync.
   */
  public async applyAsync(
    base: BaseDataset,
    name: string,
    params: ParamInput = {},
    runOptions: RunOptions = {}
  ): Promise<TransformedDataset> {
    try {
      const [dataset] = await this.applyBatchAsync(base, [{ name, params }], runOptions);
      return dataset;
    } catch (error) {
      if (error instanceof BatchSelectionError) {
        throw error.cause;
      }
      throw error;
    }
  }

  private log(message: string): void {
    if (this.options.verbose) {
      console.log(`[TransformationEngine] ${message}`);
    }
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Creates a TransformationEngine with the default pool settings.
 */
export function createTransformationEngine(options: Partial<EngineOptions> = {}): TransformationEngine {
  return new TransformationEngine(options);
}
