/**
 * Tests for the TransformationEngine facade and its async batch runner.
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import type { Selection } from '../../types/dataset';
import { generateBase } from '../baseBuilder';
import { createTransformationEngine, TransformationEngine } from '../core';
import { BatchSelectionError, CancelledError, InvalidConfigError, InvalidParameterError } from '../errors';
import { applyBatch } from '../transform';
import { WorkerPool } from '../workerPool';

const SMALL = { chiDomainSize: 4, epsilonCatalogSize: 3 };

async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected the promise to reject');
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('WorkerPool', () => {
  it('should resolve each work item with its own result', async () => {
    const pool = new WorkerPool(2);
    const results = await Promise.all([1, 2, 3, 4].map((value) => pool.run(() => value * 10)));
    expect(results).toEqual([10, 20, 30, 40]);
  });

  it('should reject with the error a work item throws', async () => {
    const pool = new WorkerPool(1);
    await expect(
      pool.run(() => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
  });
});

describe('TransformationEngine', () => {
  const selections: Selection[] = [
    { name: 'default', params: { step: 2 } },
    { name: 'chromatic', params: { interval: 'fourth' } },
    { name: 'harmonic' },
    { name: 'octave', params: { operation: 'invert' } },
  ];

  it('should validate its options', () => {
    expect(() => new TransformationEngine({ concurrency: 0 })).toThrow(InvalidConfigError);
    expect(() => new TransformationEngine({ chunkSize: 0 })).toThrow(InvalidConfigError);
    expect(createTransformationEngine().options).toEqual({ concurrency: 4, chunkSize: 1024, verbose: false });
  });

  it('should delegate the synchronous operations', () => {
    const engine = createTransformationEngine();
    const base = engine.generate(5, SMALL);
    const transformed = engine.apply(base, 'rhythmic');
    expect(engine.invert(transformed).rows).toEqual(base.rows);
    expect(engine.listStrategies()).toHaveLength(8);
    expect(engine.applyBatch(base, [{ name: 'custom' }])[0].strategy).toBe('custom');
  });

  it('should produce the same rows as the synchronous batch', async () => {
    const base = generateBase(250, SMALL);
    const engine = new TransformationEngine({ concurrency: 3, chunkSize: 16 });

    const asyncResults = await engine.applyBatchAsync(base, selections);
    const syncResults = applyBatch(base, selections);

    expect(asyncResults.map((dataset) => dataset.strategy)).toEqual(['default', 'chromatic', 'harmonic', 'octave']);
    asyncResults.forEach((dataset, i) => {
      expect(dataset.rows).toEqual(syncResults[i].rows);
      expect(dataset.params).toEqual(syncResults[i].params);
    });
  });

  it('should report progress after each chunk', async () => {
    const base = generateBase(10, SMALL);
    const engine = new TransformationEngine({ concurrency: 1, chunkSize: 4 });
    const progress: Array<[number, number]> = [];

    await engine.applyBatchAsync(base, [{ name: 'default' }], {
      onChunk: ({ selectionIndex, rowsDone }) => progress.push([selectionIndex, rowsDone]),
    });

    expect(progress).toEqual([
      [0, 4],
      [0, 8],
      [0, 10],
    ]);
  });

  it('should reject invalid selections before running anything', async () => {
    const base = generateBase(10, SMALL);
    const engine = new TransformationEngine();
    const onChunk = vi.fn();

    const error = await captureRejection(
      engine.applyBatchAsync(base, [{ name: 'default' }, { name: 'octave', params: { steps: 0 } }], { onChunk })
    );

    expect(error).toBeInstanceOf(BatchSelectionError);
    if (error instanceof BatchSelectionError) {
      expect(error.selectionIndex).toBe(1);
      expect(error.completed).toEqual([]);
    }
    expect(onChunk).not.toHaveBeenCalled();
  });

  it('should fail with Cancelled when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const error = await captureRejection(
      new TransformationEngine().applyBatchAsync(generateBase(10, SMALL), selections, { signal: controller.signal })
    );

    expect(error).toBeInstanceOf(CancelledError);
    if (error instanceof CancelledError) {
      expect(error.completed).toEqual([]);
    }
  });

  it('should keep the selections completed before an abort', async () => {
    const base = generateBase(10, SMALL);
    const engine = new TransformationEngine({ concurrency: 1, chunkSize: 5 });
    const controller = new AbortController();

    const error = await captureRejection(
      engine.applyBatchAsync(base, [{ name: 'octave' }, { name: 'rhythmic' }], {
        signal: controller.signal,
        onChunk: ({ selectionIndex, rowsDone, totalRows }) => {
          if (selectionIndex === 0 && rowsDone === totalRows) {
            controller.abort();
          }
        },
      })
    );

    expect(error).toBeInstanceOf(CancelledError);
    if (error instanceof CancelledError) {
      expect(error.completed.map((dataset) => dataset.strategy)).toEqual(['octave']);
      expect(error.completed[0].rows).toHaveLength(10);
    }
  });

  it('should unwrap the cause for single async applications', async () => {
    const engine = new TransformationEngine();
    const error = await captureRejection(engine.applyAsync(generateBase(3, SMALL), 'default', { step: 100 }));
    expect(error).toBeInstanceOf(InvalidParameterError);

    const dataset = await engine.applyAsync(generateBase(3, SMALL), 'octave');
    expect(dataset.rows[0].lambda.octave).toBe(2);
  });

  it('should log the batch lifecycle only when verbose', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const base = generateBase(3, SMALL);

    await new TransformationEngine().applyBatchAsync(base, [{ name: 'default' }]);
    expect(log).not.toHaveBeenCalled();

    await new TransformationEngine({ verbose: true }).applyBatchAsync(base, [{ name: 'default' }]);
    expect(log.mock.calls.map(([message]) => message)).toEqual([
      '[TransformationEngine] batch started: 1 selection(s), 3 row(s), 1 chunk(s) each',
      '[TransformationEngine] batch finished: 1 dataset(s)',
    ]);
  });
});
