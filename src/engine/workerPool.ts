/**
 * Bounded worker pool for batch transformation.
 */

import Bottleneck from 'bottleneck';

export class WorkerPool {
  private readonly limiter: Bottleneck;

  constructor(readonly concurrency: number) {
    this.limiter = new Bottleneck({ maxConcurrent: concurrency });
  }

  /**
   * Queues a synchronous work item; at most `concurrency` items run at once.
   */
  run<T>(task: () => T): Promise<T> {
    return this.limiter.schedule(async () => task());
  }
}
