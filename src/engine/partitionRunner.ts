import { queue as asyncQueue } from 'async';
import type { QueueObject } from 'async';
import { codecConfig } from '../config/codecConfig';

/**
 * Evaluates one record of a partition. Built once per partition and never shared.
 */
export type RecordEvaluator<I, O> = (record: I) => O;

export interface PartitionProgress {
  completedPartitions: number;
  totalPartitions: number;
}

interface PartitionTask {
  label: string;
  execute: () => void;
}

/**
 * Runs batches of partitions through a shared queue. Each partition gets its own
 * evaluator, so bound expressions and their lazily built parsers and writers stay
 * confined to one partition.
 */
export class PartitionRunner {
  private readonly queue: QueueObject<PartitionTask>;

  constructor(concurrency: number = codecConfig.partitionConcurrency) {
    this.queue = asyncQueue(async (task: PartitionTask) => {
      console.log(`[Queue] Starting ${task.label} (queue length: ${this.queue.length()}, running: ${this.queue.running()})`);
      task.execute();
      console.log(`[Queue] Finished ${task.label}`);
    }, concurrency);

    this.queue.error((err, task) => {
      console.error(`[Queue] ${task.label} failed:`, err);
    });
  }

  /**
   * Evaluates every partition; results keep partition and record order. Rejects with
   * the first partition failure.
   */
  async run<I, O>(
    label: string,
    partitions: readonly (readonly I[])[],
    createEvaluator: () => RecordEvaluator<I, O>,
    onProgress?: (progress: PartitionProgress) => void,
  ): Promise<O[][]> {
    const results: O[][] = partitions.map(() => []);
    let completedPartitions = 0;

    await Promise.all(
      partitions.map(
        (records, index) =>
          new Promise<void>((resolve, reject) => {
            const task: PartitionTask = {
              label: `${label} partition ${index}`,
              execute: () => {
                const evaluate = createEvaluator();
                results[index] = records.map((record) => evaluate(record));
              },
            };
            this.queue.push(task, (err) => {
              if (err) {
                reject(err);
                return;
              }
              completedPartitions += 1;
              onProgress?.({ completedPartitions, totalPartitions: partitions.length });
              resolve();
            });
          }),
      ),
    );

    return results;
  }

  get stats(): { length: number; running: number; idle: boolean } {
    return {
      length: this.queue.length(),
      running: this.queue.running(),
      idle: this.queue.idle(),
    };
  }
}
