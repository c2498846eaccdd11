/**
 * svgpicture BatchConverter
 *
 * Converts many documents with a concurrency limit. Each document is an
 * independent job: a failure is recorded in its result and the remaining
 * jobs keep running. Results come back in input order.
 *
 * Jobs that would write the same output file fail up front, before any
 * of them is converted.
 */

import path from 'path';
import { ErrorHandler, OutputConflictError } from '../errors/index.js';
import type { SvgPictureError } from '../errors/index.js';
import { ProgressReporter } from '../cli/progress.js';
import type { ConversionResult, ConvertOptions, SvgConverter } from './converter.js';

export interface BatchJob extends ConvertOptions {
  input: string;
}

export interface BatchResult {
  input: string;
  success: boolean;
  result?: ConversionResult;
  error?: SvgPictureError;
  durationMs: number;
}

export class BatchConverter {
  constructor(
    private converter: SvgConverter,
    private reporter: ProgressReporter,
    private concurrency: number = 2
  ) {}

  async processBatch(jobs: BatchJob[]): Promise<BatchResult[]> {
    const results: BatchResult[] = new Array(jobs.length);
    const conflicts = this.findOutputConflicts(jobs);
    const queue = jobs.map((job, index) => ({ job, index }));

    const runWorker = async (): Promise<void> => {
      while (queue.length > 0) {
        const task = queue.shift();
        if (!task) break;
        const conflict = conflicts.get(task.index);
        results[task.index] = conflict ? this.rejectJob(task.job, conflict) : await this.processJob(task.job);
      }
    };

    const workers: Promise<void>[] = [];
    const workerCount = Math.min(Math.max(1, this.concurrency), jobs.length);
    for (let i = 0; i < workerCount; i++) {
      workers.push(runWorker());
    }
    await Promise.all(workers);

    return results;
  }

  /** Job index → the first output it shares with another job. */
  private findOutputConflicts(jobs: BatchJob[]): Map<number, OutputConflictError> {
    const writers = new Map<string, number[]>();
    jobs.forEach((job, index) => {
      for (const output of this.converter.outputPaths(job.input, job)) {
        const key = path.resolve(output);
        writers.set(key, [...(writers.get(key) ?? []), index]);
      }
    });

    const conflicts = new Map<number, OutputConflictError>();
    for (const [output, indices] of writers) {
      if (indices.length < 2) continue;
      const inputs = indices.map((i) => jobs[i].input);
      for (const index of indices) {
        if (!conflicts.has(index)) conflicts.set(index, new OutputConflictError(output, inputs));
      }
    }
    return conflicts;
  }

  private rejectJob(job: BatchJob, conflict: OutputConflictError): BatchResult {
    this.reporter.failTask(`Convert ${job.input}`, new Error(ErrorHandler.toUserMessage(conflict)));
    return { input: job.input, success: false, error: conflict, durationMs: 0 };
  }

  private async processJob(job: BatchJob): Promise<BatchResult> {
    const start = Date.now();
    const name = `Convert ${job.input}`;
    this.reporter.startTask(name);
    const { data, error } = await ErrorHandler.wrap(
      () => this.converter.convert(job.input, { method: job.method, outDir: job.outDir }),
      { input: job.input }
    );
    const durationMs = Date.now() - start;
    if (error || !data) {
      const failure = error ?? new Error('Conversion produced no result');
      this.reporter.failTask(name, new Error(ErrorHandler.toUserMessage(failure)));
      return { input: job.input, success: false, error, durationMs };
    }
    this.reporter.completeTask(name, durationMs);
    return { input: job.input, success: true, result: data, durationMs };
  }
}
