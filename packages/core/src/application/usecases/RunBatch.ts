import type { BatchResult, Job } from '../../domain/model/BatchJob.js';
import type { BatchSummary } from '../../domain/model/Progress.js';
import type { DataSink } from '../../domain/ports/DataSink.js';
import type { DataSource } from '../../domain/ports/DataSource.js';
import type { TabularFormat } from '../../domain/ports/TabularFormat.js';
import { BatchProcessingError, ErrorKind, isGeocodingError } from '../../domain/errors/GeocodingError.js';
import { resolveBatchOptions } from '../../domain/model/BatchOptions.js';
import { BoundedChannel } from '../concurrency/BoundedChannel.js';
import { BatchReader, estimateTotalRows } from '../pipeline/BatchReader.js';
import { BatchWorker } from '../pipeline/BatchWorker.js';
import { BatchWriter } from '../pipeline/BatchWriter.js';
import { probeCredential } from '../services/PreflightProbe.js';
import type { PipelineContext } from '../PipelineContext.js';

interface TaskFailure {
  readonly task: string;
  readonly error: unknown;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Use case: drive one batch run through
 * `CREATED → PREFLIGHTING → RUNNING → DRAINING → COMPLETED`, or to `FAILED`.
 *
 * Resolves with the summary, or rejects with exactly one `BatchProcessingError`
 * whose `cause` is the root error. The sink is closed on both paths.
 */
export class RunBatch {
  constructor(private readonly ctx: PipelineContext) {}

  async execute(): Promise<BatchSummary> {
    if (this.ctx.status !== 'CREATED') {
      throw new BatchProcessingError(`Cannot run batch from status '${this.ctx.status}'`);
    }

    let configured: { source: DataSource; format: TabularFormat; sink: DataSink };
    try {
      configured = this.ctx.assertConfigured();
      this.ctx.resolved = resolveBatchOptions(this.ctx.options);
    } catch (error) {
      throw this.fail(error);
    }
    const { source, format, sink } = configured;

    this.ctx.transitionTo('PREFLIGHTING');
    this.ctx.startedAt = Date.now();

    // Yield so handlers registered after run() on the same tick receive every event
    await Promise.resolve();

    try {
      await this.preflight(source);
      await this.runTasks(source, format, sink);
    } catch (error) {
      await this.closeAfterFailure(sink);
      throw this.fail(error);
    }

    try {
      await sink.close();
    } catch (error) {
      throw this.fail(new BatchProcessingError(`Failed to close output: ${messageOf(error)}`, error));
    }

    if (this.ctx.rowsWritten === 0) {
      this.warn('No rows were written: every input row was skipped or dropped');
    }

    this.ctx.transitionTo('COMPLETED');
    const summary = this.ctx.buildSummary();
    this.ctx.eventBus.emit({
      type: 'job:completed',
      jobId: this.ctx.jobId,
      summary,
      timestamp: Date.now(),
    });
    return summary;
  }

  private async preflight(source: DataSource): Promise<void> {
    const options = this.ctx.requireOptions();

    const [report, totalRows] = await Promise.all([
      probeCredential(this.ctx.geocoder, { timeoutMs: options.timeoutMs }),
      estimateTotalRows(this.ctx, source).catch((error: unknown) => {
        this.warn(`Could not count input rows, progress total unknown: ${messageOf(error)}`);
        return null;
      }),
    ]);

    this.ctx.eventBus.emit({
      type: 'job:preflighted',
      jobId: this.ctx.jobId,
      constrainedTier: report.constrainedTier,
      timestamp: Date.now(),
    });

    if (report.error !== null) {
      throw new BatchProcessingError(`API key pre-flight check failed: ${report.error}`);
    }

    let workers = options.workers;
    if (report.constrainedTier === true && workers > 1) {
      this.warn(
        `Free trial account detected. Reducing workers from ${String(workers)} to 1 to stay within the request rate.`,
      );
      workers = 1;
    }

    this.ctx.workers = workers;
    this.ctx.totalRows = totalRows;
  }

  private async runTasks(source: DataSource, format: TabularFormat, sink: DataSink): Promise<void> {
    const { channelCapacity } = this.ctx.requireOptions();
    const jobs = new BoundedChannel<Job>(channelCapacity);
    const results = new BoundedChannel<BatchResult>(channelCapacity);
    const failures: TaskFailure[] = [];

    const supervise = (task: string, work: Promise<void>): Promise<void> =>
      work.catch((error: unknown) => {
        failures.push({ task, error });
        this.ctx.abortController.abort();
        jobs.cancel();
        results.cancel();
      });

    this.ctx.transitionTo('RUNNING');
    this.ctx.eventBus.emit({
      type: 'job:started',
      jobId: this.ctx.jobId,
      workers: this.ctx.workers,
      totalRows: this.ctx.totalRows,
      timestamp: Date.now(),
    });

    const writer = supervise('Writer', new BatchWriter(this.ctx, results).run(format, sink));
    const producers = [
      supervise('Reader', new BatchReader(this.ctx, jobs).run(source, format)),
      ...Array.from({ length: this.ctx.workers }, () =>
        supervise('Worker', new BatchWorker(this.ctx, jobs, results).run()),
      ),
    ];

    await Promise.all(producers);
    results.close();
    if (failures.length === 0) {
      this.ctx.transitionTo('DRAINING');
    }
    await writer;

    const [first] = failures;
    if (first) {
      throw new BatchProcessingError(`${first.task} task failed: ${messageOf(first.error)}`, first.error);
    }
  }

  private async closeAfterFailure(sink: DataSink): Promise<void> {
    try {
      await sink.close();
    } catch (error) {
      this.warn(`Failed to close output after a fatal error: ${messageOf(error)}`);
    }
  }

  private fail(error: unknown): BatchProcessingError {
    const fatal =
      error instanceof BatchProcessingError ? error : new BatchProcessingError(messageOf(error), error);
    const root = fatal.cause ?? fatal;

    this.ctx.transitionTo('FAILED');
    this.ctx.eventBus.emit({
      type: 'job:failed',
      jobId: this.ctx.jobId,
      error: fatal.message,
      errorKind: isGeocodingError(root) ? root.kind : ErrorKind.UNKNOWN,
      timestamp: Date.now(),
    });
    return fatal;
  }

  private warn(message: string): void {
    this.ctx.eventBus.emit({ type: 'job:warning', jobId: this.ctx.jobId, message, timestamp: Date.now() });
  }
}
