import type { BatchOptions, ResolvedBatchOptions } from '../domain/model/BatchOptions.js';
import type { BatchProgress, BatchSummary } from '../domain/model/Progress.js';
import type { DataSink } from '../domain/ports/DataSink.js';
import type { DataSource } from '../domain/ports/DataSource.js';
import type { Geocoder, RequestParams } from '../domain/ports/Geocoder.js';
import type { TabularFormat } from '../domain/ports/TabularFormat.js';
import type { PipelineStatus } from '../domain/model/PipelineStatus.js';
import { canTransition } from '../domain/model/PipelineStatus.js';
import { BatchProcessingError } from '../domain/errors/GeocodingError.js';
import { needsAllResults } from '../domain/services/FieldProjector.js';
import { EventBus } from './EventBus.js';

/**
 * Mutable state shared by the coordinator and the reader, worker and writer
 * tasks of one run.
 *
 * Each counter has a single writer: the reader owns `rowsRead`, `rowsQueued`
 * and `totalRows`, the writer owns `rowsWritten`, workers own `rowsGeocoded`
 * and `rowsFailed`. `rowsSkipped` is bumped by the reader (parser skips) and by
 * workers (`skip` policy); increments never interleave on the event loop.
 */
export class PipelineContext {
  readonly eventBus: EventBus;
  readonly geocoder: Geocoder;
  readonly options: BatchOptions;
  readonly jobId: string;

  source: DataSource | null = null;
  format: TabularFormat | null = null;
  sink: DataSink | null = null;

  status: PipelineStatus = 'CREATED';
  /** Set when the run leaves `CREATED`. */
  resolved: ResolvedBatchOptions | null = null;
  /** Effective worker count after the constrained-tier clamp. */
  workers = 0;
  totalRows: number | null = null;
  startedAt?: number;

  rowsRead = 0;
  rowsQueued = 0;
  rowsSkipped = 0;
  rowsGeocoded = 0;
  rowsFailed = 0;
  rowsWritten = 0;

  /** Row ids that will never reach the writer; lets ordered output step over them. Empty in completion order. */
  readonly droppedRowIds = new Set<number>();
  /** Aborted on the first fatal condition; stops pending retries. */
  readonly abortController = new AbortController();

  constructor(geocoder: Geocoder, options: BatchOptions) {
    this.geocoder = geocoder;
    this.options = options;
    this.eventBus = new EventBus();
    this.jobId = crypto.randomUUID();
  }

  transitionTo(newStatus: PipelineStatus): void {
    if (!canTransition(this.status, newStatus)) {
      throw new Error(`Invalid state transition: ${this.status} → ${newStatus}`);
    }
    this.status = newStatus;
  }

  assertConfigured(): { source: DataSource; format: TabularFormat; sink: DataSink } {
    const { source, format, sink } = this;
    if (!source || !format) {
      throw new BatchProcessingError('Source and format must be configured. Call .from(source, format) first.');
    }
    if (!sink) {
      throw new BatchProcessingError('Sink must be configured. Call .to(sink) first.');
    }
    return { source, format, sink };
  }

  requireOptions(): ResolvedBatchOptions {
    if (!this.resolved) {
      throw new Error('Batch options have not been resolved yet');
    }
    return this.resolved;
  }

  /** Params sent with every row request: caller extras, annotations off, one result unless more are projected. */
  requestParams(): RequestParams {
    const options = this.requireOptions();
    const params: RequestParams = { ...options.extraParams, no_annotations: true };
    return needsAllResults(options.outputFields) ? params : { ...params, limit: 1 };
  }

  /** Records a row that will never reach the writer. Only ordered output needs to know. */
  markDropped(rowId: number): void {
    if (this.requireOptions().ordered) {
      this.droppedRowIds.add(rowId);
    }
  }

  elapsedMs(): number {
    return this.startedAt === undefined ? 0 : Date.now() - this.startedAt;
  }

  buildProgress(): BatchProgress {
    const total = this.totalRows;
    const percentage = total === null ? null : total > 0 ? Math.min(100, Math.round((this.rowsWritten / total) * 100)) : 100;

    return {
      rowsQueued: this.rowsQueued,
      rowsWritten: this.rowsWritten,
      totalRows: total,
      percentage,
      elapsedMs: this.elapsedMs(),
    };
  }

  buildSummary(): BatchSummary {
    return {
      rowsRead: this.rowsRead,
      rowsQueued: this.rowsQueued,
      rowsSkipped: this.rowsSkipped,
      rowsGeocoded: this.rowsGeocoded,
      rowsFailed: this.rowsFailed,
      rowsWritten: this.rowsWritten,
      workers: this.workers,
      elapsedMs: this.elapsedMs(),
    };
  }

  emitProgress(): void {
    if (!this.resolved?.progress) return;
    this.eventBus.emit({
      type: 'job:progress',
      jobId: this.jobId,
      progress: this.buildProgress(),
      timestamp: Date.now(),
    });
  }
}
