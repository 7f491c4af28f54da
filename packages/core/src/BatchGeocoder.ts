import type { BatchOptions } from './domain/model/BatchOptions.js';
import type { BatchSummary } from './domain/model/Progress.js';
import type { DataSink } from './domain/ports/DataSink.js';
import type { DataSource } from './domain/ports/DataSource.js';
import type { Geocoder } from './domain/ports/Geocoder.js';
import type { TabularFormat } from './domain/ports/TabularFormat.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import { PipelineContext } from './application/PipelineContext.js';
import { RunBatch } from './application/usecases/RunBatch.js';
import { GetBatchStatus } from './application/usecases/GetBatchStatus.js';
import type { BatchStatusResult } from './application/usecases/GetBatchStatus.js';

/**
 * Facade over one batch geocoding run: read rows → geocode concurrently → write rows.
 *
 * Delegates to the use cases in `application/usecases/`, which share a single
 * `PipelineContext`. An instance runs once.
 *
 * @example
 * ```typescript
 * const batch = new BatchGeocoder(geocoder, { workers: 4, ordered: true });
 * batch.from(new FilePathSource('in.csv'), new CsvFormat()).to(new FilePathSink('out.csv'));
 * batch.on('row:failed', (e) => console.warn(`row ${String(e.rowId)}: ${e.error}`));
 * const summary = await batch.run();
 * ```
 */
export class BatchGeocoder {
  private readonly ctx: PipelineContext;

  constructor(geocoder: Geocoder, options: BatchOptions = {}) {
    this.ctx = new PipelineContext(geocoder, options);
  }

  /** Set the input and the tabular format used to read and write rows. Returns `this` for chaining. */
  from(source: DataSource, format: TabularFormat): this {
    this.ctx.source = source;
    this.ctx.format = format;
    return this;
  }

  /** Set the output. The sink is closed when the run ends, on success or failure. Returns `this` for chaining. */
  to(sink: DataSink): this {
    this.ctx.sink = sink;
    return this;
  }

  /** Subscribe to a lifecycle event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe a handler previously registered with `on()`. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }

  /**
   * Run the pipeline to completion.
   *
   * Per-row problems never reject: they surface as `row:*` events and in the
   * `status_message` column. Configuration errors, a failed preflight check,
   * I/O failures and row errors under `onError: 'fail'` reject with a single
   * `BatchProcessingError`.
   */
  async run(): Promise<BatchSummary> {
    return new RunBatch(this.ctx).execute();
  }

  /** Current state and progress. */
  getStatus(): BatchStatusResult {
    return new GetBatchStatus(this.ctx).execute();
  }

  getJobId(): string {
    return this.ctx.jobId;
  }
}
