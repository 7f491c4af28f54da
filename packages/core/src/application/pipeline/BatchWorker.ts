import type { BatchResult, Job } from '../../domain/model/BatchJob.js';
import type { GeocodeResponse } from '../../domain/model/GeocodeResponse.js';
import { GeocodeCommand, failureResult, successResult } from '../../domain/model/BatchJob.js';
import { ErrorKind, GeocodingError } from '../../domain/errors/GeocodingError.js';
import { ErrorPolicy } from '../../domain/model/BatchOptions.js';
import { parseReverseQuery } from '../../domain/services/Coordinates.js';
import type { BoundedChannel } from '../concurrency/BoundedChannel.js';
import { ChannelClosedError } from '../concurrency/BoundedChannel.js';
import type { RequestOutcome } from '../services/RetryingRequestExecutor.js';
import { RetryingRequestExecutor } from '../services/RetryingRequestExecutor.js';
import type { PipelineContext } from '../PipelineContext.js';

/**
 * Consumer/producer task: takes one job at a time, geocodes it through the
 * retrying executor and hands a result to the writer according to the error
 * policy. Under `fail` the classified error is thrown to the coordinator.
 */
export class BatchWorker {
  constructor(
    private readonly ctx: PipelineContext,
    private readonly jobs: BoundedChannel<Job>,
    private readonly results: BoundedChannel<BatchResult>,
  ) {}

  async run(): Promise<void> {
    try {
      for await (const job of this.jobs) {
        const result = await this.process(job);
        if (result !== null) await this.results.send(result);
      }
    } catch (error) {
      if (error instanceof ChannelClosedError) return;
      throw error;
    }
  }

  /** Geocode one job. `null` means the row was dropped. */
  async process(job: Job): Promise<BatchResult | null> {
    const outcome = await this.request(job);

    if (outcome.success) {
      const [first] = outcome.value.results;
      if (first === undefined) {
        const error = new GeocodingError(ErrorKind.ZERO_RESULTS, `No results found for '${job.query}'`);
        this.reportFailure(job, error);
        return failureResult(job, error);
      }

      this.ctx.rowsGeocoded++;
      this.ctx.eventBus.emit({
        type: 'row:geocoded',
        jobId: this.ctx.jobId,
        rowId: job.rowId,
        command: job.command,
        attempts: outcome.attempts,
        timestamp: Date.now(),
      });
      return successResult(job, outcome.value, first);
    }

    const { error } = outcome;
    switch (this.ctx.requireOptions().onError) {
      case ErrorPolicy.FAIL:
        this.reportFailure(job, error);
        throw error;
      case ErrorPolicy.SKIP:
        this.ctx.rowsSkipped++;
        this.ctx.markDropped(job.rowId);
        this.ctx.eventBus.emit({
          type: 'row:skipped',
          jobId: this.ctx.jobId,
          rowId: job.rowId,
          reason: `L${String(job.rowId)}: Skipping row due to error: ${error.message}`,
          errorKind: error.kind,
          timestamp: Date.now(),
        });
        return null;
      case ErrorPolicy.LOG:
        this.reportFailure(job, error);
        return failureResult(job, error);
    }
  }

  private request(job: Job): Promise<RequestOutcome<GeocodeResponse>> {
    const options = this.ctx.requireOptions();
    const gate = options.admissionGate;
    const params = this.ctx.requestParams();
    const requestOptions = { timeoutMs: options.timeoutMs };

    const executor = new RetryingRequestExecutor(
      {
        retries: options.retries,
        baseDelayMs: options.retryBaseDelayMs,
        factor: options.retryFactor,
        jitter: options.retryJitter,
        maxDelayMs: options.retryMaxDelayMs,
      },
      {
        signal: this.ctx.abortController.signal,
        onRetry: (attempt) => {
          this.ctx.eventBus.emit({
            type: 'request:retried',
            jobId: this.ctx.jobId,
            rowId: job.rowId,
            attempt: attempt.attempt,
            maxAttempts: attempt.maxAttempts,
            delayMs: attempt.delayMs,
            errorKind: attempt.errorKind,
            error: attempt.error.message,
            timestamp: Date.now(),
          });
        },
      },
    );

    return executor.execute(async () => {
      if (gate) await gate.acquire();
      try {
        if (job.command === GeocodeCommand.REVERSE) {
          const { latitude, longitude } = parseReverseQuery(job.query);
          return await this.ctx.geocoder.reverseGeocode(latitude, longitude, params, requestOptions);
        }
        return await this.ctx.geocoder.geocode(job.query, params, requestOptions);
      } finally {
        gate?.release();
      }
    });
  }

  private reportFailure(job: Job, error: GeocodingError): void {
    this.ctx.rowsFailed++;
    this.ctx.eventBus.emit({
      type: 'row:failed',
      jobId: this.ctx.jobId,
      rowId: job.rowId,
      query: job.query,
      errorKind: error.kind,
      error: error.message,
      timestamp: Date.now(),
    });
  }
}
