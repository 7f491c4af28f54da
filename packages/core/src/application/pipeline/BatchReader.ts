import type { Job } from '../../domain/model/BatchJob.js';
import type { DataSource } from '../../domain/ports/DataSource.js';
import type { TabularFormat } from '../../domain/ports/TabularFormat.js';
import { createJob } from '../../domain/model/BatchJob.js';
import { parseRow } from '../../domain/services/RowParser.js';
import type { BoundedChannel } from '../concurrency/BoundedChannel.js';
import { ChannelClosedError } from '../concurrency/BoundedChannel.js';
import type { PipelineContext } from '../PipelineContext.js';

/**
 * Estimate the row count of a countable source: its line count, less the
 * header, capped by the row limit. `null` for streamed input.
 */
export async function estimateTotalRows(ctx: PipelineContext, source: DataSource): Promise<number | null> {
  if (!source.countLines) return null;
  const options = ctx.requireOptions();
  const lines = await source.countLines();
  const rows = Math.max(0, options.inputColumns === null ? lines - 1 : lines);
  return options.limit === null ? rows : Math.min(rows, options.limit);
}

/**
 * Producer task: streams input rows, parses each one and queues a job per
 * accepted row. Suspends while the job channel is full. Always closes the
 * channel on exit so workers can drain and stop.
 */
export class BatchReader {
  constructor(
    private readonly ctx: PipelineContext,
    private readonly jobs: BoundedChannel<Job>,
  ) {}

  async run(source: DataSource, format: TabularFormat): Promise<void> {
    const options = this.ctx.requireOptions();
    let rowId = 0;

    try {
      for await (const row of format.readRows(source, { hasHeader: options.inputColumns === null })) {
        if (options.limit !== null && rowId >= options.limit) break;
        rowId++;
        this.ctx.rowsRead = rowId;

        const parsed = parseRow(row, rowId, options);
        if (parsed.query === null) {
          this.ctx.rowsSkipped++;
          this.ctx.markDropped(rowId);
          this.ctx.eventBus.emit({
            type: 'row:skipped',
            jobId: this.ctx.jobId,
            rowId,
            reason: parsed.reason,
            timestamp: Date.now(),
          });
          continue;
        }

        await this.jobs.send(createJob(rowId, parsed.query, row, parsed.command));
        this.ctx.rowsQueued++;
        this.ctx.emitProgress();
      }
    } catch (error) {
      // A cancelled channel means the coordinator is already shutting down.
      if (error instanceof ChannelClosedError) return;
      throw error;
    } finally {
      this.jobs.close();
    }

    if (this.ctx.totalRows === null) {
      this.ctx.totalRows = this.ctx.rowsRead;
    }
  }
}
