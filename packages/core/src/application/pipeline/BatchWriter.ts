import type { BatchResult } from '../../domain/model/BatchJob.js';
import type { DataSink } from '../../domain/ports/DataSink.js';
import type { TabularFormat } from '../../domain/ports/TabularFormat.js';
import { buildHeader, projectRow } from '../../domain/services/FieldProjector.js';
import type { BoundedChannel } from '../concurrency/BoundedChannel.js';
import type { PipelineContext } from '../PipelineContext.js';

/**
 * Consumer task: projects each result into an output row and writes it.
 *
 * Unordered mode writes in completion order. Ordered mode holds results in a
 * pending map and flushes the contiguous run starting at the next expected
 * row id, stepping over ids the reader or workers dropped; whatever is still
 * pending when the stream closes is flushed sorted by row id, unless the
 * stream was cancelled.
 */
export class BatchWriter {
  private readonly pending = new Map<number, BatchResult>();
  private nextRowId = 1;
  private headerWritten = false;

  constructor(
    private readonly ctx: PipelineContext,
    private readonly results: BoundedChannel<BatchResult>,
  ) {}

  async run(format: TabularFormat, sink: DataSink): Promise<void> {
    const { ordered } = this.ctx.requireOptions();

    for await (const result of this.results) {
      if (ordered) {
        this.pending.set(result.rowId, result);
        await this.flushContiguous(format, sink);
      } else {
        await this.write(result, format, sink);
      }
    }

    // Cancelled by a fatal error: buffered rows stay unflushed.
    if (this.results.isCancelled) return;

    const leftovers = [...this.pending.values()].sort((a, b) => a.rowId - b.rowId);
    this.pending.clear();
    for (const result of leftovers) {
      await this.write(result, format, sink);
    }
  }

  /** Results received but not yet written. */
  get pendingCount(): number {
    return this.pending.size;
  }

  private async flushContiguous(format: TabularFormat, sink: DataSink): Promise<void> {
    for (;;) {
      if (this.ctx.droppedRowIds.delete(this.nextRowId)) {
        this.nextRowId++;
        continue;
      }
      const next = this.pending.get(this.nextRowId);
      if (!next) return;
      this.pending.delete(this.nextRowId);
      this.nextRowId++;
      await this.write(next, format, sink);
    }
  }

  private async write(result: BatchResult, format: TabularFormat, sink: DataSink): Promise<void> {
    const { outputFields } = this.ctx.requireOptions();

    if (!this.headerWritten) {
      await sink.write(format.formatRow(buildHeader(result.originalRow.length, outputFields)));
      this.headerWritten = true;
    }

    await sink.write(format.formatRow(projectRow(result, outputFields)));
    this.ctx.rowsWritten++;
    this.ctx.emitProgress();
  }
}
