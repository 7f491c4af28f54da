import type { DataSink } from '../../domain/ports/DataSink.js';

/** Data sink that collects output in memory. */
export class BufferSink implements DataSink {
  private readonly chunks: string[] = [];
  private closed = false;

  write(text: string): Promise<void> {
    if (this.closed) {
      return Promise.reject(new Error('BufferSink: cannot write after close()'));
    }
    this.chunks.push(text);
    return Promise.resolve();
  }

  close(): Promise<void> {
    this.closed = true;
    return Promise.resolve();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Everything written so far. */
  toString(): string {
    return this.chunks.join('');
  }
}
