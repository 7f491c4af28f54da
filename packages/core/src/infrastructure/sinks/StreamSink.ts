import type { Writable } from 'node:stream';
import type { DataSink } from '../../domain/ports/DataSink.js';

export interface StreamSinkOptions {
  /** End the stream on `close()`. Set `false` for `process.stdout`. Default: `true`. */
  readonly end?: boolean;
}

/**
 * Data sink over a Node.js `Writable`. Each write resolves once the stream has flushed it.
 *
 * The first stream error is kept: the pending and every later `write()`/`close()` reject with it.
 */
export class StreamSink implements DataSink {
  private readonly stream: Writable;
  private readonly end: boolean;
  private failure: Error | null = null;

  constructor(stream: Writable, options?: StreamSinkOptions) {
    this.stream = stream;
    this.end = options?.end ?? true;
    this.stream.on('error', (error: Error) => {
      this.failure ??= error;
    });
  }

  write(text: string): Promise<void> {
    if (this.failure) return Promise.reject(this.failure);
    return new Promise((resolve, reject) => {
      this.stream.write(text, (error) => {
        if (error) reject(this.failure ?? error);
        else resolve();
      });
    });
  }

  close(): Promise<void> {
    if (this.failure) return Promise.reject(this.failure);
    if (!this.end) return Promise.resolve();
    return new Promise((resolve, reject) => {
      this.stream.end((error?: Error | null) => {
        const failure = this.failure ?? error;
        if (failure) reject(failure);
        else resolve();
      });
    });
  }
}
