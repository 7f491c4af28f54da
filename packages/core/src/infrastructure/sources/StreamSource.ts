import { StringDecoder } from 'node:string_decoder';
import type { DataSource } from '../../domain/ports/DataSource.js';

export interface StreamSourceOptions {
  /** Encoding for converting Buffer chunks to string. Default: 'utf-8'. */
  readonly encoding?: BufferEncoding;
}

/**
 * Data source that wraps an `AsyncIterable` or `ReadableStream`, e.g. stdin or an upload.
 *
 * Single use and not countable: progress totals stay unknown until the input ends.
 */
export class StreamSource implements DataSource {
  private readonly stream: AsyncIterable<string | Buffer> | ReadableStream<string | Buffer>;
  private readonly encoding: BufferEncoding;
  private consumed = false;

  constructor(stream: AsyncIterable<string | Buffer> | ReadableStream<string | Buffer>, options?: StreamSourceOptions) {
    this.stream = stream;
    this.encoding = options?.encoding ?? 'utf-8';
  }

  async *read(): AsyncIterable<string> {
    if (this.consumed) {
      throw new Error('StreamSource: stream has already been consumed. Streams can only be read once.');
    }
    this.consumed = true;

    const iterable = 'getReader' in this.stream ? this.fromReadableStream(this.stream) : this.stream;

    // Multi-byte characters may straddle Buffer chunks.
    const decoder = new StringDecoder(this.encoding);
    for await (const chunk of iterable) {
      const text = typeof chunk === 'string' ? decoder.end() + chunk : decoder.write(Buffer.from(chunk));
      if (text.length > 0) yield text;
    }
    const rest = decoder.end();
    if (rest.length > 0) yield rest;
  }

  private async *fromReadableStream(stream: ReadableStream<string | Buffer>): AsyncIterable<string | Buffer> {
    const reader = stream.getReader();
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        yield value;
      }
    } finally {
      reader.releaseLock();
    }
  }
}
