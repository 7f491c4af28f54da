import { createReadStream } from 'node:fs';
import type { DataSource } from '../../domain/ports/DataSource.js';
import { LineCounter } from './LineCounter.js';

export interface FilePathSourceOptions {
  /** Encoding for reading the file. Default: 'utf-8'. */
  readonly encoding?: BufferEncoding;
  /** Chunk size in bytes for streaming reads. Default: 65536 (64KB). */
  readonly highWaterMark?: number;
}

/** Data source that streams from a local file path using `createReadStream`. Node.js only. */
export class FilePathSource implements DataSource {
  private readonly filePath: string;
  private readonly encoding: BufferEncoding;
  private readonly highWaterMark: number;

  constructor(filePath: string, options?: FilePathSourceOptions) {
    this.filePath = filePath;
    this.encoding = options?.encoding ?? 'utf-8';
    this.highWaterMark = options?.highWaterMark ?? 65536;
  }

  async *read(): AsyncIterable<string> {
    const stream = createReadStream(this.filePath, {
      encoding: this.encoding,
      highWaterMark: this.highWaterMark,
    });

    for await (const chunk of stream) {
      const text: unknown = chunk;
      if (typeof text === 'string') yield text;
    }
  }

  /** Streams the file once to count its lines; the file is read again by `read()`. */
  async countLines(): Promise<number> {
    const counter = new LineCounter();
    for await (const chunk of this.read()) {
      counter.push(chunk);
    }
    return counter.count;
  }
}
