import { open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import type { DataSink } from '../../domain/ports/DataSink.js';

export interface FilePathSinkOptions {
  /** Default: 'utf-8'. */
  readonly encoding?: BufferEncoding;
  /** Append to an existing file instead of truncating it. Default: `false`. */
  readonly append?: boolean;
}

/** Data sink that writes to a local file. The file is opened on the first write. Node.js only. */
export class FilePathSink implements DataSink {
  private readonly filePath: string;
  private readonly encoding: BufferEncoding;
  private readonly flags: string;
  private handle: Promise<FileHandle> | null = null;

  constructor(filePath: string, options?: FilePathSinkOptions) {
    this.filePath = filePath;
    this.encoding = options?.encoding ?? 'utf-8';
    this.flags = options?.append ? 'a' : 'w';
  }

  async write(text: string): Promise<void> {
    this.handle ??= open(this.filePath, this.flags);
    const handle = await this.handle;
    await handle.write(text, null, this.encoding);
  }

  /** Creates the file if nothing was written. */
  async close(): Promise<void> {
    this.handle ??= open(this.filePath, this.flags);
    const handle = await this.handle;
    await handle.close();
  }
}
