import Papa from 'papaparse';
import type { DataSource, ReadRowsOptions, TabularFormat } from '@geobatch/core';

export interface CsvFormatOptions {
  /** Field delimiter for reading and writing. Default: `','`. */
  readonly delimiter?: string;
  /** Line terminator for written rows. Default: `'\n'`. */
  readonly newline?: string;
}

const BYTE_ORDER_MARK = '\uFEFF';

/**
 * Finds row boundaries in text that grows by appending chunks. Each call only
 * scans what was appended since the previous one; the quote state carries over.
 */
export class RowBoundaryScanner {
  private scanned = 0;
  private inQuotes = false;

  /**
   * Index just past the last line break in `text` that sits outside a quoted
   * field, or `-1` when no row ends in the newly appended part.
   */
  scan(text: string): number {
    let end = -1;
    for (let i = this.scanned; i < text.length; i++) {
      const char = text[i];
      if (char === '"') this.inQuotes = !this.inQuotes;
      else if (char === '\n' && !this.inQuotes) end = i + 1;
    }
    this.scanned = text.length;
    return end;
  }

  /** The caller dropped the first `count` characters of the text. */
  consume(count: number): void {
    this.scanned -= count;
  }
}

/** One-shot {@link RowBoundaryScanner.scan} over a whole text. */
export function completeRowsEnd(text: string): number {
  return new RowBoundaryScanner().scan(text);
}

/**
 * CSV adapter using PapaParse.
 *
 * Reading is incremental: complete rows are parsed as soon as a chunk ends
 * them, and a row split across chunks (including a quoted field with line
 * breaks) is carried over to the next chunk. Blank lines are skipped.
 * Writing quotes fields that contain the delimiter, quotes or line breaks.
 */
export class CsvFormat implements TabularFormat {
  private readonly delimiter: string;
  private readonly newline: string;

  constructor(options?: CsvFormatOptions) {
    this.delimiter = options?.delimiter ?? ',';
    this.newline = options?.newline ?? '\n';
  }

  async *readRows(source: DataSource, options: ReadRowsOptions): AsyncIterable<readonly string[]> {
    const scanner = new RowBoundaryScanner();
    let pending = '';
    let first = true;
    let headerSkipped = !options.hasHeader;

    for await (const chunk of source.read()) {
      let text = typeof chunk === 'string' ? chunk : chunk.toString('utf-8');
      if (first) {
        if (text.startsWith(BYTE_ORDER_MARK)) text = text.slice(BYTE_ORDER_MARK.length);
        first = false;
      }

      pending += text;
      const end = scanner.scan(pending);
      if (end === -1) continue;

      const complete = pending.slice(0, end);
      pending = pending.slice(end);
      scanner.consume(end);

      for (const row of this.parse(complete)) {
        if (!headerSkipped) {
          headerSkipped = true;
          continue;
        }
        yield row;
      }
    }

    for (const row of this.parse(pending)) {
      if (!headerSkipped) {
        headerSkipped = true;
        continue;
      }
      yield row;
    }
  }

  formatRow(row: readonly string[]): string {
    return Papa.unparse([[...row]], { delimiter: this.delimiter, newline: this.newline }) + this.newline;
  }

  private parse(text: string): string[][] {
    if (text.trim() === '') return [];
    const result = Papa.parse<string[]>(text, {
      delimiter: this.delimiter,
      skipEmptyLines: true,
      dynamicTyping: false,
    });
    return result.data;
  }
}
