/** Incremental physical line count over text chunks. A final line without a terminator still counts. */
export class LineCounter {
  private lines = 0;
  private endsWithNewline = true;
  private empty = true;

  push(chunk: string): void {
    if (chunk.length === 0) return;
    this.empty = false;
    let index = chunk.indexOf('\n');
    while (index !== -1) {
      this.lines++;
      index = chunk.indexOf('\n', index + 1);
    }
    this.endsWithNewline = chunk.endsWith('\n');
  }

  get count(): number {
    if (this.empty) return 0;
    return this.endsWithNewline ? this.lines : this.lines + 1;
  }
}

export function countLines(text: string): number {
  const counter = new LineCounter();
  counter.push(text);
  return counter.count;
}
