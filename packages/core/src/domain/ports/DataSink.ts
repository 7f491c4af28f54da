/** Port for writing output text to any destination (file, buffer, stream). */
export interface DataSink {
  /** Append text. Resolves once the destination accepted it. */
  write(text: string): Promise<void>;
  /** Flush and release the destination. Called exactly once per run, on success and on failure. */
  close(): Promise<void>;
}
