/**
 * Minimal text sink; process.stdout and process.stderr satisfy it
 */
export interface OutputWriter {
  write(text: string): unknown;
}
