/**
 * Line splitting over a byte stream
 */

import { StringDecoder } from 'node:string_decoder';

/**
 * Yields the lines of `input` without their terminators.
 *
 * Lines end at `\n` only; one `\r` before it is dropped, any other `\r`
 * stays in the line. A last line without a newline is yielded at the end.
 */
export async function* splitLines(input: AsyncIterable<string | Buffer>): AsyncGenerator<string> {
  const decoder = new StringDecoder('utf8');
  let pending = '';

  for await (const chunk of input) {
    pending += typeof chunk === 'string' ? chunk : decoder.write(chunk);
    let newline = pending.indexOf('\n');
    while (newline !== -1) {
      yield dropCarriageReturn(pending.slice(0, newline));
      pending = pending.slice(newline + 1);
      newline = pending.indexOf('\n');
    }
  }

  pending += decoder.end();
  if (pending !== '') {
    yield dropCarriageReturn(pending);
  }
}

const dropCarriageReturn = (line: string): string =>
  line.endsWith('\r') ? line.slice(0, -1) : line;
