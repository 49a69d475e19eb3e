import { ExtractionError } from './Errors';

const FENCE = '```';
const LANGUAGE_TAG = /^[A-Za-z0-9_+#.-]+[ \t]*\r?\n/;

/**
 * Returns the contents of the first fenced code block in a model reply.
 *
 * A language tag is only recognized when it is the whole remainder of the
 * opening fence's line, so a one-line block such as ```x = 1``` keeps its text.
 * A reply with no fence, or with an opening fence that never closes, is
 * rejected rather than passed through as code.
 */
export function extractCode(response: string): string {
  const open = response.indexOf(FENCE);
  if (open === -1) {
    throw new ExtractionError('Reply contains no fenced code block.', response);
  }

  let start = open + FENCE.length;
  const tag = LANGUAGE_TAG.exec(response.slice(start));
  if (tag) {
    start += tag[0].length;
  }

  const close = response.indexOf(FENCE, start);
  if (close === -1) {
    throw new ExtractionError('Reply opens a code fence but never closes it.', response);
  }

  return response.slice(start, close).trim();
}
