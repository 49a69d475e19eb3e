export const COMMENT_MARKERS = ['#', '//'] as const;

// Counts lines that are neither blank nor single-line comments.
export function countSignificantLines(text: string): number {
  let count = 0;
  for (const line of text.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed) {
      continue;
    }
    if (COMMENT_MARKERS.some(marker => trimmed.startsWith(marker))) {
      continue;
    }
    count++;
  }
  return count;
}
