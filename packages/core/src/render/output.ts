export interface TruncateOptions {
  /** Lines kept from the start. */
  head?: number;
  /** Lines kept from the end. */
  tail?: number;
}

/** Keep only the final redraw of each line, so a progress bar leaves one line behind. */
export function collapseRedraws(output: string): string {
  return output
    .split('\n')
    .map((line) => {
      const text = line.endsWith('\r') ? line.slice(0, -1) : line;
      return text.slice(text.lastIndexOf('\r') + 1);
    })
    .join('\n');
}

/**
 * Shorten renderer output for logs: progress redraws are collapsed, then
 * everything between the first `head` and last `tail` lines is replaced by a marker.
 */
export function truncateOutput(output: string, { head = 100, tail = 50 }: TruncateOptions = {}): string {
  if (!output) return output;
  const lines = collapseRedraws(output).split('\n');
  if (lines.length <= head + tail) return lines.join('\n');

  const dropped = lines.length - head - tail;
  return [
    ...lines.slice(0, head),
    `[${dropped} renderer lines omitted]`,
    ...lines.slice(lines.length - tail),
  ].join('\n');
}

/** Last `count` non-empty lines of stderr, joined with newlines. */
export function stderrTail(stderr: string, count = 20): string {
  const lines = stderr.split(/\r?\n/).filter((l) => l.trim().length > 0);
  return lines.slice(-count).join('\n');
}

// Progress bars look like "Animation 0: Create(Circle):  45%|████▌     | 27/60"
const PROGRESS_RE = /(\d{1,3})%\|/g;

/** Last percentage found in a chunk of renderer output, or null. */
export function parseProgress(chunk: string): number | null {
  let percent: number | null = null;
  for (const match of chunk.matchAll(PROGRESS_RE)) {
    const value = Number(match[1]);
    if (value <= 100) percent = value;
  }
  return percent;
}
