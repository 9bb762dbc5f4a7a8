import { structuredPatch } from 'diff';

export type DiffLine =
  | { kind: 'context'; text: string; oldLine: number; newLine: number }
  | { kind: 'removed'; text: string; oldLine: number }
  | { kind: 'added'; text: string; newLine: number }
  /** Unchanged lines skipped between two hunks. */
  | { kind: 'gap' };

export interface VersionDiff {
  lines: DiffLine[];
  added: number;
  removed: number;
}

/** Line diff between two code snapshots with three lines of context. */
export function diffVersions(fromCode: string, toCode: string): VersionDiff {
  const patch = structuredPatch('from', 'to', fromCode, toCode, '', '', { context: 3 });
  const lines: DiffLine[] = [];
  let added = 0;
  let removed = 0;

  patch.hunks.forEach((hunk, index) => {
    if (index > 0) lines.push({ kind: 'gap' });
    let oldLine = hunk.oldStart;
    let newLine = hunk.newStart;

    for (const raw of hunk.lines) {
      const text = raw.slice(1);
      switch (raw[0]) {
        case ' ':
          lines.push({ kind: 'context', text, oldLine: oldLine++, newLine: newLine++ });
          break;
        case '-':
          lines.push({ kind: 'removed', text, oldLine: oldLine++ });
          removed++;
          break;
        case '+':
          lines.push({ kind: 'added', text, newLine: newLine++ });
          added++;
          break;
        // "\ No newline at end of file" markers carry no content.
      }
    }
  });

  return { lines, added, removed };
}

/** Unified-style text: `-`, `+` or space prefixed lines, `⋮` between hunks, then a count. */
export function formatDiff(diff: VersionDiff): string {
  const body = diff.lines.map((line) => {
    switch (line.kind) {
      case 'gap':
        return '⋮';
      case 'added':
        return `+${line.text}`;
      case 'removed':
        return `-${line.text}`;
      case 'context':
        return ` ${line.text}`;
    }
  });
  return [...body, `${diff.added} added, ${diff.removed} removed`].join('\n');
}
