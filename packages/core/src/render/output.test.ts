import { describe, expect, test } from 'vitest';
import { parseProgress, stderrTail, truncateOutput } from './output.js';

const numbered = (count: number) => Array.from({ length: count }, (_, i) => `line ${i + 1}`);

describe('truncateOutput', () => {
  test('leaves short output alone', () => {
    const input = numbered(50).join('\n');
    expect(truncateOutput(input)).toBe(input);
  });

  test('keeps the first 100 and last 50 lines', () => {
    const result = truncateOutput(numbered(200).join('\n')).split('\n');

    expect(result).toHaveLength(151);
    expect(result[0]).toBe('line 1');
    expect(result[99]).toBe('line 100');
    expect(result[100]).toBe('[50 renderer lines omitted]');
    expect(result[101]).toBe('line 151');
    expect(result[150]).toBe('line 200');
  });

  test('does not truncate exactly 150 lines', () => {
    const input = numbered(150).join('\n');
    expect(truncateOutput(input)).toBe(input);
  });

  test('returns empty output unchanged', () => {
    expect(truncateOutput('')).toBe('');
  });

  test('keeps only the last redraw of a progress bar', () => {
    const output = 'Rendering  10%|#\rRendering  50%|##\rRendering 100%|###\r\nFile ready\n';
    expect(truncateOutput(output)).toBe('Rendering 100%|###\nFile ready\n');
  });

  test('honours custom head and tail sizes', () => {
    expect(truncateOutput(numbered(10).join('\n'), { head: 2, tail: 1 })).toBe(
      'line 1\nline 2\n[7 renderer lines omitted]\nline 10',
    );
  });
});

describe('stderrTail', () => {
  test('returns the last non-empty lines', () => {
    expect(stderrTail('a\n\nb\nc\n\n', 2)).toBe('b\nc');
  });

  test('defaults to twenty lines', () => {
    const tail = stderrTail(numbered(30).join('\n')).split('\n');
    expect(tail).toHaveLength(20);
    expect(tail[0]).toBe('line 11');
  });
});

describe('parseProgress', () => {
  test('reads the last percentage in a chunk', () => {
    const chunk = 'Animation 0: Create(Circle):  10%|#   | 1/10\rAnimation 0: Create(Circle):  45%|####  | 4/10';
    expect(parseProgress(chunk)).toBe(45);
  });

  test('returns null when nothing looks like a progress bar', () => {
    expect(parseProgress('Rendering scene Orbit\n50% done')).toBeNull();
  });

  test('ignores values above 100', () => {
    expect(parseProgress('100%|##| 2/2 then 250%|')).toBe(100);
  });
});
