import { describe, expect, test } from 'vitest';
import { parseRenderError, stripAnsi } from './error-parser.js';

const SOURCE = '/tmp/reelsmith-x/jobs/ab12cd34/orbit.py';

describe('parseRenderError', () => {
  test('prefers the frame in the rendered source over library frames', () => {
    const stderr = [
      'Traceback (most recent call last):',
      '  File "/usr/lib/python3/site-packages/manim/cli/render.py", line 97, in render',
      '    scene.render()',
      `  File "${SOURCE}", line 7, in construct`,
      '    self.play(Wiggle(dot))',
      '  File "/usr/lib/python3/site-packages/manim/animation/indication.py", line 312, in __init__',
      '    raise TypeError("bad")',
      "TypeError: Wiggle.__init__() missing 1 required positional argument: 'mobject'",
    ].join('\n');

    const parsed = parseRenderError(stderr, SOURCE);

    expect(parsed.errorType).toBe('TypeError');
    expect(parsed.message).toBe("Wiggle.__init__() missing 1 required positional argument: 'mobject'");
    expect(parsed.lineNumber).toBe(7);
    expect(parsed.summary).toBe(
      "TypeError on line 7: Wiggle.__init__() missing 1 required positional argument: 'mobject'",
    );
  });

  test('falls back to the last frame outside installed packages', () => {
    const stderr = [
      'Traceback (most recent call last):',
      '  File "/home/user/helper.py", line 3, in <module>',
      '  File "/usr/lib/python3/site-packages/numpy/core.py", line 40, in f',
      'ValueError: shapes do not match',
    ].join('\n');

    expect(parseRenderError(stderr, SOURCE).lineNumber).toBe(3);
  });

  test('uses the last traceback when there are several', () => {
    const stderr = [
      'Traceback (most recent call last):',
      `  File "${SOURCE}", line 2, in <module>`,
      'KeyError: first',
      '',
      'During handling of the above exception, another exception occurred:',
      '',
      'Traceback (most recent call last):',
      `  File "${SOURCE}", line 9, in construct`,
      'AttributeError: second',
    ].join('\n');

    const parsed = parseRenderError(stderr, SOURCE);
    expect(parsed.summary).toBe('AttributeError on line 9: second');
  });

  test('strips colour codes before parsing', () => {
    const stderr = `\x1b[31mTraceback (most recent call last):\x1b[0m\n  File "${SOURCE}", line 5, in construct\n\x1b[1mNameError\x1b[0m: name 'x' is not defined\n`;

    const parsed = parseRenderError(stderr, SOURCE);
    expect(parsed.cleanedStderr.includes('\x1b')).toBe(false);
    expect(parsed.summary).toBe("NameError on line 5: name 'x' is not defined");
  });

  test('omits the line when no frame is present', () => {
    const parsed = parseRenderError('Traceback (most recent call last):\nSyntaxError: invalid syntax\n');
    expect(parsed.lineNumber).toBeNull();
    expect(parsed.summary).toBe('SyntaxError: invalid syntax');
  });

  test('summarises non-traceback output by its first line', () => {
    const parsed = parseRenderError('\n  ffmpeg: command not found  \nsecond line\n');
    expect(parsed.errorType).toBeNull();
    expect(parsed.summary).toBe('ffmpeg: command not found');
  });

  test('caps the fallback summary length', () => {
    expect(parseRenderError('x'.repeat(300)).summary).toHaveLength(120);
  });

  test('reports an unknown error for empty stderr', () => {
    expect(parseRenderError('').summary).toBe('Unknown render error');
  });
});

test('stripAnsi removes escape sequences', () => {
  expect(stripAnsi('\x1b[1;32mok\x1b[0m')).toBe('ok');
});
