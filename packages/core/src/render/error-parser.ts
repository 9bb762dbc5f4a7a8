export interface ParsedRenderError {
  /** Exception class, e.g. "NameError". */
  errorType: string | null;
  message: string | null;
  /** 1-based line in the rendered source file, when a frame points at it. */
  lineNumber: number | null;
  /** Full stderr with ANSI escapes removed. */
  cleanedStderr: string;
  /** One line suitable for a status bar or CLI output. */
  summary: string;
}

const ANSI_RE = /\x1b\[[0-9;]*[a-zA-Z]/g;
const EXCEPTION_RE = /^(\w[\w.]*): (.+)$/;
const FILE_LINE_RE = /File "([^"]+)", line (\d+)/;
const TRACEBACK_MARKER = 'Traceback (most recent call last):';
const SUMMARY_MAX_CHARS = 120;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_RE, '');
}

interface Frame {
  file: string;
  line: number;
}

function pickLine(frames: Frame[], sourcePath?: string): number | null {
  if (frames.length === 0) return null;
  const outsidePackages = frames.filter((f) => !f.file.includes('site-packages'));

  if (sourcePath) {
    const own = outsidePackages.filter((f) => f.file.includes(sourcePath));
    if (own.length > 0) return own[own.length - 1].line;
  }
  if (outsidePackages.length > 0) return outsidePackages[outsidePackages.length - 1].line;
  return frames[frames.length - 1].line;
}

/**
 * Turn renderer stderr into a structured error. Uses the last traceback
 * block; frames from the job's own source file win over library frames.
 */
export function parseRenderError(stderr: string, sourcePath?: string): ParsedRenderError {
  const cleanedStderr = stripAnsi(stderr);

  let errorType: string | null = null;
  let message: string | null = null;
  let lineNumber: number | null = null;

  const tracebackAt = cleanedStderr.lastIndexOf(TRACEBACK_MARKER);
  if (tracebackAt !== -1) {
    const lines = cleanedStderr.slice(tracebackAt).split(/\r?\n/);

    const last = [...lines].reverse().find((l) => l.trim().length > 0)?.trim();
    const exception = last?.match(EXCEPTION_RE);
    if (exception) {
      errorType = exception[1];
      message = exception[2];
    }

    const frames: Frame[] = [];
    for (const line of lines) {
      const m = line.match(FILE_LINE_RE);
      if (m) frames.push({ file: m[1], line: Number(m[2]) });
    }
    lineNumber = pickLine(frames, sourcePath);
  }

  let summary: string;
  if (errorType && message) {
    summary = lineNumber !== null
      ? `${errorType} on line ${lineNumber}: ${message}`
      : `${errorType}: ${message}`;
  } else {
    const first = cleanedStderr.split(/\r?\n/).map((l) => l.trim()).find(Boolean);
    summary = first ? first.slice(0, SUMMARY_MAX_CHARS) : 'Unknown render error';
  }

  return { errorType, message, lineNumber, cleanedStderr, summary };
}
