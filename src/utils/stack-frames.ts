/**
 * V8 stack trace parsing for reports built from thrown errors.
 */

export interface StackLocation {
  file: string;
  line: number;
  column?: number;
}

// "    at fn (/path/file.js:10:5)" or "    at /path/file.js:10:5"
const FRAME_PATTERN = /^\s*at\s+(?:.*?\s+\()?(.+?):(\d+)(?::(\d+))?\)?\s*$/;

/**
 * Location of the first frame that names a source file.
 *
 * Frames inside Node's own modules are skipped.
 */
export function parseTopFrame(stack: string | undefined): StackLocation | undefined {
  if (!stack) {
    return undefined;
  }

  for (const line of stack.split('\n')) {
    const match = FRAME_PATTERN.exec(line);
    if (!match) {
      continue;
    }

    const [, rawFile, rawLine, rawColumn] = match;
    if (!rawFile || !rawLine || rawFile.startsWith('node:')) {
      continue;
    }

    return {
      file: rawFile.replace(/^file:\/\//, ''),
      line: Number.parseInt(rawLine, 10),
      column: rawColumn ? Number.parseInt(rawColumn, 10) : undefined,
    };
  }

  return undefined;
}
