export type TraceFrame = {
  function: string;
  file?: string;
  line?: number;
  column?: number;
};

const FRAME = /^at (?:(.+?) \()?(.+?):(\d+):(\d+)\)?$/;
const ANONYMOUS = '<anonymous>';

/** Stack frames of `error`, innermost first. Lines that are not frames are skipped. */
export function formatTrace(error: Error): TraceFrame[] {
  const frames: TraceFrame[] = [];

  for (const raw of (error.stack ?? '').split('\n')) {
    const line = raw.trim();
    if (!line.startsWith('at ')) continue;

    const match = FRAME.exec(line);
    if (!match) {
      frames.push({ function: line.slice(3) });
      continue;
    }

    const [, fn, file, lineNo, column] = match;
    frames.push({ function: fn ?? ANONYMOUS, file, line: Number(lineNo), column: Number(column) });
  }

  return frames;
}

/** File and line of the first frame that has one. */
export function errorLocation(error: Error): { file?: string; line?: number } {
  const frame = formatTrace(error).find((f) => f.file !== undefined);
  return frame ? { file: frame.file, line: frame.line } : {};
}
