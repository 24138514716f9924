/** Raw terminal output for the viewer (alternate screen, full-frame redraws). */

export const ANSI = {
  altScreenOn: '\x1b[?1049h',
  altScreenOff: '\x1b[?1049l',
  hideCursor: '\x1b[?25l',
  showCursor: '\x1b[?25h',
  cursorHome: '\x1b[H',
  clearToLineEnd: '\x1b[K',
  clearBelow: '\x1b[J',
} as const;

/** The part of a TTY write stream the frame helpers use. */
export interface TerminalOutput {
  write(chunk: string): boolean;
}

export interface TerminalSize {
  width: number;
  height: number;
}

export function terminalSize(out: NodeJS.WriteStream): TerminalSize {
  return { width: out.columns || 80, height: out.rows || 24 };
}

export function enterScreen(out: TerminalOutput): void {
  out.write(ANSI.altScreenOn + ANSI.hideCursor);
}

export function leaveScreen(out: TerminalOutput): void {
  out.write(ANSI.showCursor + ANSI.altScreenOff);
}

/** Draw a whole frame from the top-left corner, clearing whatever was left below it. */
export function writeFrame(out: TerminalOutput, lines: readonly string[]): void {
  let frame = ANSI.cursorHome;
  for (let i = 0; i < lines.length; i++) {
    frame += lines[i] + ANSI.clearToLineEnd + (i < lines.length - 1 ? '\r\n' : '');
  }
  out.write(frame + ANSI.clearBelow);
}
