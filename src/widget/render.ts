/**
 * Display row -> terminal line.
 *
 * Rows are indented by depth, split into styled segments (key prefix, value
 * token, trailing text) and truncated to the available display columns with
 * a trailing `…`. Styling is applied after truncation so escape sequences
 * never count toward the width.
 */

import pc from 'picocolors';
import stringWidth from 'string-width';
import type { ItemAttribute } from '../app/config.js';
import type { DisplayRow } from '../flatten/display-row.js';

type Colors = ReturnType<typeof pc.createColors>;
type Style = (text: string) => string;

export interface RowRenderOptions {
  /** Spaces per depth level. */
  indent: number;
  color: boolean;
  /** Attribute of the row under the cursor. */
  activeItem: ItemAttribute;
  /** Attribute of every other row. */
  inactiveItem: ItemAttribute;
}

interface Segment {
  text: string;
  style: Style;
}

const ELLIPSIS = '…';

const plain: Style = (text) => text;

/**
 * Cut `text` to at most `width` display columns, replacing the tail with
 * `…` when it does not fit.
 */
export function truncateToWidth(text: string, width: number): string {
  if (width <= 0) return '';
  if (stringWidth(text) <= width) return text;

  let out = '';
  let used = 0;
  for (const ch of text) {
    const w = stringWidth(ch);
    if (used + w > width - 1) break;
    out += ch;
    used += w;
  }
  return out + ELLIPSIS;
}

function truncateSegments(segments: Segment[], width: number): Segment[] {
  const full = segments.map((s) => s.text).join('');
  const cut = truncateToWidth(full, width);
  if (cut === full) return segments;

  // Keep each segment's style for the part of it that survived
  const kept = cut.endsWith(ELLIPSIS) ? cut.slice(0, -ELLIPSIS.length) : cut;
  const out: Segment[] = [];
  let offset = 0;
  for (const segment of segments) {
    if (offset >= kept.length) break;
    out.push({ text: kept.slice(offset, offset + segment.text.length), style: segment.style });
    offset += segment.text.length;
  }
  out.push({ text: cut.slice(kept.length), style: plain });
  return out;
}

function attribute(colors: Colors, item: ItemAttribute): Style {
  switch (item) {
    case 'underline':
      return colors.underline;
    case 'inverse':
      return colors.inverse;
    case 'bold':
      return colors.bold;
    case 'dim':
      return colors.dim;
    case 'none':
      return plain;
  }
}

export class RowRenderer {
  private readonly colors: Colors;
  private readonly active: Style;
  private readonly inactive: Style;

  constructor(private readonly options: RowRenderOptions) {
    this.colors = pc.createColors(options.color);
    this.active = attribute(this.colors, options.activeItem);
    this.inactive = attribute(this.colors, options.inactiveItem);
  }

  /** Render one row into at most `width` columns. */
  render(row: DisplayRow, width: number, isActive: boolean): string {
    const segments = truncateSegments(this.segments(row), width);
    const line = segments.map((s) => (s.text === '' ? '' : s.style(s.text))).join('');
    return (isActive ? this.active : this.inactive)(line);
  }

  /** Single styled status line, e.g. the title or a notice. */
  line(text: string, width: number, kind: 'title' | 'warning'): string {
    const cut = truncateToWidth(text, width);
    return kind === 'title' ? this.colors.bold(cut) : this.colors.yellow(cut);
  }

  private segments(row: DisplayRow): Segment[] {
    const [start, end] = row.span;
    const indent = ' '.repeat(row.depth * this.options.indent);
    return [
      { text: indent, style: plain },
      { text: row.text.slice(0, start), style: this.colors.cyan },
      { text: row.text.slice(start, end), style: this.tokenStyle(row) },
      { text: row.text.slice(end), style: row.kind === 'collapsed-summary' ? this.colors.gray : plain },
    ];
  }

  private tokenStyle(row: DisplayRow): Style {
    if (row.kind === 'collapsed-summary') return this.colors.magenta;
    if (row.kind !== 'scalar-leaf') return this.colors.bold;

    switch (row.text.charAt(row.span[0])) {
      case '"':
        return this.colors.green;
      case 'n':
        return this.colors.gray;
      case 't':
      case 'f':
        return this.colors.blue;
      default:
        return this.colors.yellow;
    }
  }
}
