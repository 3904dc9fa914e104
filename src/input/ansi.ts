// Width helpers for drawing command output on a terminal.
// Output is shown as plain text: escape sequences are dropped, not interpreted.

// CSI sequences (colors, cursor movement) and OSC sequences (titles, links)
// eslint-disable-next-line no-control-regex
const ANSI_REGEX = /\x1B\[[0-?]*[ -/]*[@-~]|\x1B\][^\x07\x1B]*(?:\x07|\x1B\\)|\x1B[@-Z\\-_]/g

export function stripAnsi(text: string): string {
  return text.replace(ANSI_REGEX, '')
}

type Range = readonly [from: number, to: number]

// Marks drawn on top of the previous character
const ZERO_WIDTH: Range[] = [
  [0x0300, 0x036F],
  [0x1AB0, 0x1AFF],
  [0x1DC0, 0x1DFF],
  [0x200B, 0x200F],
  [0x20D0, 0x20FF],
  [0xFE00, 0xFE0F],
  [0xFE20, 0xFE2F],
]

// East Asian wide and fullwidth blocks, plus emoji
const DOUBLE_WIDTH: Range[] = [
  [0x1100, 0x115F],
  [0x2E80, 0x303E],
  [0x3041, 0x33FF],
  [0x3400, 0x4DBF],
  [0x4E00, 0x9FFF],
  [0xA000, 0xA4CF],
  [0xAC00, 0xD7A3],
  [0xF900, 0xFAFF],
  [0xFE30, 0xFE4F],
  [0xFF00, 0xFF60],
  [0xFFE0, 0xFFE6],
  [0x1F300, 0x1F64F],
  [0x1F900, 0x1F9FF],
  [0x20000, 0x3FFFD],
]

function inRanges(code: number, ranges: Range[]): boolean {
  return ranges.some(([from, to]) => code >= from && code <= to)
}

function isControl(code: number): boolean {
  return code < 0x20 || (code >= 0x7F && code < 0xA0)
}

function columnsOf(ch: string): number {
  const code = ch.codePointAt(0) ?? 0
  if (isControl(code) || inRanges(code, ZERO_WIDTH))
    return 0
  return inRanges(code, DOUBLE_WIDTH) ? 2 : 1
}

/** Terminal columns taken by `text` once escapes are removed. */
export function displayWidth(text: string): number {
  return Array.from(stripAnsi(text)).reduce((sum, ch) => sum + columnsOf(ch), 0)
}

/**
 * Longest prefix of `text` (escapes removed) that fits in `columns`.
 * A wide character that would straddle the edge is dropped whole.
 */
export function truncateToWidth(text: string, columns: number): string {
  let used = 0
  let out = ''
  for (const ch of stripAnsi(text)) {
    used += columnsOf(ch)
    if (used > columns)
      break
    out += ch
  }
  return out
}

/**
 * Make one line of command output safe to draw: escapes removed, tabs
 * expanded to 8-column stops, other control characters dropped.
 */
export function sanitizeLine(line: string): string {
  let out = ''
  let column = 0
  for (const ch of stripAnsi(line)) {
    if (ch === '\t') {
      const pad = 8 - (column % 8)
      out += ' '.repeat(pad)
      column += pad
      continue
    }
    const code = ch.codePointAt(0) ?? 0
    if (isControl(code))
      continue
    out += ch
    column += columnsOf(ch)
  }
  return out
}
