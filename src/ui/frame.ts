import type { RunStatus } from '../types'
import { displayWidth, sanitizeLine, truncateToWidth } from '../input/ansi'

export interface FrameInput {
  /** Output lines, first line first. */
  lines: string[]
  columns: number
  rows: number
  prompt: string
  text: string
  cursor: number
  placeholder?: string
  status: RunStatus
  error?: string
  bytes: number
  lineCount: number
  countMode: 'lines' | 'bytes'
}

export interface Frame {
  /** Exactly `rows` lines, none wider than `columns`. */
  lines: string[]
  /** 1-based column of the cursor on the last row. */
  cursorColumn: number
}

const DIM = '\u001B[2m'
const RED = '\u001B[31m'
const GREEN = '\u001B[32m'
const RESET = '\u001B[0m'

export function formatCount(mode: 'lines' | 'bytes', lines: number, bytes: number): string {
  if (mode === 'bytes')
    return bytes === 1 ? '1 byte' : `${bytes} bytes`
  return lines === 1 ? '1 line' : `${lines} lines`
}

/**
 * Lay out one screen: output on top, a status row, and the prompt row last.
 */
export function composeFrame(input: FrameInput): Frame {
  const columns = Math.max(1, input.columns)
  const outputRows = Math.max(0, input.rows - 2)

  const lines: string[] = []
  for (let i = 0; i < outputRows; i++) {
    const line = input.lines[i]
    lines.push(line === undefined ? '' : truncateToWidth(sanitizeLine(line), columns))
  }

  if (input.rows >= 2)
    lines.push(statusRow(input, columns))

  const prompt = promptRow(input, columns)
  if (input.rows >= 1)
    lines.push(prompt.text)

  return { lines, cursorColumn: prompt.cursorColumn }
}

function statusRow(input: FrameInput, columns: number): string {
  const count = formatCount(input.countMode, input.lineCount, input.bytes)
  if (count.length >= columns)
    return `${DIM}${count.slice(0, columns)}${RESET}`

  let left = ''
  if (input.error)
    left = `error: ${input.error}`
  else if (input.status === 'starting' || input.status === 'streaming')
    left = 'running'

  const room = Math.max(0, columns - count.length - 1)
  const shownLeft = truncateToWidth(sanitizeLine(left), room)
  const gap = Math.max(1, columns - displayWidth(shownLeft) - count.length)
  const color = input.error ? RED : DIM
  const row = shownLeft ? `${color}${shownLeft}${RESET}` : ''
  return `${row}${' '.repeat(gap)}${DIM}${count}${RESET}`
}

function promptRow(input: FrameInput, columns: number): { text: string, cursorColumn: number } {
  const promptWidth = displayWidth(input.prompt)
  const available = Math.max(1, columns - promptWidth)
  const prompt = `${GREEN}${input.prompt}${RESET}`

  if (!input.text && input.placeholder)
    return { text: `${prompt}${DIM}${truncateToWidth(input.placeholder, available)}${RESET}`, cursorColumn: promptWidth + 1 }

  // Scroll horizontally so the cursor stays visible
  const chars = Array.from(input.text)
  const cursorIndex = Array.from(input.text.slice(0, input.cursor)).length
  let start = 0
  while (start < cursorIndex && displayWidth(chars.slice(start, cursorIndex).join('')) >= available)
    start++
  const visible = truncateToWidth(chars.slice(start).join(''), available)
  const cursorColumn = promptWidth + displayWidth(chars.slice(start, cursorIndex).join('')) + 1
  return { text: `${prompt}${visible}`, cursorColumn }
}
