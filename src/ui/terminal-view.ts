import type { Buffer } from 'node:buffer'
import type { LineEditor } from '../input/line-editor'
import type { OutputSink, RunStateEvent, RunStatus } from '../types'
import { StringDecoder } from 'node:string_decoder'
import { composeFrame } from './frame'

/** Anything the view can draw on. A tty.WriteStream fits. */
export interface TerminalOutput {
  write: (data: string) => unknown
  columns?: number
  rows?: number
}

export interface TerminalViewOptions {
  prompt?: string
  placeholder?: string
  countMode?: 'lines' | 'bytes'
  redrawIntervalMs?: number
  /** Output lines kept for display. Counts keep growing past it. */
  maxLines?: number
}

const ENTER_ALT_SCREEN = '\u001B[?1049h'
const LEAVE_ALT_SCREEN = '\u001B[?1049l'
const HOME = '\u001B[H'
const CLEAR_LINE = '\u001B[2K'

/**
 * Draws the active run's output, a status row and the command prompt.
 */
export class TerminalView implements OutputSink {
  private decoder = new StringDecoder('utf8')
  private lines: string[] = ['']
  private capped = false
  private bytes = 0
  private lineCount = 0
  private status: RunStatus = 'idle'
  private errorMessage?: string
  private timer?: NodeJS.Timeout
  private started = false
  private readonly prompt: string
  private readonly placeholder?: string
  private readonly countMode: 'lines' | 'bytes'
  private readonly redrawIntervalMs: number
  private readonly maxLines: number

  constructor(
    private readonly out: TerminalOutput,
    private readonly editor: LineEditor,
    options: TerminalViewOptions = {},
  ) {
    this.prompt = options.prompt ?? '-->| '
    this.placeholder = options.placeholder
    this.countMode = options.countMode ?? 'lines'
    this.redrawIntervalMs = options.redrawIntervalMs ?? 16
    this.maxLines = options.maxLines ?? 1000
  }

  start(): void {
    if (this.started)
      return
    this.started = true
    this.out.write(ENTER_ALT_SCREEN)
    this.render()
  }

  stop(): void {
    if (!this.started)
      return
    this.started = false
    if (this.timer) {
      clearTimeout(this.timer)
      this.timer = undefined
    }
    this.out.write(LEAVE_ALT_SCREEN)
  }

  reset(): void {
    this.decoder = new StringDecoder('utf8')
    this.lines = ['']
    this.capped = false
    this.bytes = 0
    this.lineCount = 0
    this.errorMessage = undefined
    this.scheduleRender()
  }

  write(chunk: Buffer, totalBytes: number, totalLines: number): void {
    this.bytes = totalBytes
    this.lineCount = totalLines
    this.appendText(this.decoder.write(chunk))
    this.scheduleRender()
  }

  error(message: string): void {
    this.errorMessage = message
    this.scheduleRender()
  }

  state(event: RunStateEvent): void {
    this.status = event.status
    if (event.status !== 'starting' && event.status !== 'streaming')
      this.appendText(this.decoder.end())
    this.scheduleRender()
  }

  /** Output lines currently held for display. */
  visibleLines(): string[] {
    const last = this.lines[this.lines.length - 1]
    return last === '' ? this.lines.slice(0, -1) : this.lines.slice()
  }

  /**
   * Draw now, dropping any pending throttled redraw.
   */
  render(): void {
    if (this.timer) {
      clearTimeout(this.timer)
      this.timer = undefined
    }
    if (!this.started)
      return

    const rows = this.out.rows ?? 24
    const frame = composeFrame({
      lines: this.lines,
      columns: this.out.columns ?? 80,
      rows,
      prompt: this.prompt,
      text: this.editor.text,
      cursor: this.editor.cursorPosition,
      placeholder: this.placeholder,
      status: this.status,
      error: this.errorMessage,
      bytes: this.bytes,
      lineCount: this.lineCount,
      countMode: this.countMode,
    })

    let screen = HOME
    screen += frame.lines.map(line => CLEAR_LINE + line).join('\r\n')
    screen += `\u001B[${rows};${frame.cursorColumn}H`
    this.out.write(screen)
  }

  scheduleRender(): void {
    if (!this.started || this.timer)
      return
    this.timer = setTimeout(() => this.render(), this.redrawIntervalMs)
  }

  private appendText(text: string): void {
    if (!text || this.capped)
      return
    const parts = text.split('\n')
    this.lines[this.lines.length - 1] += parts[0]
    for (let i = 1; i < parts.length; i++) {
      // Lines past the cap are counted but not kept
      if (this.lines.length >= this.maxLines) {
        this.capped = true
        return
      }
      this.lines.push(parts[i])
    }
  }
}
