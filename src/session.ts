import type { Keypress } from './input/keymap'
import type { LineEditor } from './input/line-editor'
import type { Logger } from './logger'
import type { RunCoordinator } from './run/run-coordinator'
import type { Transcript } from './types'
import type { TerminalView } from './ui/terminal-view'
import { emitKeypressEvents } from 'node:readline'
import { resolveKey } from './input/keymap'

/** Where keys come from. A tty.ReadStream on /dev/tty fits. */
export type KeyInput = NodeJS.ReadableStream & {
  setRawMode?: (mode: boolean) => unknown
}

export interface SessionOptions {
  coordinator: RunCoordinator
  editor: LineEditor
  view: TerminalView
  input: KeyInput
  log?: Logger
}

/**
 * Interactive loop: keys edit the command line, Enter restarts the pipeline,
 * Ctrl-C quits and hands back the transcript.
 */
export class Session {
  private coordinator: RunCoordinator
  private editor: LineEditor
  private view: TerminalView
  private input: KeyInput
  private log?: Logger
  private quitting = false
  private running?: Promise<Transcript>
  private readonly onKeypress = (str: string | undefined, key: Keypress | undefined): void => {
    try {
      this.handleKey(str, key)
    }
    catch (error) {
      this.log?.error('keypress error:', error)
    }
  }

  constructor(options: SessionOptions) {
    this.coordinator = options.coordinator
    this.editor = options.editor
    this.view = options.view
    this.input = options.input
    this.log = options.log
  }

  /**
   * Take over the terminal. Resolves with the transcript once the session quits
   * and the terminal is restored.
   */
  run(): Promise<Transcript> {
    if (this.running)
      return this.running

    this.running = new Promise<Transcript>((resolve) => {
      this.coordinator.once('quit', (transcript) => {
        this.restore()
        resolve(transcript)
      })
    })

    emitKeypressEvents(this.input)
    this.input.setRawMode?.(true)
    this.input.on('keypress', this.onKeypress)
    this.input.resume()
    this.view.start()
    this.coordinator.launch(this.editor.text).catch((error: unknown) => {
      this.log?.error('initial run failed:', error)
    })
    return this.running
  }

  handleKey(str: string | undefined, key: Keypress | undefined): void {
    const action = resolveKey(str, key)
    switch (action.type) {
      case 'submit':
        this.coordinator.dispatch({ type: 'submit', command: this.editor.text })
        break
      case 'quit':
        this.quit()
        return
      case 'history': {
        const entry = this.coordinator.dispatch({ type: action.direction === 'prev' ? 'navigate-prev' : 'navigate-next' })
        if (entry !== undefined)
          this.editor.setText(entry)
        break
      }
      case 'edit':
        if (!this.editor.apply(action.action))
          return
        break
      case 'redraw':
        break
      case 'ignore':
        return
    }
    this.view.render()
  }

  /** Cancel the active run and quit. Safe to call more than once. */
  quit(): void {
    if (this.quitting)
      return
    this.quitting = true
    this.coordinator.dispatch({ type: 'quit' })
  }

  private restore(): void {
    this.input.off('keypress', this.onKeypress)
    this.input.setRawMode?.(false)
    this.input.pause()
    this.view.stop()
  }
}
