import type { CaptureTee } from '../capture/capture-tee'
import type { Logger } from '../logger'
import type { ProcessSupervisor, RunHandle } from '../supervisor/process-supervisor'
import type { ControlEvent, OutputSink, RunStateEvent, RunStatus, Transcript } from '../types'
import { Buffer } from 'node:buffer'
import { EventEmitter } from 'node:events'
import { ReplaySource } from '../capture/replay-source'
import { describeError } from '../errors'
import { HistoryLog } from '../history/history-log'

export interface RunCoordinatorOptions {
  tee: CaptureTee
  supervisor: ProcessSupervisor
  sink: OutputSink
  history?: HistoryLog
  /** Runs when the submitted command is blank. */
  defaultCommand?: string
  /** Largest chunk forwarded to the sink at once. */
  chunkSize?: number
  log?: Logger
}

export interface RunInfo {
  id: number
  command: string
  status: RunStatus
  bytes: number
  lines: number
}

export interface RunCoordinatorEvents {
  state: [event: RunStateEvent]
  quit: [transcript: Transcript]
}

interface RunState {
  id: number
  command: string
  status: RunStatus
  controller: AbortController
  handle?: RunHandle
  replay?: ReplaySource
  reader?: Promise<void>
  chunks: Buffer[]
  bytes: number
  newlines: number
  endsWithNewline: boolean
}

const NEWLINE = 0x0A

/**
 * Owns the active run. Every submit cancels the previous run, waits until its
 * process has exited and released the live input, and only then starts the
 * next one, so at most one run ever streams into the sink.
 */
export class RunCoordinator extends EventEmitter<RunCoordinatorEvents> {
  readonly history: HistoryLog
  private tee: CaptureTee
  private supervisor: ProcessSupervisor
  private sink: OutputSink
  private defaultCommand: string
  private chunkSize: number
  private log?: Logger
  private active?: RunState
  private nextRunId = 1
  private lastCommand = ''
  // Control operations run one at a time, in submission order
  private queue: Promise<void> = Promise.resolve()

  constructor(options: RunCoordinatorOptions) {
    super()
    this.tee = options.tee
    this.supervisor = options.supervisor
    this.sink = options.sink
    this.history = options.history ?? new HistoryLog()
    this.defaultCommand = options.defaultCommand ?? 'cat'
    this.chunkSize = options.chunkSize ?? 4096
    this.log = options.log
  }

  /**
   * Record `command` and restart the pipeline with it. Resolves once the new
   * run is streaming or has failed to start.
   */
  submit(command: string): Promise<void> {
    this.history.append(command)
    this.lastCommand = command
    return this.enqueue(() => this.restart(command))
  }

  /**
   * Start the first run at launch. Same restart sequence as `submit`, but the
   * command is not recorded in history.
   */
  launch(command: string): Promise<void> {
    this.lastCommand = command
    return this.enqueue(() => this.restart(command))
  }

  /**
   * Cancel the active run and wait for its teardown.
   */
  cancel(): Promise<void> {
    return this.enqueue(() => this.stopActive())
  }

  /**
   * Cancel and wait, then hand back the last run's output and command.
   */
  async quit(): Promise<Transcript> {
    await this.cancel()
    return {
      output: this.output(),
      command: this.effectiveCommand(this.lastCommand),
    }
  }

  /**
   * Handle a control event without blocking. Navigation returns the history
   * entry under the cursor.
   */
  dispatch(event: ControlEvent): string | undefined {
    switch (event.type) {
      case 'submit':
        this.submit(event.command).catch((error: unknown) => {
          this.log?.error('submit failed:', error)
        })
        return undefined
      case 'navigate-prev':
        return this.history.prev()
      case 'navigate-next':
        return this.history.next()
      case 'quit':
        this.quit().then(
          transcript => this.emit('quit', transcript),
          (error: unknown) => this.log?.error('quit failed:', error),
        )
        return undefined
    }
  }

  /**
   * Wait for queued control work and for the active run's reader to finish.
   */
  async waitForActiveRun(): Promise<RunInfo | undefined> {
    await this.queue
    const run = this.active
    if (run?.reader)
      await run.reader
    return this.getActiveRun()
  }

  getActiveRun(): RunInfo | undefined {
    const run = this.active
    if (!run)
      return undefined
    return {
      id: run.id,
      command: run.command,
      status: run.status,
      bytes: run.bytes,
      lines: lineCount(run),
    }
  }

  /** Accumulated output of the active (or last) run. */
  output(): string {
    return this.active ? Buffer.concat(this.active.chunks).toString('utf8') : ''
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    const next = this.queue.then(task)
    this.queue = next.catch((error: unknown) => {
      this.log?.error('control task failed:', error)
    })
    return next
  }

  private effectiveCommand(command: string): string {
    return command.trim() ? command : this.defaultCommand
  }

  private async restart(command: string): Promise<void> {
    await this.stopActive()

    const run: RunState = {
      id: this.nextRunId++,
      command: this.effectiveCommand(command),
      status: 'idle',
      controller: new AbortController(),
      chunks: [],
      bytes: 0,
      newlines: 0,
      endsWithNewline: true,
    }
    this.active = run
    this.sink.reset()
    this.setStatus(run, 'starting')

    try {
      const replay = new ReplaySource(this.tee, { log: this.log })
      run.replay = replay
      this.log?.debug(`run ${run.id} replays ${replay.fromOffset} captured bytes${this.tee.eof ? '' : ' then follows input'}`)
      run.handle = await this.supervisor.spawn(run.command, replay, run.controller.signal)
    }
    catch (error) {
      this.fail(run, error)
      return
    }

    this.setStatus(run, 'streaming')
    run.reader = this.read(run, run.handle)
  }

  private async stopActive(): Promise<void> {
    const run = this.active
    if (!run)
      return

    if (run.status === 'starting' || run.status === 'streaming')
      run.controller.abort()

    if (run.handle) {
      const exit = await run.handle.wait()
      this.log?.debug(`run ${run.id} exited (code ${exit.code}, signal ${exit.signal}${exit.cancelled ? ', cancelled' : ''})`)
    }
    if (run.reader)
      await run.reader
  }

  private async read(run: RunState, handle: RunHandle): Promise<void> {
    try {
      for await (const chunk of handle.output) {
        // Keep draining after a cancel so the pipe can close
        if (run.controller.signal.aborted)
          continue
        const bytes = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk))
        for (let offset = 0; offset < bytes.length; offset += this.chunkSize)
          this.forward(run, bytes.subarray(offset, offset + this.chunkSize))
      }
      if (run.controller.signal.aborted) {
        this.setStatus(run, 'cancelled')
        return
      }
      // The command saw end of input, but the input itself broke off
      const inputError = run.replay?.terminalError
      if (inputError && this.active === run)
        this.sink.error(`input read failed: ${inputError.message}`)
      this.setStatus(run, 'finished')
    }
    catch (error) {
      if (run.controller.signal.aborted) {
        this.setStatus(run, 'cancelled')
        return
      }
      this.fail(run, error)
    }
  }

  private forward(run: RunState, chunk: Buffer): void {
    if (this.active !== run)
      return
    run.chunks.push(chunk)
    run.bytes += chunk.length
    for (const byte of chunk) {
      if (byte === NEWLINE)
        run.newlines++
    }
    run.endsWithNewline = chunk[chunk.length - 1] === NEWLINE
    this.sink.write(chunk, run.bytes, lineCount(run))
  }

  private fail(run: RunState, error: unknown): void {
    this.log?.debug(`run ${run.id} failed:`, error)
    if (this.active === run)
      this.sink.error(describeError(error))
    this.setStatus(run, 'failed')
  }

  private setStatus(run: RunState, status: RunStatus): void {
    run.status = status
    const event: RunStateEvent = { runId: run.id, command: run.command, status }
    this.sink.state?.(event)
    this.emit('state', event)
  }
}

function lineCount(run: RunState): number {
  return run.newlines + (run.endsWithNewline ? 0 : 1)
}
