import type { Buffer } from 'node:buffer'

export interface ReplumbConfig {
  verbose: boolean
  /**
   * Command used when the editable command line is empty.
   * The default is a byte-identity pass-through.
   */
  defaultCommand?: string
  shell?: ShellConfig
  execution?: ExecutionConfig
  ui?: UiConfig
  transcript?: TranscriptConfig
  logging?: LoggingConfig
}

export interface ShellConfig {
  /**
   * Interpreter used for every run. When unset, `SHELL` is consulted and
   * then `candidates` are probed on PATH in order.
   */
  path?: string
  /**
   * Shell names probed on PATH when neither `path` nor `SHELL` is set.
   * @example ['bash', 'sh']
   */
  candidates?: string[]
  /**
   * Flag passed before the command string.
   */
  flag?: string
}

export interface ExecutionConfig {
  /**
   * Signal sent to the run's process group on cancellation. Defaults to 'SIGTERM'.
   */
  killSignal?: NodeJS.Signals
  /**
   * Milliseconds to wait after `killSignal` before escalating to SIGKILL.
   */
  killGraceMs?: number
  /**
   * Largest chunk forwarded to the output sink at once, in bytes.
   */
  chunkSize?: number
}

export interface UiConfig {
  prompt?: string
  placeholder?: string
  /**
   * Minimum delay between two frames while output streams in.
   */
  redrawIntervalMs?: number
  countMode?: 'lines' | 'bytes'
}

export interface TranscriptConfig {
  /**
   * Print the last run's output and command to stdout on quit.
   */
  enabled?: boolean
  /**
   * Line written between the output and the command.
   */
  delimiter?: string
}

export interface LoggingConfig {
  prefixes?: {
    debug?: string
    info?: string
    warn?: string
    error?: string
  }
  timestamps?: boolean
}

export type RunStatus = 'idle' | 'starting' | 'streaming' | 'finished' | 'cancelled' | 'failed'

export interface RunStateEvent {
  runId: number
  command: string
  status: RunStatus
}

/**
 * Receives the output of the active run. Owns presentation.
 */
export interface OutputSink {
  reset: () => void
  write: (chunk: Buffer, totalBytes: number, totalLines: number) => void
  error: (message: string) => void
  state?: (event: RunStateEvent) => void
}

export type ControlEvent =
  | { type: 'submit', command: string }
  | { type: 'navigate-prev' }
  | { type: 'navigate-next' }
  | { type: 'quit' }

export interface Transcript {
  output: string
  command: string
}

export interface RunExit {
  code: number | null
  signal: NodeJS.Signals | null
  cancelled: boolean
}
