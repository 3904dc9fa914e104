export type ReplumbErrorCode =
  | 'INPUT_UNAVAILABLE'
  | 'SHELL_NOT_FOUND'
  | 'SPAWN_FAILED'
  | 'TAIL_BUSY'
  | 'CONFIG_INVALID'

export class ReplumbError extends Error {
  readonly code: ReplumbErrorCode
  constructor(code: ReplumbErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ReplumbError'
    this.code = code
  }
}

/**
 * Standard input is an interactive terminal; replumb needs piped or redirected data.
 */
export class InputUnavailableError extends ReplumbError {
  constructor(message = 'stdin is a terminal; pipe or redirect input into replumb') {
    super('INPUT_UNAVAILABLE', message)
    this.name = 'InputUnavailableError'
  }
}

export class ShellNotFoundError extends ReplumbError {
  readonly candidates: string[]
  constructor(candidates: string[]) {
    const tried = candidates.length > 0 ? ` (tried SHELL, ${candidates.join(', ')})` : ''
    super('SHELL_NOT_FOUND', `shell not found${tried}`)
    this.name = 'ShellNotFoundError'
    this.candidates = candidates
  }
}

export class SpawnError extends ReplumbError {
  readonly command: string
  constructor(command: string, cause: unknown) {
    super('SPAWN_FAILED', `failed to start "${command}": ${describeError(cause)}`, { cause })
    this.name = 'SpawnError'
    this.command = command
  }
}

/**
 * A second replay tried to follow the live input while another still holds it.
 */
export class TailBusyError extends ReplumbError {
  constructor() {
    super('TAIL_BUSY', 'live input is already held by another replay')
    this.name = 'TailBusyError'
  }
}

export class ConfigError extends ReplumbError {
  readonly errors: string[]
  constructor(errors: string[]) {
    super('CONFIG_INVALID', `invalid configuration: ${errors.join('; ')}`)
    this.name = 'ConfigError'
    this.errors = errors
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error)
    return error.message
  return String(error)
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError'
}
