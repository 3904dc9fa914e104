import type { Buffer } from 'node:buffer'
import type { LoggingConfig } from './types'
import process from 'node:process'
import { Writable } from 'node:stream'

/**
 * Log level type
 */
type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * ANSI color codes for terminal output
 */
const ANSI_COLORS = {
  reset: '\u001B[0m',
  dim: '\u001B[2m',
  red: '\u001B[31m',
  yellow: '\u001B[33m',
  blue: '\u001B[34m',
  cyan: '\u001B[36m',
} as const

export interface LoggerOptions {
  logging?: LoggingConfig
  /**
   * Destination for every level. Standard output carries the transcript, so
   * the default is standard error.
   */
  output?: NodeJS.WritableStream & { isTTY?: boolean }
  colors?: boolean
}

/**
 * Logger class with scopes and level colors
 */
export class Logger {
  private verbose: boolean
  private scopeName?: string
  private options: LoggerOptions
  private output: NodeJS.WritableStream
  private useColors: boolean

  constructor(verbose = false, scopeName?: string, options: LoggerOptions = {}) {
    this.verbose = verbose
    this.scopeName = scopeName
    this.options = options
    const output = options.output ?? process.stderr
    this.output = output
    this.useColors = options.colors ?? (Boolean(output.isTTY) && !process.env.NO_COLOR)
  }

  /**
   * Enable or disable verbose logging
   */
  setVerbose(verbose: boolean): void {
    this.verbose = verbose
  }

  isVerbose(): boolean {
    return this.verbose
  }

  /**
   * Create a new logger instance with a scope
   */
  withScope(scope: string): Logger {
    const name = this.scopeName ? `${this.scopeName}:${scope}` : scope
    return new Logger(this.verbose, name, this.options)
  }

  private format(level: LogLevel, message: string): string {
    let formatted = ''

    if (this.options.logging?.timestamps) {
      formatted += `${this.colorize(new Date().toISOString(), 'dim')} `
    }

    formatted += `${this.getLevelString(level)} `

    if (this.scopeName) {
      formatted += `${this.colorize(`[${this.scopeName}]`, 'dim')} `
    }

    return formatted + message
  }

  private getLevelString(level: LogLevel): string {
    const prefixes = this.options.logging?.prefixes
    const levelStr = {
      debug: prefixes?.debug ?? 'DEBUG',
      info: prefixes?.info ?? 'INFO',
      warn: prefixes?.warn ?? 'WARN',
      error: prefixes?.error ?? 'ERROR',
    }[level]

    if (!this.useColors) {
      return `[${levelStr}]`
    }

    const colors = {
      debug: ANSI_COLORS.cyan,
      info: ANSI_COLORS.blue,
      warn: ANSI_COLORS.yellow,
      error: ANSI_COLORS.red,
    }

    return `${colors[level]}[${levelStr}]${ANSI_COLORS.reset}`
  }

  private colorize(text: string, style: keyof typeof ANSI_COLORS): string {
    if (!this.useColors) {
      return text
    }
    return `${ANSI_COLORS[style]}${text}${ANSI_COLORS.reset}`
  }

  private emit(level: LogLevel, message: string, args: unknown[]): void {
    const rest = args.length ? ` ${args.map(formatArg).join(' ')}` : ''
    this.output.write(`${this.format(level, message)}${rest}\n`)
  }

  /**
   * Log a debug message. Dropped unless verbose.
   */
  debug(message: string, ...args: unknown[]): void {
    if (!this.verbose)
      return
    this.emit('debug', message, args)
  }

  info(message: string, ...args: unknown[]): void {
    this.emit('info', message, args)
  }

  warn(message: string, ...args: unknown[]): void {
    this.emit('warn', message, args)
  }

  error(message: string, ...args: unknown[]): void {
    this.emit('error', message, args)
  }
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error)
    return arg.message
  return String(arg)
}

/**
 * Log destination that can be held back while the screen is taken over, so
 * log lines do not land on top of a drawn frame.
 */
export class HeldOutput extends Writable {
  private held: Buffer[] = []
  private holding = false

  constructor(private target: NodeJS.WritableStream & { isTTY?: boolean } = process.stderr) {
    super()
  }

  get isTTY(): boolean {
    return Boolean(this.target.isTTY)
  }

  hold(): void {
    this.holding = true
  }

  /** Write out everything held so far and pass later lines straight through. */
  release(): void {
    this.holding = false
    for (const chunk of this.held.splice(0))
      this.target.write(chunk)
  }

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (this.holding)
      this.held.push(chunk)
    else
      this.target.write(chunk)
    callback()
  }
}

// Create a default logger instance
export const logger: Logger = new Logger(Boolean(process.env.REPLUMB_DEBUG))
