import type { Buffer } from 'node:buffer'
import type { ChildProcess } from 'node:child_process'
import type { Readable } from 'node:stream'
import type { Logger } from '../logger'
import type { RunExit } from '../types'
import { spawn } from 'node:child_process'
import process from 'node:process'
import { PassThrough } from 'node:stream'
import { SpawnError } from '../errors'
import { resolveShell } from './shell-resolver'

export interface SupervisorOptions {
  /** Interpreter path. Resolved through SHELL and PATH when unset. */
  shell?: string
  /** Shell names probed on PATH when neither `shell` nor SHELL is set. */
  candidates?: string[]
  /** Flag placed before the command string. */
  flag?: string
  killSignal?: NodeJS.Signals
  /** Delay before escalating a cancellation to SIGKILL. */
  killGraceMs?: number
  cwd?: string
  env?: NodeJS.ProcessEnv
  log?: Logger
}

export interface RunHandle {
  readonly pid: number
  readonly command: string
  /** Combined stdout and stderr. Ends once the child has exited and both pipes drained. */
  readonly output: Readable
  readonly cancelled: boolean
  cancel: () => void
  wait: () => Promise<RunExit>
}

/**
 * Starts `<shell> -c <command>` children and owns their lifecycle.
 */
export class ProcessSupervisor {
  private options: SupervisorOptions & { flag: string, killSignal: NodeJS.Signals, killGraceMs: number }
  private resolvedShell?: string

  constructor(options: SupervisorOptions = {}) {
    this.options = {
      ...options,
      flag: options.flag ?? '-c',
      killSignal: options.killSignal ?? 'SIGTERM',
      killGraceMs: options.killGraceMs ?? 100,
    }
  }

  /**
   * The interpreter used for every run. Throws ShellNotFoundError when none exists.
   */
  get shell(): string {
    if (!this.resolvedShell) {
      this.resolvedShell = resolveShell({
        path: this.options.shell,
        candidates: this.options.candidates,
        env: this.options.env,
      })
    }
    return this.resolvedShell
  }

  /**
   * Spawn `command` with `input` as its standard input.
   *
   * Resolves once the process has started. Rejects with a SpawnError when it
   * cannot start; `input` is destroyed in that case.
   */
  spawn(command: string, input: Readable, signal?: AbortSignal): Promise<RunHandle> {
    const { flag, cwd, env, log } = this.options

    return new Promise((resolve, reject) => {
      let shell: string
      let child: ChildProcess
      try {
        shell = this.shell
      }
      catch (error) {
        input.destroy()
        reject(error)
        return
      }

      try {
        child = spawn(shell, [flag, command], {
          cwd,
          env: env ?? process.env,
          stdio: ['pipe', 'pipe', 'pipe'],
          // Own process group, so cancellation reaches the whole pipeline
          detached: true,
          windowsHide: true,
        })
      }
      catch (error) {
        input.destroy()
        reject(new SpawnError(command, error))
        return
      }

      const onError = (error: Error) => {
        child.off('spawn', onSpawn)
        input.destroy()
        log?.debug(`spawn failed for "${command}":`, error)
        reject(new SpawnError(command, error))
      }
      const onSpawn = () => {
        child.off('error', onError)
        log?.debug(`started pid ${child.pid ?? 0}: ${shell} ${flag} ${command}`)
        resolve(new SupervisedRun(command, child, input, this.options, signal))
      }
      child.once('error', onError)
      child.once('spawn', onSpawn)
    })
  }
}

class SupervisedRun implements RunHandle {
  readonly pid: number
  readonly output = new PassThrough()
  private isCancelled = false
  private exited = false
  private killTimer?: NodeJS.Timeout
  private closed: Promise<RunExit>
  private log?: Logger

  constructor(
    readonly command: string,
    private child: ChildProcess,
    private input: Readable,
    private options: SupervisorOptions & { killSignal: NodeJS.Signals, killGraceMs: number },
    signal?: AbortSignal,
  ) {
    this.pid = child.pid ?? 0
    this.log = options.log

    child.on('error', (error) => {
      this.log?.warn(`pid ${this.pid}:`, error)
    })

    const stdin = child.stdin
    if (stdin) {
      // EPIPE when the child stops reading; the run itself is unaffected
      stdin.on('error', (error) => {
        this.log?.debug(`stdin of pid ${this.pid} closed:`, error)
        this.releaseInput()
      })
      input.on('error', (error) => {
        this.log?.debug(`replay for pid ${this.pid} failed:`, error)
        stdin.end()
      })
      input.pipe(stdin)
    }
    else {
      this.releaseInput()
    }

    for (const stream of [child.stdout, child.stderr]) {
      if (!stream)
        continue
      stream.on('data', (chunk: Buffer) => {
        if (this.isCancelled || this.output.destroyed)
          return
        if (!this.output.write(chunk)) {
          stream.pause()
          this.output.once('drain', () => stream.resume())
        }
      })
    }

    this.closed = new Promise((resolve) => {
      child.once('close', (code: number | null, exitSignal: NodeJS.Signals | null) => {
        this.exited = true
        if (this.killTimer)
          clearTimeout(this.killTimer)
        this.releaseInput()
        if (!this.output.destroyed)
          this.output.end()
        this.log?.debug(`pid ${this.pid} closed (code ${code}, signal ${exitSignal})`)
        resolve({ code, signal: exitSignal, cancelled: this.isCancelled })
      })
    })

    if (signal) {
      if (signal.aborted)
        this.cancel()
      else
        signal.addEventListener('abort', () => this.cancel(), { once: true })
    }
  }

  get cancelled(): boolean {
    return this.isCancelled
  }

  /**
   * Stop the run: release the replay, stop forwarding output, and signal the
   * process group, escalating to SIGKILL after the grace period.
   */
  cancel(): void {
    if (this.isCancelled)
      return
    this.isCancelled = true
    this.releaseInput()

    // Drain and discard, so a paused pipe cannot hold back 'close'
    this.child.stdout?.resume()
    this.child.stderr?.resume()

    if (this.exited)
      return
    this.signalGroup(this.options.killSignal)
    // Cleared on 'close'
    this.killTimer = setTimeout(() => this.signalGroup('SIGKILL'), this.options.killGraceMs)
  }

  wait(): Promise<RunExit> {
    return this.closed
  }

  private releaseInput(): void {
    if (this.child.stdin)
      this.input.unpipe(this.child.stdin)
    this.input.destroy()
  }

  private signalGroup(signal: NodeJS.Signals): void {
    if (this.pid <= 0)
      return
    try {
      process.kill(-this.pid, signal)
    }
    catch (groupError) {
      // Group already gone; fall back to the child itself
      try {
        this.child.kill(signal)
      }
      catch (error) {
        this.log?.debug(`could not signal pid ${this.pid}:`, groupError, error)
      }
    }
  }
}
