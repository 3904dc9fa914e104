import type { Readable } from 'node:stream'
import type { Logger } from '../logger'
import { Buffer } from 'node:buffer'
import { TailBusyError } from '../errors'

const INITIAL_CAPACITY = 64 * 1024

export interface TailLease {
  release: () => void
}

/**
 * Reads the raw input exactly once and keeps every byte.
 *
 * A single pump task owns the read cursor of the source for the lifetime of
 * the tee. Appends and snapshot copies both run synchronously on the event
 * loop, so a snapshot never observes a half-applied append.
 */
export class CaptureTee {
  private buffer: Buffer = Buffer.alloc(0)
  private size = 0
  private ended = false
  private failure?: Error
  private pumping?: Promise<void>
  private tailHeld = false
  private waiters = new Set<() => void>()

  constructor(private source: Readable, private log?: Logger) {}

  get length(): number {
    return this.size
  }

  /** True once the source has ended or failed; no more bytes will be appended. */
  get eof(): boolean {
    return this.ended
  }

  /** The raw source's read failure, if it ended with one. */
  get error(): Error | undefined {
    return this.failure
  }

  /**
   * Start the pump task. Idempotent.
   */
  start(): void {
    if (!this.pumping)
      this.pumping = this.pump()
  }

  private async pump(): Promise<void> {
    try {
      for await (const chunk of this.source) {
        this.append(toBytes(chunk))
      }
      this.log?.debug(`input ended after ${this.size} bytes`)
      this.finish()
    }
    catch (error) {
      const err = error instanceof Error ? error : new Error(String(error))
      this.log?.warn('input read failed:', err)
      this.finish(err)
    }
  }

  append(bytes: Uint8Array): void {
    if (this.ended)
      throw new Error('cannot append to a finished capture')
    if (bytes.length === 0)
      return
    this.ensureCapacity(this.size + bytes.length)
    this.buffer.set(bytes, this.size)
    this.size += bytes.length
    this.wake()
  }

  /**
   * Mark the capture as finished. An error is kept as the terminal state.
   */
  finish(error?: Error): void {
    if (this.ended)
      return
    this.ended = true
    this.failure = error
    this.wake()
  }

  /**
   * Copy of everything captured so far.
   */
  snapshot(): Buffer {
    return Buffer.from(this.buffer.subarray(0, this.size))
  }

  /**
   * Copy of up to `max` captured bytes starting at `offset`.
   */
  readFrom(offset: number, max = Number.POSITIVE_INFINITY): Buffer {
    if (offset >= this.size)
      return Buffer.alloc(0)
    const end = Math.min(this.size, offset + max)
    return Buffer.from(this.buffer.subarray(offset, end))
  }

  /**
   * Resolve once more than `offset` bytes are captured or the capture has finished.
   */
  waitForData(offset: number, signal?: AbortSignal): Promise<void> {
    if (this.size > offset || this.ended)
      return Promise.resolve()
    if (signal?.aborted)
      return Promise.reject(abortError())

    return new Promise((resolve, reject) => {
      const onAbort = () => {
        this.waiters.delete(onData)
        reject(abortError())
      }
      const onData = () => {
        if (this.size <= offset && !this.ended)
          return
        this.waiters.delete(onData)
        signal?.removeEventListener('abort', onAbort)
        resolve()
      }
      this.waiters.add(onData)
      signal?.addEventListener('abort', onAbort, { once: true })
    })
  }

  /**
   * Take exclusive ownership of the live continuation.
   */
  acquireTail(): TailLease {
    if (this.tailHeld)
      throw new TailBusyError()
    this.tailHeld = true
    let released = false
    return {
      release: () => {
        if (released)
          return
        released = true
        this.tailHeld = false
      },
    }
  }

  isTailHeld(): boolean {
    return this.tailHeld
  }

  private wake(): void {
    for (const waiter of Array.from(this.waiters))
      waiter()
  }

  private ensureCapacity(needed: number): void {
    if (needed <= this.buffer.length)
      return
    let capacity = Math.max(this.buffer.length, INITIAL_CAPACITY)
    while (capacity < needed)
      capacity *= 2
    const grown = Buffer.alloc(capacity)
    this.buffer.copy(grown, 0, 0, this.size)
    this.buffer = grown
  }
}

function toBytes(chunk: unknown): Uint8Array {
  if (chunk instanceof Uint8Array)
    return chunk
  return Buffer.from(String(chunk))
}

export function abortError(): Error {
  const error = new Error('The operation was aborted')
  error.name = 'AbortError'
  return error
}
