import type { Buffer } from 'node:buffer'
import type { Logger } from '../logger'
import type { CaptureTee, TailLease } from './capture-tee'
import { Readable } from 'node:stream'
import { isAbortError } from '../errors'

export interface ReplaySourceOptions {
  highWaterMark?: number
  log?: Logger
}

/**
 * A per-run readable that first yields the bytes captured before it was
 * created, then follows the capture as new bytes arrive.
 *
 * The snapshot freezes the capture length at construction; the live tail
 * starts exactly at that offset. The tail lease is held from construction
 * until the stream ends or is destroyed.
 */
export class ReplaySource extends Readable {
  /** Bytes frozen in the snapshot. The live tail starts here. */
  readonly fromOffset: number
  /** The raw source's failure, once this replay has drained past it. */
  terminalError?: Error

  private tee: CaptureTee
  private lease: TailLease
  private snapshot: Buffer
  private position = 0
  private offset: number
  private abort = new AbortController()
  private log?: Logger

  constructor(tee: CaptureTee, options: ReplaySourceOptions = {}) {
    super({ highWaterMark: options.highWaterMark })
    this.tee = tee
    this.log = options.log
    this.lease = tee.acquireTail()
    this.snapshot = tee.snapshot()
    this.fromOffset = this.snapshot.length
    this.offset = this.fromOffset
  }

  /** Total bytes handed to the consumer so far. */
  get bytesReplayed(): number {
    return this.position + (this.offset - this.fromOffset)
  }

  override _read(size: number): void {
    if (this.position < this.snapshot.length) {
      const end = Math.min(this.snapshot.length, this.position + size)
      const chunk = this.snapshot.subarray(this.position, end)
      this.position = end
      this.push(chunk)
      return
    }
    this.readLive(size)
  }

  private readLive(size: number): void {
    const chunk = this.tee.readFrom(this.offset, size)
    if (chunk.length > 0) {
      this.offset += chunk.length
      this.push(chunk)
      return
    }

    if (this.tee.eof) {
      this.terminalError = this.tee.error
      this.lease.release()
      this.push(null)
      return
    }

    // Blocked on the live tail until the tee grows, ends, or we are destroyed
    this.tee.waitForData(this.offset, this.abort.signal).then(
      () => {
        if (!this.destroyed)
          this.readLive(size)
      },
      (error: unknown) => {
        if (isAbortError(error))
          return
        this.destroy(error instanceof Error ? error : new Error(String(error)))
      },
    )
  }

  override _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
    this.abort.abort()
    this.lease.release()
    this.log?.debug(`replay released after ${this.bytesReplayed} bytes`)
    callback(error)
  }
}
