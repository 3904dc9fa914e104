import type { OutputSink, RunStateEvent } from '../types'
import { Buffer } from 'node:buffer'

/**
 * Keeps what a run produced in memory. Used when there is no terminal to draw on.
 */
export class BufferedSink implements OutputSink {
  readonly states: RunStateEvent[] = []
  private chunks: Buffer[] = []
  private errors: string[] = []
  private bytes = 0
  private lines = 0
  private resets = 0

  reset(): void {
    this.chunks = []
    this.errors = []
    this.bytes = 0
    this.lines = 0
    this.resets++
  }

  write(chunk: Buffer, totalBytes: number, totalLines: number): void {
    this.chunks.push(Buffer.from(chunk))
    this.bytes = totalBytes
    this.lines = totalLines
  }

  error(message: string): void {
    this.errors.push(message)
  }

  state(event: RunStateEvent): void {
    this.states.push(event)
  }

  text(): string {
    return Buffer.concat(this.chunks).toString('utf8')
  }

  get byteCount(): number {
    return this.bytes
  }

  get lineCount(): number {
    return this.lines
  }

  get errorMessages(): string[] {
    return this.errors.slice()
  }

  get resetCount(): number {
    return this.resets
  }
}
