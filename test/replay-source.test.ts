import type { Readable } from 'node:stream'
import { Buffer } from 'node:buffer'
import { PassThrough } from 'node:stream'
import { setTimeout as sleep } from 'node:timers/promises'
import { describe, expect, it } from 'vitest'
import { CaptureTee } from '../src/capture/capture-tee'
import { ReplaySource } from '../src/capture/replay-source'
import { TailBusyError } from '../src/errors'

async function collect(stream: Readable): Promise<string> {
  const chunks: Buffer[] = []
  for await (const chunk of stream)
    chunks.push(Buffer.from(chunk))
  return Buffer.concat(chunks).toString('utf8')
}

function closed(stream: Readable): Promise<void> {
  return new Promise(resolve => stream.once('close', () => resolve()))
}

describe('ReplaySource', () => {
  it('replays the snapshot and ends once the capture is finished', async () => {
    const tee = new CaptureTee(new PassThrough())
    tee.append(Buffer.from('abc'))
    tee.finish()

    const replay = new ReplaySource(tee)
    expect(replay.fromOffset).toBe(3)
    expect(await collect(replay)).toBe('abc')
    expect(replay.bytesReplayed).toBe(3)
    expect(tee.isTailHeld()).toBe(false)
  })

  it('ends immediately on an empty finished capture', async () => {
    const tee = new CaptureTee(new PassThrough())
    tee.finish()

    expect(await collect(new ReplaySource(tee))).toBe('')
  })

  it('continues from the snapshot boundary without gaps or repeats', async () => {
    const tee = new CaptureTee(new PassThrough())
    tee.append(Buffer.from('one\n'))
    const replay = new ReplaySource(tee)
    // Lands after the snapshot was frozen
    tee.append(Buffer.from('two\n'))

    const result = collect(replay)
    await sleep(10)
    tee.append(Buffer.from('three\n'))
    tee.finish()

    expect(await result).toBe('one\ntwo\nthree\n')
    expect(replay.fromOffset).toBe(4)
    expect(replay.bytesReplayed).toBe(14)
  })

  it('exposes the source failure after draining', async () => {
    const tee = new CaptureTee(new PassThrough())
    tee.append(Buffer.from('x'))
    tee.finish(new Error('boom'))

    const replay = new ReplaySource(tee)
    expect(await collect(replay)).toBe('x')
    expect(replay.terminalError?.message).toBe('boom')
  })

  it('holds the live tail until destroyed', async () => {
    const tee = new CaptureTee(new PassThrough())
    tee.append(Buffer.from('data'))
    const replay = new ReplaySource(tee)

    expect(() => new ReplaySource(tee)).toThrow(TailBusyError)

    const done = closed(replay)
    replay.destroy()
    await done
    expect(tee.isTailHeld()).toBe(false)

    const next = new ReplaySource(tee)
    expect(next.fromOffset).toBe(4)
    next.destroy()
  })

  it('releases the tail when destroyed while waiting for live data', async () => {
    const tee = new CaptureTee(new PassThrough())
    const replay = new ReplaySource(tee)
    const received: string[] = []
    replay.on('data', (chunk: Buffer) => received.push(chunk.toString()))

    await sleep(10)
    const done = closed(replay)
    replay.destroy()
    await done

    expect(received).toEqual([])
    expect(tee.isTailHeld()).toBe(false)
  })
})
