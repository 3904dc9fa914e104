import type { Readable } from 'node:stream'
import { Buffer } from 'node:buffer'
import { PassThrough } from 'node:stream'
import { describe, expect, it } from 'vitest'
import { CaptureTee } from '../src/capture/capture-tee'
import { ReplaySource } from '../src/capture/replay-source'
import { ShellNotFoundError, SpawnError } from '../src/errors'
import { ProcessSupervisor } from '../src/supervisor/process-supervisor'

async function collect(stream: Readable): Promise<string> {
  const chunks: Buffer[] = []
  for await (const chunk of stream)
    chunks.push(Buffer.from(chunk))
  return Buffer.concat(chunks).toString('utf8')
}

function finishedTee(text: string): CaptureTee {
  const tee = new CaptureTee(new PassThrough())
  tee.append(Buffer.from(text))
  tee.finish()
  return tee
}

describe('ProcessSupervisor', () => {
  const supervisor = new ProcessSupervisor({ shell: '/bin/sh', killGraceMs: 200 })

  it('runs a command over the replayed input', async () => {
    const tee = finishedTee('3\n1\n2\n')
    const handle = await supervisor.spawn('sort', new ReplaySource(tee))

    expect(handle.pid).toBeGreaterThan(0)
    expect(handle.command).toBe('sort')
    expect(await collect(handle.output)).toBe('1\n2\n3\n')
    expect(await handle.wait()).toEqual({ code: 0, signal: null, cancelled: false })
    expect(tee.isTailHeld()).toBe(false)
  })

  it('merges standard error into the output', async () => {
    const handle = await supervisor.spawn('echo oops 1>&2', new ReplaySource(finishedTee('')))
    expect(await collect(handle.output)).toBe('oops\n')
  })

  it('reports non-zero exits without failing', async () => {
    const handle = await supervisor.spawn('exit 3', new ReplaySource(finishedTee('ignored\n')))
    expect(await collect(handle.output)).toBe('')
    expect(await handle.wait()).toEqual({ code: 3, signal: null, cancelled: false })
  })

  it('releases the live tail when the command stops reading early', async () => {
    const tee = new CaptureTee(new PassThrough())
    tee.append(Buffer.from('first\nsecond\n'))
    const handle = await supervisor.spawn('head -n 1', new ReplaySource(tee))

    expect(await collect(handle.output)).toBe('first\n')
    await handle.wait()
    expect(tee.isTailHeld()).toBe(false)
  })

  it('cancels a run blocked on the live tail', async () => {
    const tee = new CaptureTee(new PassThrough())
    tee.append(Buffer.from('waiting\n'))
    const handle = await supervisor.spawn('cat', new ReplaySource(tee))
    const output = collect(handle.output)

    const started = Date.now()
    handle.cancel()
    handle.cancel()
    const exit = await handle.wait()

    expect(exit.cancelled).toBe(true)
    expect(handle.cancelled).toBe(true)
    expect(Date.now() - started).toBeLessThan(2000)
    expect(tee.isTailHeld()).toBe(false)
    await output
  })

  it('cancels when the abort signal fires', async () => {
    const tee = new CaptureTee(new PassThrough())
    const controller = new AbortController()
    const handle = await supervisor.spawn('cat', new ReplaySource(tee), controller.signal)
    const output = collect(handle.output)

    controller.abort()
    const exit = await handle.wait()

    expect(exit.cancelled).toBe(true)
    expect(tee.isTailHeld()).toBe(false)
    await output
  })

  it('rejects with SpawnError when the shell cannot start', async () => {
    const broken = new ProcessSupervisor({ shell: '/nonexistent/replumb-shell' })
    const tee = finishedTee('x')
    const spawning = broken.spawn('cat', new ReplaySource(tee))

    await expect(spawning).rejects.toBeInstanceOf(SpawnError)
    await expect(spawning).rejects.toMatchObject({ code: 'SPAWN_FAILED', command: 'cat' })
    expect(tee.isTailHeld()).toBe(false)
  })

  it('rejects with ShellNotFoundError when no shell resolves', async () => {
    const none = new ProcessSupervisor({ candidates: ['replumb-no-such-shell'], env: { SHELL: '', PATH: '/nonexistent' } })
    const tee = finishedTee('x')

    await expect(none.spawn('cat', new ReplaySource(tee))).rejects.toBeInstanceOf(ShellNotFoundError)
    expect(tee.isTailHeld()).toBe(false)
  })
})
