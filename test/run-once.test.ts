import { Buffer } from 'node:buffer'
import { PassThrough } from 'node:stream'
import { describe, expect, it } from 'vitest'
import { CaptureTee } from '../src/capture/capture-tee'
import { runOnce } from '../src/run/run-once'
import { ProcessSupervisor } from '../src/supervisor/process-supervisor'

function finishedTee(text: string): CaptureTee {
  const tee = new CaptureTee(new PassThrough())
  tee.append(Buffer.from(text))
  tee.finish()
  return tee
}

const supervisor = new ProcessSupervisor({ shell: '/bin/sh' })

describe('runOnce', () => {
  it('returns the output of a command with flags', async () => {
    const result = await runOnce('sort -r', { tee: finishedTee('3\n1\n2\n'), supervisor })
    expect(result).toEqual({ output: '3\n2\n1\n', errors: [] })
  })

  it('falls back to the default command', async () => {
    const result = await runOnce('', { tee: finishedTee('as is\n'), supervisor, defaultCommand: 'cat' })
    expect(result).toEqual({ output: 'as is\n', errors: [] })
  })

  it('reports a command that cannot start', async () => {
    const broken = new ProcessSupervisor({ shell: '/nonexistent/replumb-shell' })
    const result = await runOnce('cat', { tee: finishedTee('x\n'), supervisor: broken })

    expect(result.output).toBe('')
    expect(result.errors).toHaveLength(1)
    expect(result.errors[0]).toMatch(/^failed to start "cat": /)
  })
})
