import type { ReplumbConfig } from '../src/types'
import process from 'node:process'
import { loadConfig } from 'bunfig'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { defaultConfig, loadReplumbConfig, mergeConfig, validateReplumbConfig } from '../src/config'

vi.mock('bunfig', () => ({
  loadConfig: vi.fn(),
}))

describe('config validation', () => {
  it('accepts the defaults', () => {
    const res = validateReplumbConfig(defaultConfig)
    expect(res.valid).toBe(true)
    expect(res.errors).toEqual([])
    expect(res.warnings).toEqual([])
  })

  it('flags invalid values', () => {
    const bad: ReplumbConfig = {
      ...defaultConfig,
      defaultCommand: '   ',
      execution: { chunkSize: 0, killGraceMs: -5, killSignal: 'SIGTERM' },
      ui: { redrawIntervalMs: -1 },
      transcript: { delimiter: 'two\nlines' },
    }

    const res = validateReplumbConfig(bad)
    expect(res.valid).toBe(false)
    expect(res.errors).toEqual([
      'defaultCommand must be a non-empty string',
      'execution.chunkSize must be a positive number (got: 0)',
      'execution.killGraceMs must be zero or a positive number (got: -5)',
      'ui.redrawIntervalMs must be zero or a positive number (got: -1)',
      'transcript.delimiter must be a single line',
    ])
  })

  it('warns about SIGKILL and an empty candidate list', () => {
    const res = validateReplumbConfig({
      ...defaultConfig,
      shell: { candidates: [] },
      execution: { killSignal: 'SIGKILL' },
    })

    expect(res.valid).toBe(true)
    expect(res.warnings).toEqual([
      'shell.candidates is empty; only shell.path or SHELL can provide an interpreter',
      'execution.killSignal is SIGKILL; runs get no chance to clean up',
    ])
  })
})

describe('mergeConfig', () => {
  it('merges nested sections over the base', () => {
    const merged = mergeConfig(defaultConfig, {
      defaultCommand: 'sort',
      ui: { prompt: '> ' },
      logging: { prefixes: { error: 'ERR' } },
    })

    expect(merged.defaultCommand).toBe('sort')
    expect(merged.ui).toEqual({ prompt: '> ', placeholder: 'cat', redrawIntervalMs: 16, countMode: 'lines' })
    expect(merged.logging?.prefixes).toEqual({ debug: 'DEBUG', info: 'INFO', warn: 'WARN', error: 'ERR' })
    expect(merged.execution).toEqual(defaultConfig.execution)
  })

  it('does not mutate the base', () => {
    mergeConfig(defaultConfig, { shell: { path: '/bin/zsh' } })
    expect(defaultConfig.shell?.path).toBeUndefined()
  })
})

describe('loadReplumbConfig', () => {
  const saved = process.env.REPLUMB_CONFIG

  beforeEach(() => {
    delete process.env.REPLUMB_CONFIG
    vi.mocked(loadConfig).mockReset()
  })

  afterEach(() => {
    if (saved === undefined)
      delete process.env.REPLUMB_CONFIG
    else
      process.env.REPLUMB_CONFIG = saved
  })

  it('searches with bunfig and merges the result over the defaults', async () => {
    vi.mocked(loadConfig).mockResolvedValue({
      verbose: true,
      execution: { killGraceMs: 250 },
    })

    const cfg = await loadReplumbConfig()
    expect(loadConfig).toHaveBeenCalledWith({ name: 'replumb', defaultConfig })
    expect(cfg.verbose).toBe(true)
    expect(cfg.execution).toEqual({ killSignal: 'SIGTERM', killGraceMs: 250, chunkSize: 4096 })
    expect(cfg.ui?.prompt).toBe('-->| ')
  })
})
