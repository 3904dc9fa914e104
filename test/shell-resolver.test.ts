import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { delimiter, join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { ShellNotFoundError } from '../src/errors'
import { findOnPath, resolveShell } from '../src/supervisor/shell-resolver'

describe('shell resolution', () => {
  let binDir: string
  let otherDir: string

  beforeEach(() => {
    binDir = mkdtempSync(join(tmpdir(), 'replumb-bin-'))
    otherDir = mkdtempSync(join(tmpdir(), 'replumb-other-'))
    writeFileSync(join(binDir, 'fakesh'), '#!/bin/sh\n', { mode: 0o755 })
    writeFileSync(join(otherDir, 'plainsh'), 'not executable\n', { mode: 0o644 })
    mkdirSync(join(otherDir, 'dirsh'))
  })

  afterEach(() => {
    rmSync(binDir, { recursive: true, force: true })
    rmSync(otherDir, { recursive: true, force: true })
  })

  describe('findOnPath', () => {
    it('finds an executable in a PATH directory', () => {
      const pathStr = [otherDir, binDir].join(delimiter)
      expect(findOnPath('fakesh', pathStr)).toBe(join(binDir, 'fakesh'))
    })

    it('skips files without execute permission and directories', () => {
      expect(findOnPath('plainsh', otherDir)).toBeUndefined()
      expect(findOnPath('dirsh', otherDir)).toBeUndefined()
    })

    it('checks absolute names directly', () => {
      expect(findOnPath(join(binDir, 'fakesh'), '')).toBe(join(binDir, 'fakesh'))
      expect(findOnPath(join(binDir, 'missing'), binDir)).toBeUndefined()
    })

    it('ignores empty PATH entries', () => {
      const pathStr = ['', binDir].join(delimiter)
      expect(findOnPath('fakesh', pathStr)).toBe(join(binDir, 'fakesh'))
    })
  })

  describe('resolveShell', () => {
    it('prefers an explicit path over SHELL', () => {
      expect(resolveShell({ path: '/opt/custom/sh', env: { SHELL: '/bin/zsh' } })).toBe('/opt/custom/sh')
    })

    it('uses SHELL when it is set', () => {
      expect(resolveShell({ env: { SHELL: '/bin/zsh', PATH: binDir }, candidates: ['fakesh'] })).toBe('/bin/zsh')
    })

    it('falls back to the first candidate found on PATH when SHELL is empty', () => {
      const shell = resolveShell({ env: { SHELL: '', PATH: binDir }, candidates: ['nosuchsh', 'fakesh'] })
      expect(shell).toBe(join(binDir, 'fakesh'))
    })

    it('throws ShellNotFoundError when nothing resolves', () => {
      const resolve = () => resolveShell({ env: { PATH: otherDir }, candidates: ['nosuchsh', 'plainsh'] })
      expect(resolve).toThrow(ShellNotFoundError)
      expect(resolve).toThrow('shell not found (tried SHELL, nosuchsh, plainsh)')
    })
  })
})
