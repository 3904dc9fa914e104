import { describe, expect, it } from 'vitest'
import { displayWidth, sanitizeLine, stripAnsi, truncateToWidth } from '../src/input/ansi'

describe('ansi helpers', () => {
  it('strips color and title sequences', () => {
    expect(stripAnsi('\u001B[1;31mred\u001B[0m \u001B]0;title\u0007ok')).toBe('red ok')
  })

  it('measures wide and combining characters', () => {
    expect(displayWidth('abc')).toBe(3)
    expect(displayWidth('日本')).toBe(4)
    expect(displayWidth('é')).toBe(1)
    expect(displayWidth('\u001B[32mok\u001B[0m')).toBe(2)
  })

  it('never splits a wide character at the edge', () => {
    expect(truncateToWidth('a日b', 2)).toBe('a')
    expect(truncateToWidth('a日b', 3)).toBe('a日')
    expect(truncateToWidth('abc', 0)).toBe('')
  })

  it('expands tabs and drops control characters', () => {
    expect(sanitizeLine('ab\tc')).toBe('ab      c')
    expect(sanitizeLine('x\ry\u0007')).toBe('xy')
  })
})
