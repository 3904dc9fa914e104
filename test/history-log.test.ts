import { describe, expect, it } from 'vitest'
import { HistoryLog } from '../src/history/history-log'

describe('HistoryLog - navigation', () => {
  it('walks back to the oldest entry and clamps there', () => {
    const log = new HistoryLog(['a', 'b', 'c'])

    expect(log.isBrowsing()).toBe(false)
    expect(log.prev()).toBe('c')
    expect(log.isBrowsing()).toBe(true)
    expect(log.prev()).toBe('b')
    expect(log.prev()).toBe('a')
    // boundary: further prev stays on the oldest
    expect(log.prev()).toBe('a')
    expect(log.cursor).toBe(0)
  })

  it('walks forward to the newest entry and clamps there', () => {
    const log = new HistoryLog(['a', 'b', 'c'])
    log.prev()
    log.prev()
    log.prev()

    expect(log.next()).toBe('b')
    expect(log.next()).toBe('c')
    // boundary: further next stays on the newest
    expect(log.next()).toBe('c')
    expect(log.cursor).toBe(2)
  })

  it('returns undefined when empty', () => {
    const log = new HistoryLog()
    expect(log.prev()).toBeUndefined()
    expect(log.next()).toBeUndefined()
    expect(log.last()).toBeUndefined()
  })

  it('keeps duplicates', () => {
    const log = new HistoryLog()
    log.append('sort')
    log.append('sort')

    expect(log.entries()).toEqual(['sort', 'sort'])
    expect(log.prev()).toBe('sort')
    expect(log.prev()).toBe('sort')
    expect(log.cursor).toBe(0)
  })
})

describe('HistoryLog - appending', () => {
  it('parks the cursor past the new entry', () => {
    const log = new HistoryLog(['a', 'b'])
    log.prev()
    log.prev()
    log.append('c')

    expect(log.cursor).toBe(3)
    expect(log.isBrowsing()).toBe(false)
    expect(log.prev()).toBe('c')
  })

  it('does not share the initial array', () => {
    const initial = ['a']
    const log = new HistoryLog(initial)
    log.append('b')

    expect(initial).toEqual(['a'])
    expect(log.length).toBe(2)
    expect(log.at(1)).toBe('b')
    expect(log.last()).toBe('b')
  })
})
