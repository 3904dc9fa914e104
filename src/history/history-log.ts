// An append-only list of submitted commands with a clamped navigation cursor.
// No TTY or rendering concerns. Entries are never removed.
export class HistoryLog {
  private history: string[]
  private index: number // history.length means "just past the newest entry"

  constructor(history: string[] = []) {
    this.history = history.slice()
    this.index = this.history.length
  }

  get length(): number {
    return this.history.length
  }

  get cursor(): number {
    return this.index
  }

  // Adds to the end and parks the cursor just past the new entry
  append(command: string): void {
    this.history.push(command)
    this.index = this.history.length
  }

  at(position: number): string | undefined {
    return this.history[position]
  }

  last(): string | undefined {
    return this.history[this.history.length - 1]
  }

  entries(): string[] {
    return this.history.slice()
  }

  // Move to the previous (older) entry, stopping at the first one
  prev(): string | undefined {
    if (this.history.length === 0)
      return undefined
    this.index = Math.max(0, Math.min(this.index, this.history.length) - 1)
    return this.history[this.index]
  }

  // Move to the next (newer) entry, stopping at the last one
  next(): string | undefined {
    if (this.history.length === 0)
      return undefined
    this.index = Math.min(this.history.length - 1, this.index + 1)
    return this.history[this.index]
  }

  // True while the cursor sits on an entry rather than past the end
  isBrowsing(): boolean {
    return this.index < this.history.length
  }
}
