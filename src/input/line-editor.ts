export type EditAction =
  | { type: 'insert', text: string }
  | { type: 'backspace' }
  | { type: 'delete' }
  | { type: 'left' }
  | { type: 'right' }
  | { type: 'home' }
  | { type: 'end' }
  | { type: 'word-left' }
  | { type: 'word-right' }
  | { type: 'kill-to-end' }
  | { type: 'kill-to-start' }
  | { type: 'delete-word-left' }

/**
 * Single-line edit buffer for the command being composed.
 */
export class LineEditor {
  private input = ''
  private cursor = 0

  constructor(text = '') {
    this.setText(text)
  }

  get text(): string {
    return this.input
  }

  get cursorPosition(): number {
    return this.cursor
  }

  // Replaces the buffer and moves the cursor to the end
  setText(text: string): void {
    this.input = text.replace(/[\r\n]+/g, ' ')
    this.cursor = this.input.length
  }

  /**
   * Apply an edit. Returns true when the text or cursor changed.
   */
  apply(action: EditAction): boolean {
    const before = `${this.cursor}:${this.input}`
    switch (action.type) {
      case 'insert':
        this.insert(action.text)
        break
      case 'backspace':
        if (this.cursor > 0) {
          this.input = this.input.slice(0, this.cursor - 1) + this.input.slice(this.cursor)
          this.cursor--
        }
        break
      case 'delete':
        if (this.cursor < this.input.length)
          this.input = this.input.slice(0, this.cursor) + this.input.slice(this.cursor + 1)
        break
      case 'left':
        if (this.cursor > 0)
          this.cursor--
        break
      case 'right':
        if (this.cursor < this.input.length)
          this.cursor++
        break
      case 'home':
        this.cursor = 0
        break
      case 'end':
        this.cursor = this.input.length
        break
      case 'word-left':
        this.cursor = this.wordStartBefore(this.cursor)
        break
      case 'word-right':
        this.cursor = this.wordEndAfter(this.cursor)
        break
      case 'kill-to-end':
        this.input = this.input.slice(0, this.cursor)
        break
      case 'kill-to-start':
        this.input = this.input.slice(this.cursor)
        this.cursor = 0
        break
      case 'delete-word-left': {
        const start = this.wordStartBefore(this.cursor)
        this.input = this.input.slice(0, start) + this.input.slice(this.cursor)
        this.cursor = start
        break
      }
    }
    return before !== `${this.cursor}:${this.input}`
  }

  private insert(text: string): void {
    const clean = text.replace(/[\r\n]+/g, ' ')
    this.input = this.input.slice(0, this.cursor) + clean + this.input.slice(this.cursor)
    this.cursor += clean.length
  }

  private wordStartBefore(from: number): number {
    let pos = from
    // Skip spaces to previous non-space, then over word characters
    while (pos > 0 && this.input[pos - 1] === ' ') pos--
    const afterSpaces = pos
    while (pos > 0 && this.isWordChar(this.input[pos - 1])) pos--
    // Lone punctuation such as '|' counts as a word of its own
    if (pos === afterSpaces && pos > 0)
      pos--
    return pos
  }

  private wordEndAfter(from: number): number {
    let pos = from
    const input = this.input
    while (pos < input.length && input[pos] === ' ') pos++
    // If at delimiters (non-space, non-word), skip them (e.g., '--')
    while (pos < input.length && input[pos] !== ' ' && !this.isWordChar(input[pos])) pos++
    while (pos < input.length && this.isWordChar(input[pos])) pos++
    return pos
  }

  private isWordChar(ch: string): boolean {
    return /\w/.test(ch)
  }
}
