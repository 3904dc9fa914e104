import type { EditAction } from './line-editor'

/** Shape of the key object emitted by readline's 'keypress' event. */
export interface Keypress {
  name?: string
  sequence?: string
  ctrl?: boolean
  meta?: boolean
  shift?: boolean
}

export type KeyAction =
  | { type: 'submit' }
  | { type: 'quit' }
  | { type: 'history', direction: 'prev' | 'next' }
  | { type: 'edit', action: EditAction }
  | { type: 'redraw' }
  | { type: 'ignore' }

const CTRL_KEYS: Record<string, KeyAction> = {
  c: { type: 'quit' },
  l: { type: 'redraw' },
  p: { type: 'history', direction: 'prev' },
  n: { type: 'history', direction: 'next' },
  // Ctrl+D deletes forward rather than signalling EOF: stdin is the data stream
  d: { type: 'edit', action: { type: 'delete' } },
  f: { type: 'edit', action: { type: 'right' } },
  b: { type: 'edit', action: { type: 'left' } },
  a: { type: 'edit', action: { type: 'home' } },
  e: { type: 'edit', action: { type: 'end' } },
  k: { type: 'edit', action: { type: 'kill-to-end' } },
  u: { type: 'edit', action: { type: 'kill-to-start' } },
  w: { type: 'edit', action: { type: 'delete-word-left' } },
  h: { type: 'edit', action: { type: 'backspace' } },
}

const META_KEYS: Record<string, KeyAction> = {
  b: { type: 'edit', action: { type: 'word-left' } },
  f: { type: 'edit', action: { type: 'word-right' } },
  backspace: { type: 'edit', action: { type: 'delete-word-left' } },
}

const PLAIN_KEYS: Record<string, KeyAction> = {
  return: { type: 'submit' },
  enter: { type: 'submit' },
  up: { type: 'history', direction: 'prev' },
  down: { type: 'history', direction: 'next' },
  left: { type: 'edit', action: { type: 'left' } },
  right: { type: 'edit', action: { type: 'right' } },
  home: { type: 'edit', action: { type: 'home' } },
  end: { type: 'edit', action: { type: 'end' } },
  backspace: { type: 'edit', action: { type: 'backspace' } },
  delete: { type: 'edit', action: { type: 'delete' } },
}

/**
 * Map one keypress to what the session should do with it.
 */
export function resolveKey(str: string | undefined, key: Keypress | undefined): KeyAction {
  const name = key?.name
  if (key?.ctrl && name)
    return CTRL_KEYS[name] ?? { type: 'ignore' }
  if (key?.meta && name)
    return META_KEYS[name] ?? { type: 'ignore' }
  if (name && Object.hasOwn(PLAIN_KEYS, name))
    return PLAIN_KEYS[name]

  // Regular character input, including characters readline does not name
  if (str && !key?.ctrl && !key?.meta && !str.startsWith('\u001B') && !/[\x00-\x1F\x7F]/.test(str))
    return { type: 'edit', action: { type: 'insert', text: str } }

  return { type: 'ignore' }
}
