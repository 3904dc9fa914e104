import { accessSync, constants, statSync } from 'node:fs'
import { delimiter, isAbsolute, join } from 'node:path'
import process from 'node:process'
import { ShellNotFoundError } from '../errors'

export interface ShellResolveOptions {
  /** Explicit interpreter; wins over everything else. */
  path?: string
  /** Shell names probed on PATH, in order. */
  candidates?: string[]
  env?: NodeJS.ProcessEnv
}

export const DEFAULT_SHELL_CANDIDATES = ['bash', 'sh']

function isExecutableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile())
      return false
    accessSync(path, constants.X_OK)
    return true
  }
  catch {
    return false
  }
}

/**
 * Find `name` on the given PATH string. Absolute names are checked as-is.
 */
export function findOnPath(name: string, pathStr: string): string | undefined {
  if (isAbsolute(name))
    return isExecutableFile(name) ? name : undefined

  for (const dir of pathStr.split(delimiter)) {
    if (!dir)
      continue
    const candidate = join(dir, name)
    if (isExecutableFile(candidate))
      return candidate
  }
  return undefined
}

/**
 * Resolve the interpreter used to run commands.
 *
 * Order: explicit path, then `SHELL` when non-empty, then the first candidate
 * found on PATH.
 */
export function resolveShell(options: ShellResolveOptions = {}): string {
  const env = options.env ?? process.env
  const candidates = options.candidates ?? DEFAULT_SHELL_CANDIDATES

  if (options.path)
    return options.path

  const fromEnv = env.SHELL
  if (fromEnv)
    return fromEnv

  const pathStr = env.PATH ?? ''
  for (const name of candidates) {
    const found = findOnPath(name, pathStr)
    if (found)
      return found
  }

  throw new ShellNotFoundError(candidates)
}
