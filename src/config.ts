import type { ReplumbConfig } from './types'
import { homedir } from 'node:os'
import { resolve } from 'node:path'
import process from 'node:process'
import { pathToFileURL } from 'node:url'
import { loadConfig } from 'bunfig'

export const defaultConfig: ReplumbConfig = {
  verbose: false,
  defaultCommand: 'cat',
  shell: {
    // Probed in order on PATH when neither shell.path nor SHELL is set
    candidates: ['bash', 'sh'],
    flag: '-c',
  },
  execution: {
    killSignal: 'SIGTERM',
    // Grace period before SIGKILL
    killGraceMs: 100,
    chunkSize: 4096,
  },
  ui: {
    prompt: '-->| ',
    placeholder: 'cat',
    redrawIntervalMs: 16,
    countMode: 'lines',
  },
  transcript: {
    enabled: true,
    delimiter: '',
  },
  logging: {
    prefixes: {
      debug: 'DEBUG',
      info: 'INFO',
      warn: 'WARN',
      error: 'ERROR',
    },
    timestamps: false,
  },
}

/**
 * Merge a partial user config over a base, one level deep for the nested sections.
 */
export function mergeConfig(base: ReplumbConfig, override: Partial<ReplumbConfig> = {}): ReplumbConfig {
  return {
    ...base,
    ...override,
    shell: { ...base.shell, ...override.shell },
    execution: { ...base.execution, ...override.execution },
    ui: { ...base.ui, ...override.ui },
    transcript: { ...base.transcript, ...override.transcript },
    logging: {
      ...base.logging,
      ...override.logging,
      prefixes: { ...base.logging?.prefixes, ...override.logging?.prefixes },
    },
  }
}

// Loads the config fresh from disk on every call.
// Options:
// - path: config file to import instead of searching (REPLUMB_CONFIG otherwise)
export async function loadReplumbConfig(options?: { path?: string }): Promise<ReplumbConfig> {
  // 1) Explicit path wins
  const explicitPath = options?.path || process.env.REPLUMB_CONFIG
  if (explicitPath) {
    const mod: unknown = await import(pathToFileURL(resolvePath(explicitPath)).href)
    return mergeConfig(defaultConfig, pickConfig(mod))
  }

  // 2) bunfig search (current dir up, then user config locations)
  const loaded = await loadConfig<ReplumbConfig>({
    name: 'replumb',
    defaultConfig,
  })
  return mergeConfig(defaultConfig, loaded)
}

function pickConfig(mod: unknown): Partial<ReplumbConfig> {
  if (mod && typeof mod === 'object') {
    const value = 'default' in mod ? mod.default : mod
    if (value && typeof value === 'object')
      return value
  }
  return {}
}

function resolvePath(p: string): string {
  // Support tilde expansion and relative paths
  if (p.startsWith('~')) {
    return resolve(homedir(), p.slice(1).replace(/^\//, ''))
  }
  return resolve(p)
}

const SIGNAL_NAME = /^SIG[A-Z0-9]+$/

function isPositive(value: unknown): boolean {
  return typeof value === 'number' && Number.isFinite(value) && value > 0
}

// Validate a loaded config and return errors/warnings without throwing.
export function validateReplumbConfig(cfg: ReplumbConfig): { valid: boolean, errors: string[], warnings: string[] } {
  const errors: string[] = []
  const warnings: string[] = []

  if (typeof cfg.verbose !== 'boolean') {
    errors.push(`verbose must be a boolean (got: ${String(cfg.verbose)})`)
  }

  if (cfg.defaultCommand != null && (typeof cfg.defaultCommand !== 'string' || !cfg.defaultCommand.trim())) {
    errors.push('defaultCommand must be a non-empty string')
  }

  const shell = cfg.shell
  if (shell) {
    if (shell.candidates != null && (!Array.isArray(shell.candidates) || shell.candidates.some(c => typeof c !== 'string' || !c))) {
      errors.push('shell.candidates must be an array of shell names')
    }
    else if (shell.candidates?.length === 0 && !shell.path) {
      warnings.push('shell.candidates is empty; only shell.path or SHELL can provide an interpreter')
    }
    if (shell.path != null && typeof shell.path !== 'string') {
      errors.push('shell.path must be a string')
    }
  }

  const exec = cfg.execution
  if (exec) {
    if (exec.chunkSize != null && !isPositive(exec.chunkSize)) {
      errors.push(`execution.chunkSize must be a positive number (got: ${exec.chunkSize})`)
    }
    if (exec.killGraceMs != null && (typeof exec.killGraceMs !== 'number' || exec.killGraceMs < 0)) {
      errors.push(`execution.killGraceMs must be zero or a positive number (got: ${exec.killGraceMs})`)
    }
    if (exec.killSignal != null && !SIGNAL_NAME.test(exec.killSignal)) {
      errors.push(`execution.killSignal must be a signal name like SIGTERM (got: ${exec.killSignal})`)
    }
    if (exec.killSignal === 'SIGKILL') {
      warnings.push('execution.killSignal is SIGKILL; runs get no chance to clean up')
    }
  }

  const ui = cfg.ui
  if (ui) {
    if (ui.redrawIntervalMs != null && (typeof ui.redrawIntervalMs !== 'number' || ui.redrawIntervalMs < 0)) {
      errors.push(`ui.redrawIntervalMs must be zero or a positive number (got: ${ui.redrawIntervalMs})`)
    }
    if (ui.countMode != null && ui.countMode !== 'lines' && ui.countMode !== 'bytes') {
      errors.push(`ui.countMode must be one of lines, bytes (got: ${String(ui.countMode)})`)
    }
  }

  if (cfg.transcript?.delimiter != null && cfg.transcript.delimiter.includes('\n')) {
    errors.push('transcript.delimiter must be a single line')
  }

  return { valid: errors.length === 0, errors, warnings }
}
