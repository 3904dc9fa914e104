import type { ReplumbConfig } from './src/types'

/**
 * Replumb Configuration
 *
 * Picked up from the working directory, or passed with `--config`.
 */
export default {
  verbose: false,

  // Runs when the command line is submitted empty
  defaultCommand: 'cat',

  shell: {
    // path: '/bin/zsh',
    candidates: ['bash', 'sh'],
    flag: '-c',
  },

  execution: {
    killSignal: 'SIGTERM',
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
    timestamps: false,
  },
} satisfies ReplumbConfig
