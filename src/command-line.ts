import { InputUnavailableError } from './errors'

// Options replumb reads itself. The first argument outside this set starts
// the pipeline, whatever dashes it carries.
const SWITCHES = new Set(['--verbose', '--once', '--help', '-h', '--version', '-v'])
const VALUED = new Set(['--config', '--shell'])

export interface CommandLine {
  /** The runtime, the script and replumb's own options, for the option parser. */
  argv: string[]
  /** Pre-filled pipeline: the remaining arguments joined with spaces. */
  command: string
}

/**
 * Split `process.argv` into replumb's options and the pipeline command, so
 * `replumb sort -r` pre-fills `sort -r` instead of rejecting `-r`. A `--`
 * ends replumb's options explicitly.
 */
export function splitCommandLine(argv: string[]): CommandLine {
  const head = argv.slice(0, 2)
  let i = 2

  while (i < argv.length) {
    const arg = argv[i]
    if (arg === '--')
      return { argv: head, command: argv.slice(i + 1).join(' ') }

    if (SWITCHES.has(arg) || VALUED.has(arg.split('=')[0])) {
      head.push(arg)
      if (VALUED.has(arg) && i + 1 < argv.length) {
        head.push(argv[i + 1])
        i++
      }
      i++
      continue
    }

    // The version subcommand only counts where the pipeline would start
    if (arg === 'version' && i + 1 === argv.length)
      return { argv: [...head, arg], command: '' }

    return { argv: head, command: argv.slice(i).join(' ') }
  }

  return { argv: head, command: '' }
}

/**
 * Standard input carries the data; refuse to start when it is a terminal.
 */
export function assertPipedInput(stdin: { isTTY?: boolean }): void {
  if (stdin.isTTY)
    throw new InputUnavailableError()
}
