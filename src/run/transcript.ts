import type { Transcript } from '../types'

export interface TranscriptFormatOptions {
  /** Line placed between the output and the command. Blank by default. */
  delimiter?: string
  program?: string
}

/**
 * Text written to stdout on quit: the last run's output, the delimiter line,
 * then `<program>: <command>`.
 */
export function formatTranscript(transcript: Transcript, options: TranscriptFormatOptions = {}): string {
  const delimiter = options.delimiter ?? ''
  const program = options.program ?? 'replumb'
  let text = transcript.output
  if (text && !text.endsWith('\n'))
    text += '\n'
  return `${text}${delimiter}\n${program}: ${transcript.command}\n`
}
