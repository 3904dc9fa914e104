import { openSync } from 'node:fs'
import { ReadStream, WriteStream } from 'node:tty'
import { describeError, InputUnavailableError } from '../errors'

export interface ControllingTerminal {
  input: ReadStream
  output: WriteStream
  close: () => void
}

/**
 * Open /dev/tty for keys and drawing. Standard input carries the data and
 * standard output receives the transcript, so neither can be used for the UI.
 */
export function openControllingTerminal(device = '/dev/tty'): ControllingTerminal {
  let input: ReadStream
  let output: WriteStream
  try {
    input = new ReadStream(openSync(device, 'r'))
    output = new WriteStream(openSync(device, 'w'))
  }
  catch (error) {
    throw new InputUnavailableError(`cannot open ${device} for keyboard input: ${describeError(error)}`)
  }

  return {
    input,
    output,
    close: () => {
      input.destroy()
      output.end()
    },
  }
}
