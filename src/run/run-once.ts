import type { RunCoordinatorOptions } from './run-coordinator'
import { BufferedSink } from './buffered-sink'
import { RunCoordinator } from './run-coordinator'

export interface OnceResult {
  output: string
  /** Annotations the run produced instead of (or besides) output. */
  errors: string[]
}

/**
 * Run `command` a single time over the captured input, without a terminal.
 */
export async function runOnce(command: string, options: Omit<RunCoordinatorOptions, 'sink'>): Promise<OnceResult> {
  const sink = new BufferedSink()
  const coordinator = new RunCoordinator({ ...options, sink })
  await coordinator.launch(command)
  await coordinator.waitForActiveRun()
  return { output: sink.text(), errors: sink.errorMessages }
}
