#!/usr/bin/env tsx
import type { ReplumbConfig } from '../src/types'
import { readFileSync } from 'node:fs'
import process from 'node:process'
import { CAC } from 'cac'
import { CaptureTee } from '../src/capture/capture-tee'
import { assertPipedInput, splitCommandLine } from '../src/command-line'
import { loadReplumbConfig, validateReplumbConfig } from '../src/config'
import { ConfigError, ReplumbError } from '../src/errors'
import { LineEditor } from '../src/input/line-editor'
import { HeldOutput, Logger, logger } from '../src/logger'
import { RunCoordinator } from '../src/run/run-coordinator'
import { runOnce } from '../src/run/run-once'
import { formatTranscript } from '../src/run/transcript'
import { Session } from '../src/session'
import { ProcessSupervisor } from '../src/supervisor/process-supervisor'
import { openControllingTerminal } from '../src/ui/terminal'
import { TerminalView } from '../src/ui/terminal-view'

// Skip CLI execution during tests to prevent hanging
if (process.env.NODE_ENV === 'test' || process.env.VITEST) {
  process.exit(0)
}

const cli = new CAC('replumb')

interface CliOptions {
  'verbose'?: boolean
  'config'?: string
  'shell'?: string
  'once'?: boolean
}

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'))
  if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string')
    return pkg.version
  return '0.0.0'
}

function createSupervisor(cfg: ReplumbConfig, shell: string | undefined, log: Logger): ProcessSupervisor {
  const supervisor = new ProcessSupervisor({
    shell: shell ?? cfg.shell?.path,
    candidates: cfg.shell?.candidates,
    flag: cfg.shell?.flag,
    killSignal: cfg.execution?.killSignal,
    killGraceMs: cfg.execution?.killGraceMs,
    log: log.withScope('supervisor'),
  })
  // Resolve now so a missing shell fails before the terminal is taken over
  log.debug(`using shell ${supervisor.shell}`)
  return supervisor
}

async function printOnce(cfg: ReplumbConfig, command: string, tee: CaptureTee, supervisor: ProcessSupervisor, log: Logger): Promise<void> {
  const { output, errors } = await runOnce(command, {
    tee,
    supervisor,
    defaultCommand: cfg.defaultCommand,
    chunkSize: cfg.execution?.chunkSize,
    log: log.withScope('run'),
  })
  for (const message of errors)
    log.error(message)
  if (errors.length > 0)
    process.exitCode = 1
  process.stdout.write(output)
}

async function runInteractive(cfg: ReplumbConfig, command: string, tee: CaptureTee, supervisor: ProcessSupervisor, log: Logger, logOutput: HeldOutput): Promise<void> {
  const terminal = openControllingTerminal()
  const editor = new LineEditor(command)
  const view = new TerminalView(terminal.output, editor, cfg.ui)
  const coordinator = new RunCoordinator({
    tee,
    supervisor,
    sink: view,
    defaultCommand: cfg.defaultCommand,
    chunkSize: cfg.execution?.chunkSize,
    log: log.withScope('run'),
  })
  const session = new Session({ coordinator, editor, view, input: terminal.input, log: log.withScope('session') })

  const onResize = (): void => view.render()
  const onSignal = (): void => session.quit()
  terminal.output.on('resize', onResize)
  process.on('SIGTERM', onSignal)
  process.on('SIGHUP', onSignal)
  // Log lines wait until the screen is handed back
  logOutput.hold()

  try {
    const transcript = await session.run()
    if (cfg.transcript?.enabled !== false)
      process.stdout.write(formatTranscript(transcript, { delimiter: cfg.transcript?.delimiter }))
  }
  finally {
    process.off('SIGTERM', onSignal)
    process.off('SIGHUP', onSignal)
    terminal.output.off('resize', onResize)
    terminal.close()
    logOutput.release()
  }
}

// Everything after replumb's own options is the pipeline, dashes included
const commandLine = splitCommandLine(process.argv)

// Default command - edit a pipeline over standard input
cli
  .command('[...command]', 'Edit a shell pipeline and watch it run over standard input', {
    ignoreOptionDefaultValue: true,
  })
  .option('--verbose', 'Enable verbose logging')
  .option('--config <config>', 'Path to config file')
  .option('--shell <shell>', 'Shell used to run the pipeline')
  .option('--once', 'Run the command once without the editor and print its output')
  .example('cat access.log | replumb')
  .example('cat access.log | replumb grep -v health')
  .example('cat access.log | replumb --once -- sort -r')
  .action(async (_command: string[], options: CliOptions) => {
    let log = logger
    if (options.verbose)
      log.setVerbose(true)
    try {
      const cfg = await loadReplumbConfig({ path: options.config })
      const logOutput = new HeldOutput()
      log = new Logger(options.verbose ?? cfg.verbose, undefined, { logging: cfg.logging, output: logOutput })

      const { valid, errors, warnings } = validateReplumbConfig(cfg)
      for (const warning of warnings)
        log.warn(warning)
      if (!valid)
        throw new ConfigError(errors)

      assertPipedInput(process.stdin)

      const supervisor = createSupervisor(cfg, options.shell, log)
      const tee = new CaptureTee(process.stdin, log.withScope('capture'))
      tee.start()

      if (options.once)
        await printOnce(cfg, commandLine.command, tee, supervisor, log)
      else
        await runInteractive(cfg, commandLine.command, tee, supervisor, log, logOutput)

      // The pump may still be reading a live producer
      process.stdin.destroy()
    }
    catch (error) {
      if (error instanceof ReplumbError)
        log.error(error.message)
      else
        log.error('unexpected error:', error)
      process.exit(1)
    }
  })

cli
  .command('version', 'Show the version of replumb')
  .action(() => {
    console.log(readVersion())
  })

cli.version(readVersion())
cli.help()
cli.parse(commandLine.argv)
