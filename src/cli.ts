/**
 * Command-line driver
 *
 * Reads a trace file, replays it and writes the formatted run to stdout.
 * Exit codes: 0 on success, 1 on a fatal simulation or I/O error, 2 on a
 * usage error.
 *
 * @module cli
 */

import { readFile } from 'node:fs/promises'
import type { OutputFormat } from './config/simulator-config.js'
import { OUTPUT_FORMATS, resolveSimulatorConfig } from './config/simulator-config.js'
import { createFormatter } from './formatters/index.js'
import { runTrace } from './trace/TraceRunner.js'
import { isSimulationError } from './errors/errors.js'
import { cliLogger } from './utils/logger.js'

const logger = cliLogger()

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_USAGE = 2

export interface CliOptions {
  input: string | null
  format: OutputFormat
  verify: boolean
  quiet: boolean
  help: boolean
}

/**
 * Streams and file access the CLI depends on
 */
export interface CliIO {
  stdout: (text: string) => void
  stderr: (text: string) => void
  readFile: (path: string) => Promise<string>
}

export const defaultIO: CliIO = {
  stdout: (text) => {
    process.stdout.write(text)
  },
  stderr: (text) => {
    process.stderr.write(text)
  },
  readFile: (path) => readFile(path, 'utf8')
}

export const USAGE = `Usage: first-fit-lab <trace-file> [options]

Replays a first-fit allocation trace and prints the memory map after every
request followed by fragmentation statistics.

Trace format:
  First meaningful line   total memory (positive integer)
  <name> <size>           allocate, e.g. P1 100
  FREE <name>             free, e.g. FREE P1 (also D, DEALLOC, RELEASE)
  # comment               ignored

Options:
  --format <text|jsonl>   Output format (default: text)
  --no-verify             Skip table invariant checks after each request
  --quiet, -q             Do not print the memory map after each request
  --help, -h              Show this help
`

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CliUsageError'
  }
}

const isOutputFormat = (value: string): value is OutputFormat =>
  OUTPUT_FORMATS.some((format) => format === value)

/**
 * @throws CliUsageError on unknown flags, a missing or invalid --format value,
 * or more than one trace file
 */
export function parseCliArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    input: null,
    format: 'text',
    verify: true,
    quiet: false,
    help: false
  }

  let i = 0
  while (i < args.length) {
    const arg = args[i]

    if (arg === '--help' || arg === '-h') {
      options.help = true
    } else if (arg === '--quiet' || arg === '-q') {
      options.quiet = true
    } else if (arg === '--no-verify') {
      options.verify = false
    } else if (arg === '--format' || arg.startsWith('--format=')) {
      const value = arg === '--format' ? args[++i] : arg.slice('--format='.length)
      if (value === undefined || !isOutputFormat(value)) {
        throw new CliUsageError(`--format expects one of ${OUTPUT_FORMATS.join(', ')}`)
      }
      options.format = value
    } else if (arg === '-') {
      throw new CliUsageError('Reading the trace from stdin is not supported; pass a file path')
    } else if (arg.startsWith('-')) {
      throw new CliUsageError(`Unknown option: ${arg}`)
    } else if (options.input === null) {
      options.input = arg
    } else {
      throw new CliUsageError(`Unexpected argument: ${arg}`)
    }

    i++
  }

  return options
}

/**
 * Runs the CLI and resolves to the process exit code
 */
export async function runCli(args: string[], io: CliIO = defaultIO): Promise<number> {
  let options: CliOptions
  try {
    options = parseCliArgs(args)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    io.stderr(`${message}\n\n${USAGE}`)
    return EXIT_USAGE
  }

  if (options.help) {
    io.stdout(USAGE)
    return EXIT_OK
  }
  if (options.input === null) {
    io.stderr(USAGE)
    return EXIT_USAGE
  }

  const config = resolveSimulatorConfig({
    format: options.format,
    verifyInvariants: options.verify,
    renderAfterEachRequest: !options.quiet
  })
  logger('options %o', options)

  let text: string
  try {
    text = await io.readFile(options.input)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    io.stderr(`Error reading file: ${message}\n`)
    return EXIT_FAILURE
  }

  const formatter = createFormatter(config.format, config)
  try {
    const run = runTrace(text, config)
    io.stdout(formatter.format(run))
    return EXIT_OK
  } catch (error) {
    if (isSimulationError(error)) {
      logger('fatal %s: %s', error.code, error.message)
      io.stderr(`${error.name}: ${error.message}\n`)
      return EXIT_FAILURE
    }
    throw error
  }
}
