/**
 * Trace Runner
 *
 * Replays a parsed trace against a fresh simulator, strictly in trace order,
 * and records what each line did to the table.
 *
 * @module trace/TraceRunner
 */

import type { TableSnapshot } from '../types/block.js'
import type {
  MalformedEntry,
  RequestEntry,
  RequestOutcome,
  SimulationReport
} from '../types/simulation.js'
import type { SimulatorConfig } from '../config/simulator-config.js'
import { MemorySimulator } from '../simulator/MemorySimulator.js'
import { parseTrace, type ParsedTrace } from './TraceParser.js'
import { traceLogger } from '../utils/logger.js'

const logger = traceLogger()

export type SimulationStep =
  | {
      kind: 'request'
      entry: RequestEntry
      outcome: RequestOutcome
      /** Table after the request was applied */
      snapshot: TableSnapshot
    }
  | {
      kind: 'malformed'
      entry: MalformedEntry
    }

export interface SimulationRun {
  capacity: number
  steps: SimulationStep[]
  report: SimulationReport
}

/**
 * Hooks for drivers that want to observe a run as it happens
 */
export interface TraceRunHooks {
  onStep?: (step: SimulationStep, index: number) => void
}

/**
 * Applies every entry of an already parsed trace exactly once
 */
export function runParsedTrace(
  trace: ParsedTrace,
  config: SimulatorConfig = {},
  hooks: TraceRunHooks = {}
): SimulationRun {
  const simulator = new MemorySimulator(trace.capacity, config)
  const steps: SimulationStep[] = []

  for (const entry of trace.entries) {
    const step: SimulationStep =
      entry.kind === 'malformed'
        ? { kind: 'malformed', entry }
        : {
            kind: 'request',
            entry,
            outcome: simulator.apply(entry.request),
            snapshot: simulator.render()
          }

    if (step.kind === 'malformed') {
      logger('line %d skipped: %s', entry.lineNumber, step.entry.error.message)
    }

    steps.push(step)
    hooks.onStep?.(step, steps.length - 1)
  }

  return { capacity: trace.capacity, steps, report: simulator.report() }
}

/**
 * Parses and replays trace text
 *
 * @throws InvalidCapacityError before any request runs when the capacity line is bad
 * @throws TableInvariantViolationError if the engine corrupts its table
 */
export function runTrace(
  text: string,
  config: SimulatorConfig = {},
  hooks: TraceRunHooks = {}
): SimulationRun {
  return runParsedTrace(parseTrace(text, config), config, hooks)
}
