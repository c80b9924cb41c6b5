/**
 * JSON Lines (JSONL) Formatter
 *
 * Formats a run as newline-delimited JSON for machine consumption. Each line
 * is a complete object: one `start` event, one `step` event per trace line,
 * one `report` event.
 *
 * @module formatters/JsonLineFormatter
 */

import type { BlockView } from '../types/block.js'
import type { SimulationReport } from '../types/simulation.js'
import type { SimulationStep } from '../trace/TraceRunner.js'
import type { SimulationError } from '../errors/errors.js'
import { BaseRunFormatter } from './RunFormatter.js'

interface JsonBlock {
  start: number
  size: number
  owner: string | null
}

interface JsonError {
  code: string
  message: string
}

/**
 * JSONL event envelope structure
 */
export type JsonLineEvent =
  | { event: 'start'; capacity: number }
  | {
      event: 'step'
      line: number
      text: string
      success: boolean
      action?: 'allocate' | 'free'
      name?: string
      size?: number
      /** Start address of the allocated or released block */
      start?: number
      error?: JsonError
      blocks?: JsonBlock[]
    }
  | ({ event: 'report'; externalFragmentationPercent: string } & SimulationReport)

type StepEvent = Extract<JsonLineEvent, { event: 'step' }>

const toJsonBlock = (block: BlockView): JsonBlock => ({
  start: block.start,
  size: block.size,
  owner: block.owner
})

const toJsonError = (error: SimulationError): JsonError => ({
  code: error.code,
  message: error.message
})

export class JsonLineFormatter extends BaseRunFormatter {
  formatStart(capacity: number): string[] {
    return [this.line({ event: 'start', capacity })]
  }

  formatStep(step: SimulationStep): string[] {
    const { lineNumber: line, text } = step.entry

    if (step.kind === 'malformed') {
      return [
        this.line({ event: 'step', line, text, success: false, error: toJsonError(step.entry.error) })
      ]
    }

    const { outcome } = step
    const event: StepEvent = {
      event: 'step',
      line,
      text,
      success: outcome.success,
      action: outcome.kind,
      name: outcome.request.name
    }

    if (outcome.kind === 'allocate') {
      event.size = outcome.request.size
      if (outcome.success) event.start = outcome.start
      else event.error = toJsonError(outcome.error)
    } else if (outcome.success) {
      event.start = outcome.released.start
      event.size = outcome.released.size
    } else {
      event.error = toJsonError(outcome.error)
    }

    if (this.config.renderAfterEachRequest) {
      event.blocks = step.snapshot.blocks.map(toJsonBlock)
    }

    return [this.line(event)]
  }

  formatReport(report: SimulationReport): string[] {
    return [
      this.line({
        event: 'report',
        ...report,
        externalFragmentationPercent: this.formatPercent(report.externalFragmentation)
      })
    ]
  }

  private line(event: JsonLineEvent): string {
    return JSON.stringify(event)
  }
}
