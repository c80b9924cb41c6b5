/**
 * Run Formatter Base
 *
 * Defines the contract for formatters that turn a simulation run into
 * output lines: a header, one chunk per trace step, and the final report.
 * Drivers may call the per-part methods while a run is in progress or
 * `format` once it has finished.
 *
 * @module formatters/RunFormatter
 */

import type { SimulationReport } from '../types/simulation.js'
import type { SimulationRun, SimulationStep } from '../trace/TraceRunner.js'
import type { SimulatorConfig } from '../config/simulator-config.js'

/**
 * Formatter configuration options
 */
export type FormatterConfig = Pick<SimulatorConfig, 'fragmentationDigits' | 'renderAfterEachRequest'>

/**
 * Default formatter configuration
 */
export const DEFAULT_FORMATTER_CONFIG: Required<FormatterConfig> = {
  fragmentationDigits: 2,
  renderAfterEachRequest: true
}

export interface RunFormatter {
  /** Lines emitted before the first request */
  formatStart(capacity: number): string[]
  /** Lines emitted for one trace step */
  formatStep(step: SimulationStep): string[]
  /** Lines emitted after the last request */
  formatReport(report: SimulationReport): string[]
  /** Whole run as newline-terminated text */
  format(run: SimulationRun): string
  getConfig(): Required<FormatterConfig>
}

/**
 * Base formatter class providing common functionality
 *
 * Concrete formatters implement the three per-part methods.
 */
export abstract class BaseRunFormatter implements RunFormatter {
  protected config: Required<FormatterConfig>

  constructor(config: FormatterConfig = {}) {
    this.config = {
      fragmentationDigits: config.fragmentationDigits ?? DEFAULT_FORMATTER_CONFIG.fragmentationDigits,
      renderAfterEachRequest:
        config.renderAfterEachRequest ?? DEFAULT_FORMATTER_CONFIG.renderAfterEachRequest
    }
  }

  abstract formatStart(capacity: number): string[]
  abstract formatStep(step: SimulationStep): string[]
  abstract formatReport(report: SimulationReport): string[]

  format(run: SimulationRun): string {
    const lines = [
      ...this.formatStart(run.capacity),
      ...run.steps.flatMap((step) => this.formatStep(step)),
      ...this.formatReport(run.report)
    ]
    return lines.map((line) => `${line}\n`).join('')
  }

  getConfig(): Required<FormatterConfig> {
    return { ...this.config }
  }

  /**
   * Fragmentation percentage rounded for display, without the % sign
   */
  protected formatPercent(value: number): string {
    return value.toFixed(this.config.fragmentationDigits)
  }
}
