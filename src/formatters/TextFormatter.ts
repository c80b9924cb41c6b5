/**
 * Plain text formatter
 *
 * Console output: one action line per request, the memory map after it,
 * and a framed stats block at the end.
 *
 * @module formatters/TextFormatter
 */

import type { BlockView, TableSnapshot } from '../types/block.js'
import type { RequestOutcome, SimulationReport } from '../types/simulation.js'
import type { SimulationStep } from '../trace/TraceRunner.js'
import { BaseRunFormatter } from './RunFormatter.js'

export const formatBlock = (block: BlockView): string =>
  block.free
    ? `[Free  start=${block.start} size=${block.size}]`
    : `[${block.owner} start=${block.start} size=${block.size}]`

export const formatMemoryMap = (snapshot: TableSnapshot): string[] => [
  'Current memory map:',
  ...snapshot.blocks.map((block) => `  ${formatBlock(block)}`),
  ''
]

export const formatOutcome = (outcome: RequestOutcome): string => {
  if (outcome.kind === 'allocate') {
    const { name, size } = outcome.request
    return outcome.success
      ? `ALLOCATE ${name} ${size} -> success (used start=${outcome.start})`
      : `ALLOCATE ${name} ${size} -> FAIL (no single contiguous block big enough)`
  }
  const { name } = outcome.request
  return outcome.success
    ? `DEALLOCATE ${name} -> success (freed start=${outcome.released.start} size=${outcome.released.size})`
    : `DEALLOCATE ${name} -> fail (process not found)`
}

/**
 * @example
 * ```typescript
 * const text = new TextFormatter().format(runTrace('100\nP1 40\n'))
 * // Initialized memory simulator with total=100
 * //
 * // ALLOCATE P1 40 -> success (used start=0)
 * // Current memory map:
 * //   [P1 start=0 size=40]
 * //   [Free  start=40 size=60]
 * // ...
 * ```
 */
export class TextFormatter extends BaseRunFormatter {
  formatStart(capacity: number): string[] {
    return [`Initialized memory simulator with total=${capacity}`, '']
  }

  formatStep(step: SimulationStep): string[] {
    if (step.kind === 'malformed') {
      return [`Unrecognized line ${step.entry.lineNumber}: ${step.entry.text}`]
    }
    const lines = [formatOutcome(step.outcome)]
    if (this.config.renderAfterEachRequest) {
      lines.push(...formatMemoryMap(step.snapshot))
    }
    return lines
  }

  formatReport(report: SimulationReport): string[] {
    return [
      '',
      'All requests processed.',
      '===== FINAL STATS =====',
      `Total memory: ${report.capacity}`,
      `Total free: ${report.totalFree}`,
      `Largest free block: ${report.largestFreeBlock}`,
      `External fragmentation: ${this.formatPercent(report.externalFragmentation)}%`,
      `Alloc success: ${report.allocSuccessCount}, failures: ${report.allocFailureCount}`,
      '========================'
    ]
  }
}
