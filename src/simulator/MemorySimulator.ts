/**
 * Memory Simulator
 *
 * Engine facade a driver talks to. Each instance owns one block table and
 * one set of allocation counters; instances share nothing.
 *
 * @module simulator
 */

import type { TableSnapshot } from '../types/block.js'
import type {
  AllocationCounters,
  AllocationOutcome,
  FreeOutcome,
  RequestOutcome,
  SimulationReport,
  SimulationRequest
} from '../types/simulation.js'
import { BlockTable } from '../table/BlockTable.js'
import { Allocator } from '../allocator/Allocator.js'
import { Deallocator } from '../allocator/Deallocator.js'
import { StatsReporter } from '../stats/StatsReporter.js'
import { resolveSimulatorConfig, type SimulatorConfig } from '../config/simulator-config.js'
import { coreLogger } from '../utils/logger.js'

const logger = coreLogger()

/**
 * Single-region first-fit allocator simulation.
 *
 * @example
 * ```typescript
 * const sim = new MemorySimulator(300)
 * sim.allocate('P1', 100)
 * sim.allocate('P2', 100)
 * sim.free('P1')
 * sim.render().blocks.map((b) => b.owner) // [null, 'P2', null]
 * ```
 */
export class MemorySimulator {
  private readonly config: Required<SimulatorConfig>
  private readonly table: BlockTable
  private readonly counters: AllocationCounters = { allocSuccessCount: 0, allocFailureCount: 0 }
  private readonly allocator: Allocator
  private readonly deallocator: Deallocator
  readonly stats: StatsReporter

  /**
   * @throws InvalidCapacityError when capacity is not a positive integer
   * @throws Error when the configuration is invalid
   */
  constructor(capacity: number, config: SimulatorConfig = {}) {
    this.config = resolveSimulatorConfig(config)
    this.table = new BlockTable(capacity)
    this.allocator = new Allocator(this.table, this.counters)
    this.deallocator = new Deallocator(this.table)
    this.stats = new StatsReporter(this.table, this.counters)
    logger('initialized capacity=%d verifyInvariants=%s', capacity, this.config.verifyInvariants)
  }

  get capacity(): number {
    return this.table.capacity
  }

  get allocSuccessCount(): number {
    return this.counters.allocSuccessCount
  }

  get allocFailureCount(): number {
    return this.counters.allocFailureCount
  }

  allocate(name: string, size: number): AllocationOutcome {
    const outcome = this.allocator.allocate(name, size)
    this.verify(`allocate ${name} ${size}`)
    return outcome
  }

  free(name: string): FreeOutcome {
    const outcome = this.deallocator.free(name)
    this.verify(`free ${name}`)
    return outcome
  }

  apply(request: SimulationRequest): RequestOutcome {
    switch (request.kind) {
      case 'allocate':
        return this.allocate(request.name, request.size)
      case 'free':
        return this.free(request.name)
    }
  }

  render(): TableSnapshot {
    return this.stats.render()
  }

  report(): SimulationReport {
    return this.stats.summary()
  }

  /**
   * Every broken table invariant, empty when the table is consistent
   */
  checkInvariants(): string[] {
    return this.table.checkInvariants()
  }

  private verify(operation: string): void {
    if (this.config.verifyInvariants) {
      this.table.assertInvariants(operation)
    }
  }
}
