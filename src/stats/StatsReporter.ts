/**
 * Stats Reporter
 *
 * Read-only queries over a block table plus the allocation counters of the
 * simulation that owns it.
 *
 * @module stats
 */

import type { BlockTable } from '../table/BlockTable.js'
import type { TableSnapshot } from '../types/block.js'
import type { AllocationCounters, SimulationReport } from '../types/simulation.js'
import { isFree, largestFreeSize } from '../types/block.js'

export class StatsReporter {
  constructor(
    private readonly table: BlockTable,
    private readonly counters: Readonly<AllocationCounters>
  ) {}

  totalFree(): number {
    let total = 0
    for (const block of this.table.entries()) {
      if (isFree(block)) total += block.size
    }
    return total
  }

  /**
   * Size of the largest free block, 0 when everything is allocated
   */
  largestFreeBlock(): number {
    return largestFreeSize(this.table.entries())
  }

  freeBlockCount(): number {
    return this.table.entries().filter(isFree).length
  }

  allocatedTotal(): number {
    return this.table.capacity - this.totalFree()
  }

  /**
   * Share of the capacity that is free but outside the largest free block,
   * as an unrounded percentage
   */
  externalFragmentation(): number {
    const free = this.totalFree()
    if (free === 0) {
      return 0
    }
    return ((free - this.largestFreeBlock()) / this.table.capacity) * 100
  }

  render(): TableSnapshot {
    return this.table.snapshot()
  }

  summary(): SimulationReport {
    return {
      capacity: this.table.capacity,
      totalFree: this.totalFree(),
      totalAllocated: this.allocatedTotal(),
      largestFreeBlock: this.largestFreeBlock(),
      freeBlockCount: this.freeBlockCount(),
      externalFragmentation: this.externalFragmentation(),
      allocSuccessCount: this.counters.allocSuccessCount,
      allocFailureCount: this.counters.allocFailureCount
    }
  }
}
