/**
 * First-fit Allocator
 *
 * @module allocator/Allocator
 */

import type { BlockTable } from '../table/BlockTable.js'
import type {
  AllocateRequest,
  AllocationCounters,
  AllocationOutcome
} from '../types/simulation.js'
import { isFree, largestFreeSize } from '../types/block.js'
import { AllocationFailedError, MalformedRequestError } from '../errors/errors.js'
import { ErrorMessages } from '../errors/messages.js'
import { allocatorLogger } from '../utils/logger.js'

const logger = allocatorLogger()

/**
 * Checks the operands of an allocate request
 * @throws MalformedRequestError on an empty name or a non-positive/non-integer size
 */
export function assertAllocateOperands(name: string, size: number): void {
  if (name.trim() === '') {
    throw new MalformedRequestError(ErrorMessages.EMPTY_NAME())
  }
  if (!Number.isSafeInteger(size) || size <= 0) {
    throw new MalformedRequestError(ErrorMessages.INVALID_SIZE(name, String(size)))
  }
}

/**
 * Places each request in the lowest-address free block that can hold it.
 * Tighter fits further up the table are never considered.
 */
export class Allocator {
  constructor(
    private readonly table: BlockTable,
    private readonly counters: AllocationCounters
  ) {}

  /**
   * Allocates `size` bytes for `name`.
   *
   * An exact fit relabels the block in place; a larger block is split into
   * the owned prefix and a free remainder at the same table position. When
   * no single free block is large enough the table is left unchanged.
   *
   * @throws MalformedRequestError for invalid operands (counters untouched)
   */
  allocate(name: string, size: number): AllocationOutcome {
    assertAllocateOperands(name, size)
    const request: AllocateRequest = { kind: 'allocate', name, size }

    const index = this.table.findIndex((block) => isFree(block) && block.size >= size)
    const selected = this.table.at(index)

    if (!selected) {
      this.counters.allocFailureCount++
      const error = new AllocationFailedError(name, size, largestFreeSize(this.table.entries()))
      logger('allocate %s %d failed, largest free %d', name, size, error.largestFreeBlock)
      return { kind: 'allocate', success: false, request, error }
    }

    const { start } = selected
    const split = selected.size > size

    if (split) {
      this.table.splice(
        index,
        1,
        { start, size, owner: name },
        { start: start + size, size: selected.size - size, owner: null }
      )
    } else {
      this.table.relabel(index, name)
    }

    this.counters.allocSuccessCount++
    logger('allocate %s %d at %d (block %d, split=%s)', name, size, start, index, split)
    return { kind: 'allocate', success: true, request, start, split }
  }
}
