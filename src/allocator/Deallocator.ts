/**
 * Deallocator
 *
 * @module allocator/Deallocator
 */

import type { BlockTable } from '../table/BlockTable.js'
import type { FreeOutcome, FreeRequest } from '../types/simulation.js'
import { ProcessNotFoundError } from '../errors/errors.js'
import { allocatorLogger } from '../utils/logger.js'
import { coalesce } from './Coalescer.js'

const logger = allocatorLogger()

/**
 * Releases allocations by owner name.
 *
 * Only the lowest-address block owned by the name is released per call, so
 * a name allocated twice needs two frees. Every successful free runs the
 * merge pass before returning.
 */
export class Deallocator {
  constructor(private readonly table: BlockTable) {}

  free(name: string): FreeOutcome {
    const request: FreeRequest = { kind: 'free', name }
    const index = this.table.findIndex((block) => block.owner === name)
    const target = this.table.at(index)

    if (!target) {
      logger('free %s: not found', name)
      return { kind: 'free', success: false, request, error: new ProcessNotFoundError(name) }
    }

    const released = { ...target }
    this.table.relabel(index, null)

    const before = this.table.length
    this.table.replaceAll(coalesce(this.table.entries(), this.table.capacity))
    const merged = before - this.table.length

    logger('free %s at %d size %d, merged %d', name, released.start, released.size, merged)
    return { kind: 'free', success: true, request, released, merged }
  }
}
