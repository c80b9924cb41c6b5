/**
 * Block table consistency checks
 *
 * @module table/invariants
 */

import type { Block } from '../types/block.js'
import { blockEnd, isFree } from '../types/block.js'
import { ErrorMessages } from '../errors/messages.js'

export interface InvariantCheckOptions {
  /** Also reject two adjacent free blocks (default true) */
  requireCoalesced?: boolean
}

/**
 * Lists every invariant a block sequence breaks for the given capacity.
 * An empty result means the sequence is a valid table.
 */
export function findInvariantViolations(
  blocks: ReadonlyArray<Readonly<Block>>,
  capacity: number,
  options: InvariantCheckOptions = {}
): string[] {
  const requireCoalesced = options.requireCoalesced ?? true
  const violations: string[] = []

  if (blocks.length === 0) {
    if (capacity > 0) {
      violations.push(ErrorMessages.EMPTY_TABLE(capacity))
    }
    return violations
  }

  let expectedStart = 0
  blocks.forEach((block, index) => {
    if (block.start !== expectedStart) {
      violations.push(ErrorMessages.GAP_OR_OVERLAP(index, expectedStart, block.start))
    }
    if (!(block.size > 0) || !Number.isInteger(block.size)) {
      violations.push(ErrorMessages.EMPTY_BLOCK(index, block.size))
    }
    if (requireCoalesced && index > 0 && isFree(block) && isFree(blocks[index - 1])) {
      violations.push(ErrorMessages.ADJACENT_FREE(index))
    }
    expectedStart = blockEnd(block)
  })

  if (expectedStart !== capacity) {
    violations.push(ErrorMessages.CAPACITY_MISMATCH(capacity, expectedStart))
  }

  return violations
}
