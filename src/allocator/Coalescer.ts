/**
 * Coalescer
 *
 * Merges every maximal run of adjacent free blocks into one free block in a
 * single left-to-right pass, then re-derives every start address from 0.
 * A source block that does not begin where the running address says it
 * should is reported as a table invariant violation.
 *
 * @module allocator/Coalescer
 */

import type { Block } from '../types/block.js'
import { isFree } from '../types/block.js'
import { TableInvariantViolationError } from '../errors/errors.js'
import { ErrorMessages } from '../errors/messages.js'
import { coalescerLogger } from '../utils/logger.js'

const logger = coalescerLogger()

/**
 * Returns a new block sequence with each free run collapsed to one block.
 * The input is not modified.
 *
 * @param blocks - Blocks in address order
 * @param capacity - When given, the merged sequence must end exactly here
 * @throws TableInvariantViolationError on a gap, overlap, empty block or
 * capacity mismatch in the input
 */
export function coalesce(blocks: ReadonlyArray<Readonly<Block>>, capacity?: number): Block[] {
  const merged: Block[] = []
  const violations: string[] = []
  let accumulator: Block | null = null
  let cursor = 0

  for (const [index, block] of blocks.entries()) {
    if (block.start !== cursor) {
      violations.push(ErrorMessages.GAP_OR_OVERLAP(index, cursor, block.start))
    }
    if (!(block.size > 0)) {
      violations.push(ErrorMessages.EMPTY_BLOCK(index, block.size))
    }
    cursor += block.size

    if (accumulator && isFree(accumulator) && isFree(block)) {
      accumulator.size += block.size
      continue
    }
    if (accumulator) {
      merged.push(accumulator)
    }
    accumulator = { start: block.start, size: block.size, owner: block.owner }
  }

  if (accumulator) {
    merged.push(accumulator)
  }

  if (capacity !== undefined && cursor !== capacity) {
    violations.push(ErrorMessages.CAPACITY_MISMATCH(capacity, cursor))
  }

  if (violations.length > 0) {
    logger('drift detected: %o', violations)
    throw new TableInvariantViolationError(violations, 'coalesce')
  }

  let address = 0
  for (const block of merged) {
    block.start = address
    address += block.size
  }

  if (merged.length !== blocks.length) {
    logger('merged %d blocks into %d', blocks.length, merged.length)
  }

  return merged
}
