/**
 * Block Table
 *
 * The ordered, array-backed sequence of blocks covering `[0, capacity)`.
 * Splits and merges are slice replacements on the array; there are no
 * linked nodes.
 *
 * @module table
 */

import type { Block, TableSnapshot } from '../types/block.js'
import { toBlockView } from '../types/block.js'
import { InvalidCapacityError, TableInvariantViolationError } from '../errors/errors.js'
import { ErrorMessages } from '../errors/messages.js'
import { findInvariantViolations, type InvariantCheckOptions } from './invariants.js'

/**
 * Owns the mutable block sequence of one simulation.
 *
 * @example
 * ```typescript
 * const table = new BlockTable(1000)
 * table.splice(0, 1, { start: 0, size: 100, owner: 'P1' }, { start: 100, size: 900, owner: null })
 * table.assertInvariants('split')
 * ```
 */
export class BlockTable {
  readonly capacity: number
  private blocks: Block[]

  constructor(capacity: number) {
    if (!Number.isSafeInteger(capacity) || capacity <= 0) {
      throw new InvalidCapacityError(ErrorMessages.INVALID_CAPACITY(String(capacity)))
    }
    this.capacity = capacity
    this.blocks = [{ start: 0, size: capacity, owner: null }]
  }

  get length(): number {
    return this.blocks.length
  }

  /**
   * Blocks in address order. The array and its blocks must not be mutated
   * by callers; use splice/relabel/replaceAll.
   */
  entries(): ReadonlyArray<Readonly<Block>> {
    return this.blocks
  }

  at(index: number): Readonly<Block> | undefined {
    return this.blocks[index]
  }

  /**
   * Index of the first block, in address order, matching the predicate, or -1
   */
  findIndex(predicate: (block: Readonly<Block>, index: number) => boolean): number {
    return this.blocks.findIndex(predicate)
  }

  /**
   * Removes `deleteCount` blocks at `index` and inserts `inserted` in their place
   */
  splice(index: number, deleteCount: number, ...inserted: Block[]): Block[] {
    return this.blocks.splice(index, deleteCount, ...inserted.map((block) => ({ ...block })))
  }

  /**
   * Changes the owner of the block at `index` without touching its range
   */
  relabel(index: number, owner: string | null): void {
    const block = this.blocks[index]
    if (!block) {
      throw new RangeError(`No block at index ${index}`)
    }
    block.owner = owner
  }

  /**
   * Swaps in a whole new sequence, e.g. the output of a merge pass
   */
  replaceAll(blocks: Block[]): void {
    this.blocks = blocks.map((block) => ({ ...block }))
  }

  checkInvariants(options?: InvariantCheckOptions): string[] {
    return findInvariantViolations(this.blocks, this.capacity, options)
  }

  /**
   * @throws TableInvariantViolationError listing every broken invariant
   */
  assertInvariants(operation?: string, options?: InvariantCheckOptions): void {
    const violations = this.checkInvariants(options)
    if (violations.length > 0) {
      throw new TableInvariantViolationError(violations, operation)
    }
  }

  snapshot(): TableSnapshot {
    return {
      capacity: this.capacity,
      blocks: this.blocks.map(toBlockView)
    }
  }
}
