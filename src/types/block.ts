/**
 * Block Table Types
 *
 * A block is a contiguous, non-empty address range tagged either free
 * (`owner === null`) or owned by one process identifier.
 *
 * @module types/block
 */

/**
 * Byte offset into the simulated address space
 */
export type Address = number

/**
 * A contiguous address range `[start, start + size)`
 */
export interface Block {
  /** Address of the first byte */
  start: Address
  /** Number of bytes covered, always > 0 */
  size: number
  /** Owning process name, null when free */
  owner: string | null
}

/**
 * Read-only view of a block as handed to drivers and formatters
 */
export interface BlockView {
  readonly start: Address
  readonly size: number
  /** Exclusive end address */
  readonly end: Address
  readonly owner: string | null
  readonly free: boolean
}

/**
 * Ordered listing of every block at one point in time
 */
export interface TableSnapshot {
  capacity: number
  blocks: BlockView[]
}

export const isFree = (block: Pick<Block, 'owner'>): boolean => block.owner === null

/**
 * Size of the largest free block in `blocks`, 0 when none is free
 */
export const largestFreeSize = (blocks: Iterable<Pick<Block, 'owner' | 'size'>>): number => {
  let largest = 0
  for (const block of blocks) {
    if (isFree(block) && block.size > largest) largest = block.size
  }
  return largest
}

export const blockEnd = (block: Pick<Block, 'start' | 'size'>): Address => block.start + block.size

export const toBlockView = (block: Block): BlockView => ({
  start: block.start,
  size: block.size,
  end: blockEnd(block),
  owner: block.owner,
  free: isFree(block)
})
