/**
 * Test factory functions for blocks, tables and traces
 */

import type { Block } from '../types/block.js'
import type { SimulationRequest } from '../types/simulation.js'
import { BlockTable } from '../table/BlockTable.js'

/**
 * Creates a free block
 */
export const freeBlock = (start: number, size: number): Block => ({ start, size, owner: null })

/**
 * Creates a block owned by `owner`
 */
export const ownedBlock = (owner: string, start: number, size: number): Block => ({
  start,
  size,
  owner
})

/**
 * Lays out blocks back to back from address 0.
 * `null` entries are free, strings are owners.
 *
 * @example
 * layout([100, null], [50, 'P1']) // [free 0..100, P1 100..150]
 */
export const layout = (...parts: Array<[size: number, owner: string | null]>): Block[] => {
  let start = 0
  return parts.map(([size, owner]) => {
    const block: Block = { start, size, owner }
    start += size
    return block
  })
}

/**
 * Builds a table whose blocks are exactly `blocks`
 */
export const createTable = (blocks: Block[]): BlockTable => {
  const capacity = blocks.reduce((sum, block) => sum + block.size, 0)
  const table = new BlockTable(capacity)
  table.replaceAll(blocks)
  return table
}

/**
 * Joins trace lines with newlines and a trailing newline
 */
export const createTrace = (...lines: string[]): string => `${lines.join('\n')}\n`

/**
 * Deterministic PRNG (mulberry32) so generated request sequences are repeatable
 */
export const createRandom = (seed: number): (() => number) => {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

/**
 * Generates a mixed allocate/free request sequence over a small name pool
 */
export const createRandomRequests = (
  seed: number,
  count: number,
  maxSize: number
): SimulationRequest[] => {
  const random = createRandom(seed)
  const names = ['P1', 'P2', 'P3', 'P4', 'P5', 'P6']
  const pick = (): string => names[Math.floor(random() * names.length)]

  return Array.from({ length: count }, (): SimulationRequest =>
    random() < 0.6
      ? { kind: 'allocate', name: pick(), size: 1 + Math.floor(random() * maxSize) }
      : { kind: 'free', name: pick() }
  )
}
