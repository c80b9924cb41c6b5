import { describe, it, expect } from 'vitest'
import { StatsReporter } from './StatsReporter.js'
import { createTable, layout } from '../test-utils/index.js'

describe('StatsReporter', () => {
  const counters = { allocSuccessCount: 4, allocFailureCount: 2 }

  it('should sum and measure free blocks', () => {
    const table = createTable(layout([100, null], [50, 'A'], [50, null], [100, 'B']))
    const stats = new StatsReporter(table, counters)

    expect(stats.totalFree()).toBe(150)
    expect(stats.largestFreeBlock()).toBe(100)
    expect(stats.freeBlockCount()).toBe(2)
    expect(stats.allocatedTotal()).toBe(150)
  })

  it('should compute fragmentation as free space outside the largest block over capacity', () => {
    const table = createTable(layout([100, null], [50, 'A'], [50, null], [100, 'B']))
    const stats = new StatsReporter(table, counters)

    expect(stats.externalFragmentation()).toBeCloseTo(100 / 6, 10)
  })

  it('should report zero fragmentation when nothing is free', () => {
    const table = createTable(layout([60, 'A'], [40, 'B']))
    const stats = new StatsReporter(table, counters)

    expect(stats.totalFree()).toBe(0)
    expect(stats.largestFreeBlock()).toBe(0)
    expect(stats.externalFragmentation()).toBe(0)
  })

  it('should report zero fragmentation when all free space is one block', () => {
    const table = createTable(layout([60, 'A'], [40, null]))

    expect(new StatsReporter(table, counters).externalFragmentation()).toBe(0)
  })

  it('should fold counters into the summary', () => {
    const table = createTable(layout([25, null], [50, 'A'], [25, null]))

    expect(new StatsReporter(table, counters).summary()).toEqual({
      capacity: 100,
      totalFree: 50,
      totalAllocated: 50,
      largestFreeBlock: 25,
      freeBlockCount: 2,
      externalFragmentation: 25,
      allocSuccessCount: 4,
      allocFailureCount: 2
    })
  })

  it('should render the current table', () => {
    const table = createTable(layout([25, 'A'], [75, null]))

    expect(new StatsReporter(table, counters).render().blocks.map((block) => block.end)).toEqual([
      25, 100
    ])
  })
})
