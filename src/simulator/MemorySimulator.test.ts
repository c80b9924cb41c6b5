import { describe, it, expect } from 'vitest'
import { MemorySimulator } from './MemorySimulator.js'
import { InvalidCapacityError, ProcessNotFoundError } from '../errors/errors.js'
import { createRandomRequests } from '../test-utils/index.js'
import type { TableSnapshot } from '../types/block.js'

type Range = [owner: string | null, start: number, end: number]

const ranges = (snapshot: TableSnapshot): Range[] =>
  snapshot.blocks.map((block): Range => [block.owner, block.start, block.end])

describe('MemorySimulator', () => {
  describe('scenarios', () => {
    it('should fill the whole capacity with one exact-fit allocation', () => {
      const sim = new MemorySimulator(1000)

      const outcome = sim.allocate('P1', 1000)

      expect(outcome).toMatchObject({ success: true, start: 0 })
      expect(ranges(sim.render())).toEqual([['P1', 0, 1000]])
      expect(sim.stats.totalFree()).toBe(0)
    })

    it('should not merge free space across a live allocation', () => {
      const sim = new MemorySimulator(300)

      sim.allocate('P1', 100)
      sim.allocate('P2', 100)
      sim.free('P1')

      expect(ranges(sim.render())).toEqual([
        [null, 0, 100],
        ['P2', 100, 200],
        [null, 200, 300]
      ])
    })

    it('should keep holes separate while the middle block lives', () => {
      const sim = new MemorySimulator(300)

      sim.allocate('P1', 100)
      sim.allocate('P2', 100)
      sim.allocate('P3', 100)
      sim.free('P1')
      sim.free('P3')

      expect(ranges(sim.render())).toEqual([
        [null, 0, 100],
        ['P2', 100, 200],
        [null, 200, 300]
      ])
      expect(sim.stats.largestFreeBlock()).toBe(100)
    })

    it('should coalesce all three blocks once the middle one is freed', () => {
      const sim = new MemorySimulator(300)

      sim.allocate('P1', 100)
      sim.allocate('P2', 100)
      sim.allocate('P3', 100)
      sim.free('P1')
      sim.free('P3')
      sim.free('P2')

      expect(ranges(sim.render())).toEqual([[null, 0, 300]])
    })

    it('should count an oversized request as a failure and change nothing', () => {
      const sim = new MemorySimulator(100)

      const outcome = sim.allocate('P1', 150)

      expect(outcome.success).toBe(false)
      expect(sim.allocSuccessCount).toBe(0)
      expect(sim.allocFailureCount).toBe(1)
      expect(ranges(sim.render())).toEqual([[null, 0, 100]])
    })

    it('should report an unknown process on free', () => {
      const sim = new MemorySimulator(100)

      const outcome = sim.free('Ghost')

      expect(outcome.success).toBe(false)
      if (!outcome.success) {
        expect(outcome.error).toBeInstanceOf(ProcessNotFoundError)
      }
      expect(ranges(sim.render())).toEqual([[null, 0, 100]])
      expect(sim.allocFailureCount).toBe(0)
    })
  })

  describe('properties', () => {
    it.each([1, 2, 3, 5, 8, 13, 21, 34])(
      'should preserve every table invariant over random requests (seed %i)',
      (seed) => {
        const sim = new MemorySimulator(500, { verifyInvariants: false })

        for (const request of createRandomRequests(seed, 200, 120)) {
          sim.apply(request)

          const { blocks } = sim.render()
          expect(sim.checkInvariants()).toEqual([])
          expect(blocks.reduce((sum, block) => sum + block.size, 0)).toBe(500)
        }
      }
    )

    it('should leave the block count unchanged on an exact fit and add one on a split', () => {
      const sim = new MemorySimulator(300)
      sim.allocate('A', 100)
      sim.allocate('B', 100)
      sim.free('A')
      const before = sim.render().blocks.length

      sim.allocate('C', 100)
      expect(sim.render().blocks.length).toBe(before)

      sim.allocate('D', 40)
      const after = sim.render().blocks
      expect(after.length).toBe(before + 1)
      expect(ranges(sim.render())).toEqual([
        ['C', 0, 100],
        ['B', 100, 200],
        ['D', 200, 240],
        [null, 240, 300]
      ])
    })

    it('should pick the same block for the same history', () => {
      const history = createRandomRequests(99, 60, 80)
      const first = new MemorySimulator(400)
      const second = new MemorySimulator(400)

      for (const request of history) {
        first.apply(request)
        second.apply(request)
      }

      expect(first.allocate('Z', 10)).toEqual(second.allocate('Z', 10))
      expect(first.render()).toEqual(second.render())
    })

    it('should keep instances isolated', () => {
      const first = new MemorySimulator(100)
      const second = new MemorySimulator(100)

      first.allocate('P1', 60)

      expect(ranges(second.render())).toEqual([[null, 0, 100]])
      expect(second.allocSuccessCount).toBe(0)
    })
  })

  describe('configuration', () => {
    it('should reject an invalid capacity', () => {
      expect(() => new MemorySimulator(0)).toThrow(InvalidCapacityError)
    })

    it('should reject invalid configuration', () => {
      expect(() => new MemorySimulator(100, { fragmentationDigits: -1 })).toThrow(
        'fragmentationDigits must be an integer between 0 and 10'
      )
    })

    it('should dispatch requests through apply', () => {
      const sim = new MemorySimulator(100)

      expect(sim.apply({ kind: 'allocate', name: 'P1', size: 10 })).toMatchObject({
        kind: 'allocate',
        success: true
      })
      expect(sim.apply({ kind: 'free', name: 'P1' })).toMatchObject({
        kind: 'free',
        success: true
      })
    })

    it('should produce the final report', () => {
      const sim = new MemorySimulator(200)
      sim.allocate('A', 50)
      sim.allocate('B', 50)
      sim.allocate('C', 50)
      sim.free('B')
      sim.allocate('D', 120)

      expect(sim.report()).toEqual({
        capacity: 200,
        totalFree: 100,
        totalAllocated: 100,
        largestFreeBlock: 50,
        freeBlockCount: 2,
        externalFragmentation: 25,
        allocSuccessCount: 3,
        allocFailureCount: 1
      })
    })
  })
})
