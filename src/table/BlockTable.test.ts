import { describe, it, expect } from 'vitest'
import { BlockTable } from './BlockTable.js'
import { InvalidCapacityError, TableInvariantViolationError } from '../errors/errors.js'
import { freeBlock, layout, ownedBlock } from '../test-utils/index.js'

describe('BlockTable', () => {
  describe('construction', () => {
    it('should start as one free block spanning the capacity', () => {
      const table = new BlockTable(1000)

      expect(table.capacity).toBe(1000)
      expect(table.length).toBe(1)
      expect(table.entries()).toEqual([{ start: 0, size: 1000, owner: null }])
      expect(table.checkInvariants()).toEqual([])
    })

    it.each([0, -5, 1.5, Number.NaN])('should reject capacity %s', (capacity) => {
      expect(() => new BlockTable(capacity)).toThrow(InvalidCapacityError)
    })
  })

  describe('mutation', () => {
    it('should copy spliced blocks so callers cannot alias table state', () => {
      const table = new BlockTable(100)
      const inserted = ownedBlock('P1', 0, 100)

      table.splice(0, 1, inserted)
      inserted.owner = 'P2'

      expect(table.at(0)?.owner).toBe('P1')
    })

    it('should return the removed blocks from splice', () => {
      const table = new BlockTable(100)

      const removed = table.splice(0, 1, ownedBlock('P1', 0, 40), freeBlock(40, 60))

      expect(removed).toEqual([freeBlock(0, 100)])
      expect(table.length).toBe(2)
    })

    it('should relabel in place without touching the range', () => {
      const table = new BlockTable(100)

      table.relabel(0, 'P1')

      expect(table.entries()).toEqual([ownedBlock('P1', 0, 100)])
    })

    it('should reject relabeling a missing index', () => {
      const table = new BlockTable(100)

      expect(() => table.relabel(3, 'P1')).toThrow(RangeError)
    })

    it('should find the lowest-address match', () => {
      const table = new BlockTable(30)
      table.replaceAll(layout([10, 'A'], [10, 'B'], [10, 'A']))

      expect(table.findIndex((block) => block.owner === 'A')).toBe(0)
      expect(table.findIndex((block) => block.owner === 'C')).toBe(-1)
    })
  })

  describe('invariants', () => {
    it('should report a gap between blocks', () => {
      const table = new BlockTable(100)
      table.replaceAll([freeBlock(0, 50), ownedBlock('P1', 60, 40)])

      expect(table.checkInvariants()).toEqual(['blocks[1].start: Expected 50, got 60'])
    })

    it('should report adjacent free blocks unless coalescing is not required', () => {
      const table = new BlockTable(100)
      table.replaceAll(layout([40, null], [60, null]))

      expect(table.checkInvariants()).toEqual([
        'blocks[1]: Expected at most one of two adjacent blocks free, got both'
      ])
      expect(table.checkInvariants({ requireCoalesced: false })).toEqual([])
    })

    it('should report a table that does not reach the capacity', () => {
      const table = new BlockTable(100)
      table.replaceAll(layout([40, 'P1']))

      expect(table.checkInvariants()).toEqual(['table.end: Expected 100, got 40'])
    })

    it('should report an empty block', () => {
      const table = new BlockTable(100)
      table.replaceAll(layout([0, 'P1'], [100, null]))

      expect(table.checkInvariants()).toEqual(['blocks[0].size: Expected value > 0, got 0'])
    })

    it('should report an empty table', () => {
      const table = new BlockTable(100)
      table.replaceAll([])

      expect(table.checkInvariants()).toEqual(['table: Expected blocks covering 100, got none'])
    })

    it('should throw with the operation name when asserting', () => {
      const table = new BlockTable(100)
      table.replaceAll(layout([40, 'P1']))

      expect(() => table.assertInvariants('test-op')).toThrow(TableInvariantViolationError)
      expect(() => table.assertInvariants('test-op')).toThrow(
        'Block table invariant violated after test-op: table.end: Expected 100, got 40'
      )
    })
  })

  describe('snapshot', () => {
    it('should expose end and free flags', () => {
      const table = new BlockTable(100)
      table.replaceAll(layout([30, 'P1'], [70, null]))

      expect(table.snapshot()).toEqual({
        capacity: 100,
        blocks: [
          { start: 0, size: 30, end: 30, owner: 'P1', free: false },
          { start: 30, size: 70, end: 100, owner: null, free: true }
        ]
      })
    })

    it('should not change when the table changes afterwards', () => {
      const table = new BlockTable(100)
      const snapshot = table.snapshot()

      table.relabel(0, 'P1')

      expect(snapshot.blocks[0]?.owner).toBeNull()
    })
  })
})
