import { describe, it, expect } from 'vitest'
import {
  AllocationFailedError,
  InvalidCapacityError,
  MalformedRequestError,
  ProcessNotFoundError,
  TableInvariantViolationError,
  isSimulationError,
  type SimulationError
} from './errors.js'

describe('SimulationError', () => {
  it.each<[SimulationError, string, string]>([
    [new AllocationFailedError('P1', 10, 0), 'ALLOCATION_FAILED', 'AllocationFailedError'],
    [new ProcessNotFoundError('P1'), 'PROCESS_NOT_FOUND', 'ProcessNotFoundError'],
    [new MalformedRequestError('bad'), 'MALFORMED_REQUEST', 'MalformedRequestError'],
    [new InvalidCapacityError('bad'), 'INVALID_CAPACITY', 'InvalidCapacityError'],
    [new TableInvariantViolationError(['gap']), 'TABLE_INVARIANT_VIOLATION', 'TableInvariantViolationError']
  ])('should carry a stable code and name (%s)', (error, code, name) => {
    expect(error.code).toBe(code)
    expect(error.name).toBe(name)
    expect(isSimulationError(error)).toBe(true)
    expect(Object.keys(error)).not.toContain('recoverable')
  })

  it('should prefix malformed requests with their line number', () => {
    expect(new MalformedRequestError('bad token', 7).message).toBe('Line 7: bad token')
  })

  it('should name the operation that broke the table', () => {
    expect(new TableInvariantViolationError(['gap at 10', 'overlap'], 'free').message).toBe(
      'Block table invariant violated after free: gap at 10; overlap'
    )
  })

  it('should not treat plain errors as simulation errors', () => {
    expect(isSimulationError(new Error('x'))).toBe(false)
  })
})
