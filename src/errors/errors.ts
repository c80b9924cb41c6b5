/**
 * Simulation error taxonomy
 *
 * Recoverable errors (allocation failure, unknown process, malformed line)
 * travel inside request outcomes. Capacity errors and invariant violations
 * are thrown and end the run.
 *
 * @module errors
 */

import { ErrorMessages } from './messages.js'

export type SimulationErrorCode =
  | 'ALLOCATION_FAILED'
  | 'PROCESS_NOT_FOUND'
  | 'MALFORMED_REQUEST'
  | 'INVALID_CAPACITY'
  | 'TABLE_INVARIANT_VIOLATION'

/**
 * Base class for every error the simulator produces
 */
export abstract class SimulationError extends Error {
  abstract readonly code: SimulationErrorCode
}

/**
 * No single free block is large enough for the request.
 */
export class AllocationFailedError extends SimulationError {
  readonly code = 'ALLOCATION_FAILED'

  constructor(
    public readonly processName: string,
    public readonly requestedSize: number,
    public readonly largestFreeBlock: number
  ) {
    super(ErrorMessages.ALLOCATION_FAILED(processName, requestedSize))
    this.name = 'AllocationFailedError'
  }
}

/**
 * A free request names a process with no live allocation.
 */
export class ProcessNotFoundError extends SimulationError {
  readonly code = 'PROCESS_NOT_FOUND'

  constructor(public readonly processName: string) {
    super(ErrorMessages.PROCESS_NOT_FOUND(processName))
    this.name = 'ProcessNotFoundError'
  }
}

/**
 * A request that cannot be parsed or carries an invalid operand.
 */
export class MalformedRequestError extends SimulationError {
  readonly code = 'MALFORMED_REQUEST'

  constructor(
    message: string,
    public readonly lineNumber?: number
  ) {
    super(lineNumber === undefined ? message : `Line ${lineNumber}: ${message}`)
    this.name = 'MalformedRequestError'
  }
}

/**
 * The leading capacity line is missing or not a positive integer.
 */
export class InvalidCapacityError extends SimulationError {
  readonly code = 'INVALID_CAPACITY'

  constructor(
    message: string,
    public readonly lineNumber?: number
  ) {
    super(message)
    this.name = 'InvalidCapacityError'
  }
}

/**
 * The block table broke contiguity, coverage or coalescing guarantees.
 * Always an engine bug, never bad input.
 */
export class TableInvariantViolationError extends SimulationError {
  readonly code = 'TABLE_INVARIANT_VIOLATION'

  constructor(
    public readonly violations: string[],
    public readonly operation?: string
  ) {
    super(
      `Block table invariant violated${operation ? ` after ${operation}` : ''}: ` +
        violations.join('; ')
    )
    this.name = 'TableInvariantViolationError'
  }
}

export const isSimulationError = (value: unknown): value is SimulationError =>
  value instanceof SimulationError
