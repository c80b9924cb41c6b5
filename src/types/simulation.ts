/**
 * Simulation Request and Outcome Types
 *
 * @module types/simulation
 */

import type { Address, Block } from './block.js'
import type {
  AllocationFailedError,
  MalformedRequestError,
  ProcessNotFoundError
} from '../errors/errors.js'

/**
 * Allocate `size` bytes for `name`
 */
export interface AllocateRequest {
  kind: 'allocate'
  name: string
  size: number
}

/**
 * Release the lowest-address block owned by `name`
 */
export interface FreeRequest {
  kind: 'free'
  name: string
}

export type SimulationRequest = AllocateRequest | FreeRequest

export type AllocationOutcome =
  | {
      kind: 'allocate'
      success: true
      request: AllocateRequest
      /** Start address of the allocated block */
      start: Address
      /** Whether the selected free block was split */
      split: boolean
    }
  | {
      kind: 'allocate'
      success: false
      request: AllocateRequest
      error: AllocationFailedError
    }

export type FreeOutcome =
  | {
      kind: 'free'
      success: true
      request: FreeRequest
      /** The block as it was owned just before release */
      released: Block
      /** Number of free blocks absorbed by the merge pass */
      merged: number
    }
  | {
      kind: 'free'
      success: false
      request: FreeRequest
      error: ProcessNotFoundError
    }

export type RequestOutcome = AllocationOutcome | FreeOutcome

/**
 * Running allocation counters; deallocation failures are not counted
 */
export interface AllocationCounters {
  allocSuccessCount: number
  allocFailureCount: number
}

/**
 * Final report of a simulation run
 */
export interface SimulationReport {
  capacity: number
  totalFree: number
  totalAllocated: number
  largestFreeBlock: number
  freeBlockCount: number
  /** Percentage in [0, 100], unrounded */
  externalFragmentation: number
  allocSuccessCount: number
  allocFailureCount: number
}

/**
 * A malformed trace line, reported and skipped
 */
export interface MalformedEntry {
  kind: 'malformed'
  lineNumber: number
  text: string
  error: MalformedRequestError
}

/**
 * A well-formed request with the line it came from
 */
export interface RequestEntry {
  kind: 'request'
  lineNumber: number
  text: string
  request: SimulationRequest
}

export type TraceEntry = RequestEntry | MalformedEntry
