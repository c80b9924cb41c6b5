/**
 * Simulation error messages
 *
 * Centralized message definitions so the engine, the trace parser and the
 * formatters describe the same failure the same way.
 */

export const ErrorMessages = {
  ALLOCATION_FAILED: (name: string, size: number): string =>
    `${name}: Expected a single free block of at least ${size}, got none`,
  PROCESS_NOT_FOUND: (name: string): string => `${name}: Expected a live allocation, got none`,
  MISSING_CAPACITY: (): string => 'Capacity: Expected a positive integer line, got end of input',
  INVALID_CAPACITY: (actual: string): string =>
    `Capacity: Expected a positive integer, got "${actual}"`,
  EMPTY_NAME: (): string => 'Request: Expected a non-empty process name, got ""',
  INVALID_SIZE: (name: string, actual: string): string =>
    `${name}: Expected a positive integer size, got "${actual}"`,
  MISSING_OPERAND: (token: string): string =>
    `Request: Expected "<name> <size>" or "FREE <name>", got lone token "${token}"`,
  UNRECOGNIZED: (text: string): string =>
    `Request: Expected "<name> <size>" or "FREE <name>", got "${text}"`,
  GAP_OR_OVERLAP: (index: number, expected: number, actual: number): string =>
    `blocks[${index}].start: Expected ${expected}, got ${actual}`,
  EMPTY_BLOCK: (index: number, actual: number): string =>
    `blocks[${index}].size: Expected value > 0, got ${actual}`,
  CAPACITY_MISMATCH: (capacity: number, actual: number): string =>
    `table.end: Expected ${capacity}, got ${actual}`,
  EMPTY_TABLE: (capacity: number): string =>
    `table: Expected blocks covering ${capacity}, got none`,
  ADJACENT_FREE: (index: number): string =>
    `blocks[${index}]: Expected at most one of two adjacent blocks free, got both`
}
