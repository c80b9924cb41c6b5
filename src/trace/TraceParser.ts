/**
 * Trace Parser
 *
 * Turns trace text into a capacity and an ordered list of entries. The
 * first meaningful line is the capacity; every later meaningful line is an
 * allocate request, a free request, or a malformed line that is reported
 * and skipped.
 *
 * Accepted request forms (keywords are case-insensitive):
 * - `P1 100`      allocate 100 bytes for P1
 * - `FREE P1`     free P1 (also `D`, `DEALLOC`, `RELEASE` by default)
 * - `P1 FREE`     free P1
 *
 * @module trace/TraceParser
 */

import type { TraceEntry } from '../types/simulation.js'
import { InvalidCapacityError, MalformedRequestError } from '../errors/errors.js'
import { ErrorMessages } from '../errors/messages.js'
import { resolveSimulatorConfig, type SimulatorConfig } from '../config/simulator-config.js'
import { traceLogger } from '../utils/logger.js'

const logger = traceLogger()

const INTEGER_PATTERN = /^[+-]?\d+$/
const NUMERIC_LIKE_PATTERN = /^[+-]?[\d.]+(e[+-]?\d+)?$/i
const LINE_BREAK = /\r?\n/
const WHITESPACE = /\s+/

export interface ParsedTrace {
  capacity: number
  /** 1-based line number of the capacity line */
  capacityLine: number
  entries: TraceEntry[]
}

type ParserOptions = Pick<Required<SimulatorConfig>, 'freeKeywords' | 'commentPrefix'>

const isMeaningful = (trimmed: string, commentPrefix: string): boolean =>
  trimmed !== '' && !trimmed.startsWith(commentPrefix)

/**
 * Parses the capacity token of the first meaningful line
 * @throws InvalidCapacityError unless the first token is a positive integer
 */
export function parseCapacity(line: string, lineNumber?: number): number {
  const token = line.trim().split(WHITESPACE)[0] ?? ''
  const value = Number(token)
  if (!INTEGER_PATTERN.test(token) || !Number.isSafeInteger(value) || value <= 0) {
    throw new InvalidCapacityError(ErrorMessages.INVALID_CAPACITY(token), lineNumber)
  }
  return value
}

/**
 * Parses one request line.
 *
 * @returns null for blank and comment lines, a malformed entry for lines
 * that cannot be understood, a request entry otherwise
 */
export function parseRequestLine(
  line: string,
  lineNumber: number,
  config: SimulatorConfig = {}
): TraceEntry | null {
  const { freeKeywords, commentPrefix }: ParserOptions = resolveSimulatorConfig(config)
  return parseLine(line, lineNumber, { freeKeywords, commentPrefix })
}

function parseLine(line: string, lineNumber: number, options: ParserOptions): TraceEntry | null {
  const text = line.trim()
  if (!isMeaningful(text, options.commentPrefix)) {
    return null
  }

  const malformed = (message: string): TraceEntry => ({
    kind: 'malformed',
    lineNumber,
    text,
    error: new MalformedRequestError(message, lineNumber)
  })
  const isFreeKeyword = (token: string): boolean =>
    options.freeKeywords.includes(token.toUpperCase())

  const tokens = text.split(WHITESPACE)
  if (tokens.length < 2) {
    return malformed(ErrorMessages.MISSING_OPERAND(text))
  }
  const [first, second] = tokens

  if (isFreeKeyword(first)) {
    return { kind: 'request', lineNumber, text, request: { kind: 'free', name: second } }
  }

  if (INTEGER_PATTERN.test(second)) {
    const size = Number(second)
    if (!Number.isSafeInteger(size) || size <= 0) {
      return malformed(ErrorMessages.INVALID_SIZE(first, second))
    }
    return { kind: 'request', lineNumber, text, request: { kind: 'allocate', name: first, size } }
  }

  if (isFreeKeyword(second)) {
    return { kind: 'request', lineNumber, text, request: { kind: 'free', name: first } }
  }

  if (NUMERIC_LIKE_PATTERN.test(second)) {
    return malformed(ErrorMessages.INVALID_SIZE(first, second))
  }

  return malformed(ErrorMessages.UNRECOGNIZED(text))
}

/**
 * Parses a whole trace
 *
 * @throws InvalidCapacityError when there is no meaningful line or the first
 * one does not start with a positive integer
 */
export function parseTrace(text: string, config: SimulatorConfig = {}): ParsedTrace {
  const options = resolveSimulatorConfig(config)
  const lines = text.split(LINE_BREAK)

  let capacity: number | undefined
  let capacityLine = 0
  const entries: TraceEntry[] = []

  for (const [index, line] of lines.entries()) {
    const lineNumber = index + 1
    if (capacity === undefined) {
      if (isMeaningful(line.trim(), options.commentPrefix)) {
        capacity = parseCapacity(line, lineNumber)
        capacityLine = lineNumber
      }
      continue
    }
    const entry = parseLine(line, lineNumber, options)
    if (entry) {
      entries.push(entry)
    }
  }

  if (capacity === undefined) {
    throw new InvalidCapacityError(ErrorMessages.MISSING_CAPACITY())
  }

  const malformedCount = entries.filter((entry) => entry.kind === 'malformed').length
  logger(
    'parsed capacity=%d entries=%d malformed=%d',
    capacity,
    entries.length,
    malformedCount
  )

  return { capacity, capacityLine, entries }
}
