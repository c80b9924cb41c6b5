import createDebug from 'debug'

/**
 * Internal Debug Logger for first-fit-lab
 *
 * Traces engine internals (splits, merges, trace parsing decisions).
 * It never carries the rendered memory map or the final report; those go
 * through the formatters.
 *
 * Usage:
 * - Enable with: DEBUG=first-fit-lab:* first-fit-lab trace.txt
 * - Narrow with: DEBUG=first-fit-lab:coalescer
 */

export type Logger = ReturnType<typeof createDebug>

const NAMESPACE_PREFIX = 'first-fit-lab'

/**
 * Factory for creating debug loggers with consistent namespacing
 */
export class LoggerFactory {
  private static debuggers = new Map<string, Logger>()

  /**
   * Creates a debug logger with the specified namespace
   * @param namespace - The namespace for the logger (will be prefixed with first-fit-lab:)
   */
  static create(namespace: string): Logger {
    const fullNamespace = `${NAMESPACE_PREFIX}:${namespace}`

    const existing = this.debuggers.get(fullNamespace)
    if (existing) {
      return existing
    }

    const logger = createDebug(fullNamespace)
    this.debuggers.set(fullNamespace, logger)
    return logger
  }
}

// Pre-defined loggers for common namespaces
export const coreLogger = (): Logger => LoggerFactory.create('core')
export const allocatorLogger = (): Logger => LoggerFactory.create('allocator')
export const coalescerLogger = (): Logger => LoggerFactory.create('coalescer')
export const traceLogger = (): Logger => LoggerFactory.create('trace')
export const cliLogger = (): Logger => LoggerFactory.create('cli')
