/**
 * first-fit-lab
 *
 * First-fit memory allocator simulator: a block table over a fixed address
 * space, driven by allocate/free traces, with fragmentation statistics.
 */

// Export types
export * from './types/index.js'

// Export engine
export { MemorySimulator } from './simulator/MemorySimulator.js'
export { BlockTable } from './table/BlockTable.js'
export { findInvariantViolations, type InvariantCheckOptions } from './table/invariants.js'
export { Allocator, assertAllocateOperands } from './allocator/Allocator.js'
export { Deallocator } from './allocator/Deallocator.js'
export { coalesce } from './allocator/Coalescer.js'
export { StatsReporter } from './stats/StatsReporter.js'

// Export driver
export {
  parseTrace,
  parseRequestLine,
  parseCapacity,
  type ParsedTrace
} from './trace/TraceParser.js'
export {
  runTrace,
  runParsedTrace,
  type SimulationRun,
  type SimulationStep,
  type TraceRunHooks
} from './trace/TraceRunner.js'

// Export formatters
export * from './formatters/index.js'

// Export configuration
export {
  DEFAULT_SIMULATOR_CONFIG,
  OUTPUT_FORMATS,
  normalizeSimulatorConfig,
  validateSimulatorConfig,
  resolveSimulatorConfig,
  type SimulatorConfig,
  type OutputFormat
} from './config/simulator-config.js'

// Export errors
export * from './errors/index.js'

// Export CLI entry for embedding
export { runCli, parseCliArgs, type CliIO, type CliOptions } from './cli.js'
