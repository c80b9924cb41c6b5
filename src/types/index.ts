export type { Address, Block, BlockView, TableSnapshot } from './block.js'
export { isFree, blockEnd, largestFreeSize, toBlockView } from './block.js'
export type {
  AllocateRequest,
  FreeRequest,
  SimulationRequest,
  AllocationOutcome,
  FreeOutcome,
  RequestOutcome,
  AllocationCounters,
  SimulationReport,
  MalformedEntry,
  RequestEntry,
  TraceEntry
} from './simulation.js'
