export {
  SimulationError,
  AllocationFailedError,
  ProcessNotFoundError,
  MalformedRequestError,
  InvalidCapacityError,
  TableInvariantViolationError,
  isSimulationError,
  type SimulationErrorCode
} from './errors.js'
export { ErrorMessages } from './messages.js'
