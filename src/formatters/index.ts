import type { OutputFormat } from '../config/simulator-config.js'
import type { FormatterConfig, RunFormatter } from './RunFormatter.js'
import { TextFormatter } from './TextFormatter.js'
import { JsonLineFormatter } from './JsonLineFormatter.js'

export {
  BaseRunFormatter,
  DEFAULT_FORMATTER_CONFIG,
  type FormatterConfig,
  type RunFormatter
} from './RunFormatter.js'
export { TextFormatter, formatBlock, formatMemoryMap, formatOutcome } from './TextFormatter.js'
export { JsonLineFormatter, type JsonLineEvent } from './JsonLineFormatter.js'

/**
 * Selects the formatter for an output format
 */
export function createFormatter(format: OutputFormat, config: FormatterConfig = {}): RunFormatter {
  switch (format) {
    case 'text':
      return new TextFormatter(config)
    case 'jsonl':
      return new JsonLineFormatter(config)
  }
}
