/**
 * Simulator configuration
 *
 * @module config/simulator-config
 */

export type OutputFormat = 'text' | 'jsonl'

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'jsonl']

/**
 * Options shared by the engine, the trace parser and the formatters
 */
export interface SimulatorConfig {
  /** Re-check every table invariant after each engine operation */
  verifyInvariants?: boolean
  /** Case-insensitive keywords that mark a free request */
  freeKeywords?: string[]
  /** Lines starting with this prefix are ignored */
  commentPrefix?: string
  /** Output format used by the CLI */
  format?: OutputFormat
  /** Decimals used when rendering the fragmentation percentage */
  fragmentationDigits?: number
  /** Emit the memory map after every request */
  renderAfterEachRequest?: boolean
}

export const DEFAULT_SIMULATOR_CONFIG: Required<SimulatorConfig> = {
  verifyInvariants: true,
  freeKeywords: ['FREE', 'D', 'DEALLOC', 'RELEASE'],
  commentPrefix: '#',
  format: 'text',
  fragmentationDigits: 2,
  renderAfterEachRequest: true
}

/**
 * Fill in defaults and upper-case the free keywords.
 * A field given as `undefined` falls back to its default.
 */
export function normalizeSimulatorConfig(config: SimulatorConfig = {}): Required<SimulatorConfig> {
  const defaults = DEFAULT_SIMULATOR_CONFIG
  const freeKeywords = config.freeKeywords ?? defaults.freeKeywords
  return {
    verifyInvariants: config.verifyInvariants ?? defaults.verifyInvariants,
    freeKeywords: freeKeywords.map((keyword) => keyword.toUpperCase()),
    commentPrefix: config.commentPrefix ?? defaults.commentPrefix,
    format: config.format ?? defaults.format,
    fragmentationDigits: config.fragmentationDigits ?? defaults.fragmentationDigits,
    renderAfterEachRequest: config.renderAfterEachRequest ?? defaults.renderAfterEachRequest
  }
}

/**
 * Validate simulator configuration
 * @throws Error if configuration is invalid
 */
export function validateSimulatorConfig(config: SimulatorConfig): void {
  const booleanFields: (keyof SimulatorConfig)[] = ['verifyInvariants', 'renderAfterEachRequest']

  for (const field of booleanFields) {
    if (config[field] !== undefined && typeof config[field] !== 'boolean') {
      throw new Error(`${field} must be a boolean`)
    }
  }

  if (config.freeKeywords !== undefined) {
    if (!Array.isArray(config.freeKeywords) || config.freeKeywords.length === 0) {
      throw new Error('freeKeywords must be a non-empty array')
    }
    for (const keyword of config.freeKeywords) {
      if (typeof keyword !== 'string' || keyword.trim() === '' || /\s/.test(keyword)) {
        throw new Error('freeKeywords must contain single non-empty words')
      }
    }
  }

  if (config.commentPrefix !== undefined) {
    if (typeof config.commentPrefix !== 'string' || config.commentPrefix.trim() === '') {
      throw new Error('commentPrefix must be a non-empty string')
    }
  }

  if (config.format !== undefined && !OUTPUT_FORMATS.includes(config.format)) {
    throw new Error(`format must be one of ${OUTPUT_FORMATS.map((f) => `"${f}"`).join(', ')}`)
  }

  if (config.fragmentationDigits !== undefined) {
    const digits = config.fragmentationDigits
    if (!Number.isInteger(digits) || digits < 0 || digits > 10) {
      throw new Error('fragmentationDigits must be an integer between 0 and 10')
    }
  }
}

/**
 * Validate then normalize in one step
 */
export function resolveSimulatorConfig(config: SimulatorConfig = {}): Required<SimulatorConfig> {
  validateSimulatorConfig(config)
  return normalizeSimulatorConfig(config)
}
