/**
 * Quire SDK
 * Rich text document model and format rule engine
 *
 * Features: Delta documents and patches, attribute catalog, format rules
 * for lines, inline runs, links at the caret and embeds
 *
 * @packageDocumentation
 * @module @quire/sdk
 */

// Core exports
export { RichDocument } from './document'
export type { DocumentChange, ChangeSource, RichDocumentOptions } from './document'

// Delta model
export * from './delta'

// Attributes
export * from './attributes'

// Format rules
export * from './rules'

// Configuration & logging
export { loadConfig } from './config'
export type { QuireConfig, QuireConfigInput } from './config'
export { createLogger } from './logger'
export type { Logger, LoggerOptions } from './logger'

// Types
export type { SubscriptionCallback, Unsubscribe } from './types'

// Errors
export {
  QuireError,
  ContractViolationError,
  IteratorExhaustedError,
  DeltaFormatError,
  DocumentError,
  UnknownAttributeError,
  ConfigError
} from './types'

// Version
export const VERSION = '0.1.0'

/**
 * Quick start example:
 *
 * ```typescript
 * import { RichDocument, Attributes } from '@quire/sdk'
 *
 * const doc = new RichDocument('Shopping\nMilk\nEggs\n')
 *
 * doc.format(0, 8, Attributes.header(1))
 * doc.toggleCheckList(9, 9)
 *
 * const saved = doc.snapshot()
 * const copy = RichDocument.restore(saved)
 * ```
 */
