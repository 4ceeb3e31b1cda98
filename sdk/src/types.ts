/**
 * Core TypeScript types for the Quire SDK
 * @module types
 */

// ====================
// Subscription Types
// ====================

export type SubscriptionCallback<T> = (value: T) => void

export interface Unsubscribe {
  (): void
}

// ====================
// Error Types
// ====================

export class QuireError extends Error {
  constructor(message: string, public code: string) {
    super(message)
    this.name = 'QuireError'
  }
}

/**
 * A caller broke a documented precondition. Never caught inside the SDK:
 * continuing would corrupt the document.
 */
export class ContractViolationError extends QuireError {
  constructor(message: string, code: string = 'CONTRACT_VIOLATION') {
    super(message, code)
    this.name = 'ContractViolationError'
  }
}

export class IteratorExhaustedError extends ContractViolationError {
  constructor(message: string = 'Delta iterator is exhausted') {
    super(message, 'ITERATOR_EXHAUSTED')
    this.name = 'IteratorExhaustedError'
  }
}

export class DeltaFormatError extends QuireError {
  constructor(message: string) {
    super(message, 'DELTA_FORMAT_ERROR')
    this.name = 'DeltaFormatError'
  }
}

export class DocumentError extends QuireError {
  constructor(message: string) {
    super(message, 'DOCUMENT_ERROR')
    this.name = 'DocumentError'
  }
}

export class UnknownAttributeError extends QuireError {
  constructor(public readonly key: string) {
    super(`Unknown attribute: ${key}`, 'UNKNOWN_ATTRIBUTE')
    this.name = 'UnknownAttributeError'
  }
}

export class ConfigError extends QuireError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR')
    this.name = 'ConfigError'
  }
}
