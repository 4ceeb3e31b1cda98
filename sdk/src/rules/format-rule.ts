import type { Attribute } from '../attributes/attribute'
import type { AttributeCatalog } from '../attributes/catalog'
import type { Delta } from '../delta/delta'
import type { Embed } from '../delta/operation'

/**
 * A format request against a document snapshot
 */
export interface FormatRuleContext {
  /** Document the patch is computed against (never mutated) */
  document: Delta
  index: number
  length: number
  attribute: Attribute
  /** Payload accompanying the request; only inserts of content carry one */
  data?: string | Embed | null
  /** Catalog used for exclusion-group lookups */
  catalog: AttributeCatalog
}

/**
 * One strategy of the format rule chain
 *
 * `apply` returns the patch implementing the request, or null to decline
 * so the next rule is tried.
 */
export interface FormatRule {
  readonly name: string
  apply(context: FormatRuleContext): Delta | null
}
