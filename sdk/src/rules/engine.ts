/**
 * Format Rule Engine
 *
 * Turns "apply attribute A to [index, index + length)" into a Delta patch
 * for the caller to compose into its document. Rules are tried in a fixed
 * order and the first one returning a patch wins; when all decline, the
 * range is simply retained with the attribute.
 *
 * The engine only reads the document.
 *
 * @module rules/engine
 */

import type { Attribute } from '../attributes/attribute'
import { defaultCatalog, type AttributeCatalog } from '../attributes/catalog'
import { Delta } from '../delta/delta'
import { operationLength, type Embed } from '../delta/operation'
import { createLogger, type Logger } from '../logger'
import { ContractViolationError } from '../types'
import { resolveEmbedStyle } from './embed-style'
import type { FormatRule, FormatRuleContext } from './format-rule'
import { resolveInlineFormat } from './inline-format'
import { resolveLineFormat } from './line-format'
import { formatLinkAtCaret } from './link-at-caret'

/**
 * Line → Link-at-Caret → Inline → Embed Style
 */
export const DEFAULT_FORMAT_RULES: readonly FormatRule[] = [
  resolveLineFormat,
  formatLinkAtCaret,
  resolveInlineFormat,
  resolveEmbedStyle
]

export interface FormatRuleEngineOptions {
  rules?: readonly FormatRule[]
  catalog?: AttributeCatalog
  logger?: Logger
}

export class FormatRuleEngine {
  readonly rules: readonly FormatRule[]
  readonly catalog: AttributeCatalog
  private readonly logger: Logger

  constructor(options: FormatRuleEngineOptions = {}) {
    this.rules = options.rules ?? DEFAULT_FORMAT_RULES
    this.catalog = options.catalog ?? defaultCatalog
    this.logger = options.logger ?? createLogger('rules')
  }

  /**
   * Compute the patch applying `attribute` to `[index, index + length)`
   *
   * @param document - Document snapshot (insert-only Delta)
   * @param data - Payload of the request; must be absent for embed styles
   * @returns Normalized patch, at least `index + length` long
   * @throws ContractViolationError if the range is outside the document, the
   *   attribute's scope disagrees with the catalog or a rule's precondition
   *   is broken
   */
  format(
    document: Delta,
    index: number,
    length: number,
    attribute: Attribute,
    data?: string | Embed | null
  ): Delta {
    if (!Number.isInteger(index) || !Number.isInteger(length) || index < 0 || length < 0) {
      throw new ContractViolationError(`Invalid format range: index ${index}, length ${length}`)
    }
    if (!reaches(document, index + length)) {
      throw new ContractViolationError(
        `Format range [${index}, ${index + length}) exceeds document length ${document.length()}`
      )
    }

    const scope = this.catalog.scope(attribute.key)
    if (scope !== undefined && scope !== attribute.scope) {
      throw new ContractViolationError(
        `Attribute ${attribute.key} has scope ${attribute.scope} but the catalog defines ${scope}`
      )
    }

    const context: FormatRuleContext = { document, index, length, attribute, data, catalog: this.catalog }

    for (const rule of this.rules) {
      const patch = rule.apply(context)
      if (patch) {
        this.logger.debug(`${rule.name} applied ${attribute.key} at [${index}, ${index + length})`)
        return patch
      }
    }

    this.logger.debug(`no rule applied ${attribute.key}, retaining [${index}, ${index + length})`)
    return new Delta().retain(index).retain(length, attribute.toJSON())
  }
}

/**
 * Whether the document is at least `end` units long, reading only the
 * operations before `end`
 */
function reaches(document: Delta, end: number): boolean {
  let covered = 0
  for (const op of document.ops) {
    if (covered >= end) {
      return true
    }
    covered += operationLength(op)
  }
  return covered >= end
}
